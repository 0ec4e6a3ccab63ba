/**
 * Pipeline run stages, in the order a successful run visits them.
 * FAILED is reachable from every non-terminal stage.
 */
export enum ExtractionStage {
  INIT = 'INIT',
  EXTRACTING_TOKENS = 'EXTRACTING_TOKENS',
  BUILDING_NEIGHBORHOODS = 'BUILDING_NEIGHBORHOODS',
  CLASSIFYING = 'CLASSIFYING',
  ASSEMBLING = 'ASSEMBLING',
  VALIDATING = 'VALIDATING',
  DONE = 'DONE',
  FAILED = 'FAILED',
}

import { ExtractionStage } from '../enums/extraction-stage.enum';
import { InvalidStageTransitionError } from '../errors/extraction.errors';

/**
 * Extraction Run State Machine
 *
 * Single pass, no re-entry:
 * - INIT → EXTRACTING_TOKENS → BUILDING_NEIGHBORHOODS → CLASSIFYING
 *   → ASSEMBLING → VALIDATING → DONE
 * - any non-terminal stage → FAILED (document-level errors only)
 */
export class ExtractionStateMachine {
  private static readonly VALID_TRANSITIONS: Map<
    ExtractionStage,
    ExtractionStage[]
  > = new Map([
    [
      ExtractionStage.INIT,
      [ExtractionStage.EXTRACTING_TOKENS, ExtractionStage.FAILED],
    ],
    [
      ExtractionStage.EXTRACTING_TOKENS,
      [ExtractionStage.BUILDING_NEIGHBORHOODS, ExtractionStage.FAILED],
    ],
    [
      ExtractionStage.BUILDING_NEIGHBORHOODS,
      [ExtractionStage.CLASSIFYING, ExtractionStage.FAILED],
    ],
    [
      ExtractionStage.CLASSIFYING,
      [ExtractionStage.ASSEMBLING, ExtractionStage.FAILED],
    ],
    [
      ExtractionStage.ASSEMBLING,
      [ExtractionStage.VALIDATING, ExtractionStage.FAILED],
    ],
    [ExtractionStage.VALIDATING, [ExtractionStage.DONE, ExtractionStage.FAILED]],
    // DONE and FAILED are terminal
  ]);

  private currentStage: ExtractionStage = ExtractionStage.INIT;
  private readonly visited: ExtractionStage[] = [ExtractionStage.INIT];

  static isValidTransition(
    from: ExtractionStage,
    to: ExtractionStage,
  ): boolean {
    return this.VALID_TRANSITIONS.get(from)?.includes(to) ?? false;
  }

  static validateTransition(from: ExtractionStage, to: ExtractionStage): void {
    if (!this.isValidTransition(from, to)) {
      throw new InvalidStageTransitionError(
        from,
        to,
        this.getValidTargetStages(from),
      );
    }
  }

  static getValidTargetStages(from: ExtractionStage): ExtractionStage[] {
    return this.VALID_TRANSITIONS.get(from) || [];
  }

  static isTerminal(stage: ExtractionStage): boolean {
    return stage === ExtractionStage.DONE || stage === ExtractionStage.FAILED;
  }

  get stage(): ExtractionStage {
    return this.currentStage;
  }

  get history(): readonly ExtractionStage[] {
    return this.visited;
  }

  transition(to: ExtractionStage): void {
    ExtractionStateMachine.validateTransition(this.currentStage, to);
    this.currentStage = to;
    this.visited.push(to);
  }

  /**
   * Moves to FAILED unless the run already reached a terminal stage.
   */
  fail(): void {
    if (!ExtractionStateMachine.isTerminal(this.currentStage)) {
      this.transition(ExtractionStage.FAILED);
    }
  }
}

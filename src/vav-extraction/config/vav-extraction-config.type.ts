export type VavExtractionConfig = {
  neighborhoodRadiusPt: number;
  recoveryRadiusPt: number;
  cfmRange: {
    min: number;
    max: number;
  };
  boxIdPattern: string;
  inletSizePattern: string;
  minFieldCount: number;
  estimateInletFromCfm: boolean;
  maxPages: number;
};

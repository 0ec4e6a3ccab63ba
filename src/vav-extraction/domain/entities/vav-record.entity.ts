/**
 * A missing field counts as zero in the record confidence.
 */
export interface FieldConfidences {
  boxId: number;
  cfm: number;
  inletSize: number;
}

export interface VavRecord {
  boxId: string;
  cfm: number | null;
  inletSize: string | null;
  /** Lowest zero-based page the box was seen on */
  page: number;
  pages: number[];
  /** Mean of the three field confidences */
  confidence: number;
  fieldConfidences: FieldConfidences;
}

export function recordConfidence(confidences: FieldConfidences): number {
  return (confidences.boxId + confidences.cfm + confidences.inletSize) / 3;
}

export function isCompleteRecord(record: VavRecord): boolean {
  return record.boxId !== '' && record.cfm !== null && record.inletSize !== null;
}

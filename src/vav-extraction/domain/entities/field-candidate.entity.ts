import { CandidateSource } from '../enums/candidate-source.enum';
import { FieldKind } from '../enums/field-kind.enum';
import { Token } from './token.entity';

export interface FieldCandidate {
  readonly kind: FieldKind;
  readonly rawText: string;
  /** Box id and inlet size are strings, CFM is a number */
  readonly normalizedValue: string | number;
  readonly confidence: number;
  readonly sourceTokens: readonly Token[];
  readonly source: CandidateSource;
}

export function withConfidence(
  candidate: FieldCandidate,
  confidence: number,
  source: CandidateSource = candidate.source,
): FieldCandidate {
  return {
    ...candidate,
    confidence: Math.min(1, Math.max(0, confidence)),
    source,
  };
}

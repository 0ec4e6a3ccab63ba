import { Diagnostic } from '../entities/diagnostic.entity';
import { FieldCandidate } from '../entities/field-candidate.entity';
import { Neighborhood } from '../entities/neighborhood.entity';
import { ConcurrencyLimiter } from '../utils/concurrency-limiter.util';
import { ExtractionSettings } from '../utils/extraction-settings.util';

export interface ClassificationContext {
  settings: ExtractionSettings;
  signal?: AbortSignal;
  /** Shared by every classification of one run */
  limiter?: ConcurrencyLimiter;
}

export interface ClassificationOutcome {
  candidates: FieldCandidate[];
  diagnostics: Diagnostic[];
  languageModelCalled: boolean;
}

/**
 * Strategy seam between the pattern rules and the model-backed fallback.
 */
export interface FieldClassifierPort {
  classify(
    neighborhood: Neighborhood,
    context: ClassificationContext,
  ): Promise<ClassificationOutcome>;
}

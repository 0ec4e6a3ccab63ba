import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { Diagnostic } from '../entities/diagnostic.entity';
import {
  FieldCandidate,
  withConfidence,
} from '../entities/field-candidate.entity';
import {
  Neighborhood,
  neighborhoodText,
} from '../entities/neighborhood.entity';
import { CandidateSource } from '../enums/candidate-source.enum';
import { DiagnosticReason } from '../enums/diagnostic-reason.enum';
import { ExtractionStage } from '../enums/extraction-stage.enum';
import { FieldKind } from '../enums/field-kind.enum';
import { NeighborhoodKind } from '../enums/neighborhood-kind.enum';
import { ClassificationTimeoutError } from '../errors/extraction.errors';
import {
  ClassificationContext,
  ClassificationOutcome,
  FieldClassifierPort,
} from '../ports/field-classifier.port';
import {
  LanguageModelFieldGuess,
  LanguageModelPort,
} from '../ports/language-model.port';
import {
  ExtractionSettings,
  containsBoxId,
} from '../utils/extraction-settings.util';
import {
  normalizeBoxId,
  normalizeInletSize,
  parseNumber,
} from '../utils/field-patterns.util';
import { HeuristicFieldClassifierDomainService } from './heuristic-field-classifier.domain.service';

export const LANGUAGE_MODEL_CONFIDENCE_FACTOR = 0.8;

/**
 * FallbackFieldClassifierDomainService
 *
 * Runs the heuristic rules first. Seeded neighborhoods whose candidates cover
 * fewer than `minFieldCount` field kinds are sent to the language model, which
 * only fills kinds the rules missed or reinforces values they agree on.
 *
 * Model failures never escape: they leave the field unresolved and produce a
 * diagnostic.
 */
@Injectable()
export class FallbackFieldClassifierDomainService
  implements FieldClassifierPort
{
  private readonly logger = new Logger(
    FallbackFieldClassifierDomainService.name,
  );

  constructor(
    private readonly heuristics: HeuristicFieldClassifierDomainService,
    @Optional()
    @Inject('LanguageModelPort')
    private readonly languageModel?: LanguageModelPort,
  ) {}

  async classify(
    neighborhood: Neighborhood,
    context: ClassificationContext,
  ): Promise<ClassificationOutcome> {
    const { settings } = context;
    const heuristic = this.heuristics.extractCandidates(neighborhood, settings);

    if (!this.languageModel || !this.needsFallback(neighborhood, heuristic, settings)) {
      return { candidates: heuristic, diagnostics: [], languageModelCalled: false };
    }
    const languageModel = this.languageModel;

    const call = async (): Promise<ClassificationOutcome> => {
      // Cancelled while queued behind the limiter
      if (context.signal?.aborted) {
        return { candidates: heuristic, diagnostics: [], languageModelCalled: false };
      }

      try {
        const guess = await this.callWithTimeout(
          languageModel,
          neighborhoodText(neighborhood),
          settings.languageModel.timeoutMs,
          context.signal,
        );
        return {
          candidates: this.mergeGuess(heuristic, guess, neighborhood, settings),
          diagnostics: [],
          languageModelCalled: true,
        };
      } catch (error) {
        return {
          candidates: heuristic,
          diagnostics: [this.toDiagnostic(error, neighborhood, context.signal)],
          languageModelCalled: true,
        };
      }
    };

    return context.limiter ? context.limiter.run(call) : call();
  }

  needsFallback(
    neighborhood: Neighborhood,
    candidates: readonly FieldCandidate[],
    settings: ExtractionSettings,
  ): boolean {
    if (!settings.languageModel.enabled) {
      return false;
    }
    if (neighborhood.kind === NeighborhoodKind.UNASSIGNED) {
      return false;
    }
    const kinds = new Set(candidates.map((candidate) => candidate.kind));
    return kinds.size < settings.minFieldCount;
  }

  private async callWithTimeout(
    languageModel: LanguageModelPort,
    text: string,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<LanguageModelFieldGuess> {
    const controller = new AbortController();
    let rejectEarly: (error: Error) => void = () => undefined;
    const early = new Promise<never>((_, reject) => {
      rejectEarly = reject;
    });

    const timer = setTimeout(() => {
      const error = new ClassificationTimeoutError(timeoutMs);
      controller.abort(error);
      rejectEarly(error);
    }, timeoutMs);
    const onAbort = () => {
      controller.abort(signal?.reason);
      rejectEarly(new Error('Classification cancelled'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await Promise.race([
        languageModel.extractFields(text, { signal: controller.signal }),
        early,
      ]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private mergeGuess(
    heuristic: readonly FieldCandidate[],
    guess: LanguageModelFieldGuess,
    neighborhood: Neighborhood,
    settings: ExtractionSettings,
  ): FieldCandidate[] {
    const merged = [...heuristic];

    for (const candidate of this.toCandidates(guess, neighborhood, settings)) {
      const sameKind = merged.filter((c) => c.kind === candidate.kind);
      if (sameKind.length === 0) {
        merged.push(candidate);
        continue;
      }
      for (let i = 0; i < merged.length; i++) {
        const existing = merged[i];
        if (
          existing.kind === candidate.kind &&
          existing.normalizedValue === candidate.normalizedValue
        ) {
          merged[i] = withConfidence(
            existing,
            1 - (1 - existing.confidence) * (1 - candidate.confidence),
          );
        }
      }
    }

    this.logger.debug(
      `[LanguageModel] page=${neighborhood.page + 1} neighborhood=${neighborhood.index} heuristic=${heuristic.length} merged=${merged.length}`,
    );
    return merged;
  }

  private toCandidates(
    guess: LanguageModelFieldGuess,
    neighborhood: Neighborhood,
    settings: ExtractionSettings,
  ): FieldCandidate[] {
    const certainty = Number.isFinite(guess.certainty)
      ? Math.min(1, Math.max(0, guess.certainty))
      : 0;
    const confidence = certainty * LANGUAGE_MODEL_CONFIDENCE_FACTOR;
    const candidates: FieldCandidate[] = [];
    const push = (
      kind: FieldKind,
      rawText: string,
      normalizedValue: string | number,
    ) =>
      candidates.push({
        kind,
        rawText,
        normalizedValue,
        confidence,
        sourceTokens: neighborhood.tokens,
        source: CandidateSource.LANGUAGE_MODEL,
      });

    if (guess.boxId && containsBoxId(guess.boxId, settings)) {
      push(FieldKind.BOX_ID, guess.boxId, normalizeBoxId(guess.boxId));
    }

    if (guess.cfm !== null) {
      const cfm =
        typeof guess.cfm === 'number'
          ? guess.cfm
          : parseNumber(guess.cfm.replace(/\s*CFM\s*$/i, ''));
      if (cfm !== null && Number.isFinite(cfm) && cfm > 0) {
        push(FieldKind.CFM, String(guess.cfm), cfm);
      }
    }

    if (guess.inletSize) {
      const size = normalizeInletSize(guess.inletSize);
      if (size) {
        push(FieldKind.INLET_SIZE, guess.inletSize, size);
      }
    }

    return candidates;
  }

  private toDiagnostic(
    error: unknown,
    neighborhood: Neighborhood,
    signal?: AbortSignal,
  ): Diagnostic {
    const where = `page ${neighborhood.page + 1}, neighborhood ${neighborhood.index}`;

    if (error instanceof ClassificationTimeoutError) {
      this.logger.warn(`[LanguageModel] Timed out on ${where}`);
      return {
        stage: ExtractionStage.CLASSIFYING,
        reason: DiagnosticReason.CLASSIFICATION_TIMEOUT,
        message: `${error.message} (${where})`,
        page: neighborhood.page,
      };
    }

    if (signal?.aborted) {
      return {
        stage: ExtractionStage.CLASSIFYING,
        reason: DiagnosticReason.CANCELLED,
        message: `Language model call aborted by cancellation (${where})`,
        page: neighborhood.page,
      };
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.warn(`[LanguageModel] Call failed on ${where}: ${message}`);
    return {
      stage: ExtractionStage.CLASSIFYING,
      reason: DiagnosticReason.CLASSIFICATION_FAILED,
      message: `Language model call failed (${where}): ${message}`,
      page: neighborhood.page,
    };
  }
}

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { readFile } from 'fs/promises';
import { AllConfigType } from '../config/config.type';
import {
  Diagnostic,
  ExtractionResult,
} from './domain/entities/diagnostic.entity';
import { Neighborhood } from './domain/entities/neighborhood.entity';
import { Token } from './domain/entities/token.entity';
import { DiagnosticReason } from './domain/enums/diagnostic-reason.enum';
import { ExtractionStage } from './domain/enums/extraction-stage.enum';
import {
  DocumentReadError,
  EmptyPageError,
} from './domain/errors/extraction.errors';
import {
  ClassificationContext,
  ClassificationOutcome,
  FieldClassifierPort,
} from './domain/ports/field-classifier.port';
import {
  TokenDocument,
  TokenSourcePort,
} from './domain/ports/token-source.port';
import { ContextWindowBuilderDomainService } from './domain/services/context-window-builder.domain.service';
import {
  ClassifiedNeighborhood,
  RecordAssemblerDomainService,
} from './domain/services/record-assembler.domain.service';
import { RecordValidatorDomainService } from './domain/services/record-validator.domain.service';
import { ConcurrencyLimiter } from './domain/utils/concurrency-limiter.util';
import {
  ExtractionSettings,
  ExtractionSettingsOverrides,
  createExtractionSettings,
} from './domain/utils/extraction-settings.util';
import { ExtractionStateMachine } from './domain/utils/extraction-state-machine.util';
import { ExtractionResponseDto } from './dto/extraction-response.dto';

export interface ExtractOptions {
  /** Cancels the run; heuristic results are still returned */
  signal?: AbortSignal;
  /** Per-run overrides of the configured settings */
  settings?: ExtractionSettingsOverrides;
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

interface PageTokens {
  page: number;
  tokens: Token[];
  diagnostics: Diagnostic[];
}

interface PageClassification {
  classified: ClassifiedNeighborhood[];
  diagnostics: Diagnostic[];
  languageModelCalls: number;
}

/**
 * VavExtractionService
 *
 * Runs one extraction: PDF → tokens → neighborhoods → field candidates →
 * records → validated records. Stateless between runs.
 *
 * Only document-level errors (DocumentReadError) fail the run. Everything
 * that goes wrong on a page or neighborhood becomes a diagnostic.
 */
@Injectable()
export class VavExtractionService {
  private readonly logger = new Logger(VavExtractionService.name);

  constructor(
    @Inject('TokenSourcePort')
    private readonly tokenSource: TokenSourcePort,
    @Inject('FieldClassifierPort')
    private readonly fieldClassifier: FieldClassifierPort,
    private readonly contextWindowBuilder: ContextWindowBuilderDomainService,
    private readonly recordAssembler: RecordAssemblerDomainService,
    private readonly recordValidator: RecordValidatorDomainService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  async extract(
    input: Buffer | string,
    options: ExtractOptions = {},
  ): Promise<ExtractionResult> {
    const settings = createExtractionSettings(
      this.configService.getOrThrow('vavExtraction', { infer: true }),
      this.configService.getOrThrow('languageModel', { infer: true }),
      options.settings,
    );
    const { signal } = options;
    const machine = new ExtractionStateMachine();
    const startTime = Date.now();

    try {
      machine.transition(ExtractionStage.EXTRACTING_TOKENS);
      const document = await this.tokenSource.open(await this.readInput(input));
      const diagnostics: Diagnostic[] = [];

      const pageCount = Math.min(document.pageCount, settings.maxPages);
      if (document.pageCount > settings.maxPages) {
        diagnostics.push({
          stage: ExtractionStage.EXTRACTING_TOKENS,
          reason: DiagnosticReason.PAGE_LIMIT_EXCEEDED,
          message: `Document has ${document.pageCount} pages, only the first ${settings.maxPages} were read`,
        });
      }
      this.logger.log(
        `[Pipeline] Extraction started: pages=${document.pageCount} languageModel=${settings.languageModel.enabled}`,
      );

      const pages = await Promise.all(
        Array.from({ length: pageCount }, (_, page) =>
          this.readPage(document, page),
        ),
      );
      pages.forEach((page) => diagnostics.push(...page.diagnostics));

      machine.transition(ExtractionStage.BUILDING_NEIGHBORHOODS);
      const neighborhoodsByPage = pages.map((page) =>
        this.contextWindowBuilder.build(page.page, page.tokens, settings),
      );

      machine.transition(ExtractionStage.CLASSIFYING);
      const context: ClassificationContext = {
        settings,
        signal,
        limiter: new ConcurrencyLimiter(settings.languageModel.maxConcurrency),
      };
      const classifiedPages = await Promise.all(
        neighborhoodsByPage.map((neighborhoods) =>
          this.classifyPage(neighborhoods, context),
        ),
      );
      classifiedPages.forEach((page) => diagnostics.push(...page.diagnostics));
      // an abort after this point no longer affects the results
      const cancelled = signal?.aborted ?? false;
      if (cancelled) {
        diagnostics.push({
          stage: ExtractionStage.CLASSIFYING,
          reason: DiagnosticReason.CANCELLED,
          message:
            'Run cancelled, language model fallback skipped; results are heuristic only',
        });
      }

      machine.transition(ExtractionStage.ASSEMBLING);
      const assemblies = classifiedPages.map((page, index) =>
        this.recordAssembler.assemblePage(
          pages[index].page,
          page.classified,
          settings,
        ),
      );
      assemblies.forEach((assembly) => diagnostics.push(...assembly.diagnostics));
      const merged = this.recordAssembler.merge(assemblies);

      machine.transition(ExtractionStage.VALIDATING);
      const validation = this.recordValidator.validate(merged, settings);
      diagnostics.push(...validation.diagnostics);

      if (validation.records.length === 0 && diagnostics.length === 0) {
        diagnostics.push(this.noRecordsDiagnostic(document.pageCount, settings));
      }

      machine.transition(ExtractionStage.DONE);

      const languageModelCalls = classifiedPages.reduce(
        (sum, page) => sum + page.languageModelCalls,
        0,
      );
      this.logger.log(
        `[Pipeline] Extraction done: records=${validation.summary.recordCount} complete=${validation.summary.completeRecordCount} diagnostics=${diagnostics.length} languageModelCalls=${languageModelCalls} cancelled=${cancelled} duration=${Date.now() - startTime}ms`,
      );

      return {
        records: validation.records,
        diagnostics,
        summary: {
          pageCount: document.pageCount,
          ...validation.summary,
          languageModelCalls,
        },
        stage: machine.stage,
        cancelled,
      };
    } catch (error) {
      machine.fail();
      const message = error instanceof Error ? error.message : String(error);
      if (error instanceof DocumentReadError) {
        this.logger.error(`[Pipeline] Document unreadable: ${message}`);
      } else {
        this.logger.error(
          `[Pipeline] Extraction failed: ${message}`,
          error instanceof Error ? error.stack : undefined,
        );
      }
      throw error;
    }
  }

  /**
   * API shape: pages are 1-based, ratios rounded to three decimals.
   */
  toResponseDto(result: ExtractionResult): ExtractionResponseDto {
    return plainToInstance(
      ExtractionResponseDto,
      {
        records: result.records.map((record) => ({
          boxId: record.boxId,
          cfm: record.cfm,
          inletSize: record.inletSize,
          page: record.page + 1,
          pages: record.pages.map((page) => page + 1),
          confidence: round3(record.confidence),
        })),
        diagnostics: result.diagnostics.map((diagnostic) => ({
          stage: diagnostic.stage,
          reason: diagnostic.reason,
          message: diagnostic.message,
          page: diagnostic.page !== undefined ? diagnostic.page + 1 : undefined,
          boxId: diagnostic.recordAttempt?.boxId,
        })),
        summary: {
          ...result.summary,
          completeness: round3(result.summary.completeness),
          meanConfidence: round3(result.summary.meanConfidence),
        },
        cancelled: result.cancelled,
      },
      { excludeExtraneousValues: true },
    );
  }

  private async readInput(input: Buffer | string): Promise<Buffer> {
    if (typeof input !== 'string') {
      return input;
    }
    try {
      return await readFile(input);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DocumentReadError(`Cannot read ${input}: ${message}`, {
        cause: error,
      });
    }
  }

  private async readPage(
    document: TokenDocument,
    page: number,
  ): Promise<PageTokens> {
    try {
      return { page, tokens: [...document.tokens(page)], diagnostics: [] };
    } catch (error) {
      if (error instanceof EmptyPageError) {
        this.logger.debug(`[Pipeline] ${error.message}`);
        return {
          page,
          tokens: [],
          diagnostics: [
            {
              stage: ExtractionStage.EXTRACTING_TOKENS,
              reason: DiagnosticReason.EMPTY_PAGE,
              message: `${error.message} (image-only or blank page)`,
              page,
            },
          ],
        };
      }

      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`[Pipeline] Page ${page + 1} could not be read: ${message}`);
      return {
        page,
        tokens: [],
        diagnostics: [
          {
            stage: ExtractionStage.EXTRACTING_TOKENS,
            reason: DiagnosticReason.PAGE_READ_FAILED,
            message: `Page ${page + 1} could not be read: ${message}`,
            page,
          },
        ],
      };
    }
  }

  private async classifyPage(
    neighborhoods: readonly Neighborhood[],
    context: ClassificationContext,
  ): Promise<PageClassification> {
    const outcomes = await Promise.all(
      neighborhoods.map(async (neighborhood): Promise<ClassificationOutcome> => {
        try {
          return await this.fieldClassifier.classify(neighborhood, context);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.warn(
            `[Pipeline] Classification failed on page ${neighborhood.page + 1}, neighborhood ${neighborhood.index}: ${message}`,
          );
          return {
            candidates: [],
            diagnostics: [
              {
                stage: ExtractionStage.CLASSIFYING,
                reason: DiagnosticReason.CLASSIFICATION_FAILED,
                message,
                page: neighborhood.page,
              },
            ],
            languageModelCalled: false,
          };
        }
      }),
    );

    return {
      classified: neighborhoods.map((neighborhood, index) => ({
        neighborhood,
        candidates: outcomes[index].candidates,
      })),
      diagnostics: outcomes.flatMap((outcome) => outcome.diagnostics),
      languageModelCalls: outcomes.filter((outcome) => outcome.languageModelCalled)
        .length,
    };
  }

  private noRecordsDiagnostic(
    pageCount: number,
    settings: ExtractionSettings,
  ): Diagnostic {
    return {
      stage: ExtractionStage.VALIDATING,
      reason: DiagnosticReason.NO_RECORDS,
      message:
        pageCount === 0
          ? 'Document has no pages'
          : `No text matched the box id pattern ${settings.boxIdPattern.source}`,
    };
  }
}

import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { VavExtractionService } from './vav-extraction.service';
import { Token, createToken } from './domain/entities/token.entity';
import { DiagnosticReason } from './domain/enums/diagnostic-reason.enum';
import { ExtractionStage } from './domain/enums/extraction-stage.enum';
import {
  DocumentReadError,
  EmptyPageError,
} from './domain/errors/extraction.errors';
import { LanguageModelFieldGuess } from './domain/ports/language-model.port';
import {
  TokenDocument,
  TokenSourcePort,
} from './domain/ports/token-source.port';
import { ContextWindowBuilderDomainService } from './domain/services/context-window-builder.domain.service';
import { FallbackFieldClassifierDomainService } from './domain/services/fallback-field-classifier.domain.service';
import { HeuristicFieldClassifierDomainService } from './domain/services/heuristic-field-classifier.domain.service';
import { RecordAssemblerDomainService } from './domain/services/record-assembler.domain.service';
import { RecordValidatorDomainService } from './domain/services/record-validator.domain.service';
import {
  DEFAULT_LANGUAGE_MODEL_CONFIG,
  DEFAULT_VAV_EXTRACTION_CONFIG,
} from './domain/utils/extraction-settings.util';
import { DEFAULT_BOX_ID_PATTERN } from './domain/utils/field-patterns.util';

function token(text: string, x: number, y: number, page = 0): Token {
  return createToken(
    text,
    { x0: x, y0: y, x1: x + text.length * 5, y1: y + 10 },
    page,
    10,
  );
}

function documentOf(pages: Token[][]): TokenDocument {
  return {
    pageCount: pages.length,
    tokens(pageIndex: number): Iterable<Token> {
      if (pages[pageIndex].length === 0) {
        throw new EmptyPageError(pageIndex);
      }
      return [...pages[pageIndex]];
    },
  };
}

describe('VavExtractionService', () => {
  let service: VavExtractionService;
  let validator: RecordValidatorDomainService;
  let tokenSource: { open: jest.Mock<Promise<TokenDocument>, [Buffer]> };
  let languageModelConfig = DEFAULT_LANGUAGE_MODEL_CONFIG;
  let languageModel: {
    extractFields: jest.Mock<
      Promise<LanguageModelFieldGuess>,
      [string, { signal?: AbortSignal }?]
    >;
  };

  const PDF = Buffer.from('%PDF-1.7');

  const build = async (): Promise<void> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        VavExtractionService,
        ContextWindowBuilderDomainService,
        HeuristicFieldClassifierDomainService,
        FallbackFieldClassifierDomainService,
        RecordAssemblerDomainService,
        RecordValidatorDomainService,
        { provide: 'TokenSourcePort', useValue: tokenSource },
        {
          provide: 'FieldClassifierPort',
          useExisting: FallbackFieldClassifierDomainService,
        },
        { provide: 'LanguageModelPort', useValue: languageModel },
        {
          provide: ConfigService,
          useValue: {
            getOrThrow: jest.fn((key: string) =>
              key === 'vavExtraction'
                ? DEFAULT_VAV_EXTRACTION_CONFIG
                : languageModelConfig,
            ),
          },
        },
      ],
    }).compile();

    service = module.get<VavExtractionService>(VavExtractionService);
    validator = module.get<RecordValidatorDomainService>(
      RecordValidatorDomainService,
    );
  };

  beforeEach(async () => {
    tokenSource = { open: jest.fn() };
    languageModel = { extractFields: jest.fn() };
    languageModelConfig = DEFAULT_LANGUAGE_MODEL_CONFIG;
    await build();
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('extract', () => {
    it('should extract a record from a callout', async () => {
      tokenSource.open.mockResolvedValue(
        documentOf([[token('VAV-1 350 CFM 10x8', 100, 100)]]),
      );

      const result = await service.extract(PDF);

      expect(tokenSource.open).toHaveBeenCalledWith(PDF);
      expect(result.stage).toBe(ExtractionStage.DONE);
      expect(result.cancelled).toBe(false);
      expect(result.diagnostics).toEqual([]);
      expect(result.records).toHaveLength(1);
      expect(result.records[0]).toMatchObject({
        boxId: 'VAV-1',
        cfm: 350,
        inletSize: '10x8',
        page: 0,
        pages: [0],
      });
      expect(result.records[0].confidence).toBeCloseTo(2.8 / 3);
      expect(result.summary).toMatchObject({
        pageCount: 1,
        recordCount: 1,
        completeRecordCount: 1,
        completeness: 1,
        languageModelCalls: 0,
      });
      expect(languageModel.extractFields).not.toHaveBeenCalled();
    });

    it('should read schedule rows by their column headers', async () => {
      tokenSource.open.mockResolvedValue(
        documentOf([
          [
            token('TAG', 100, 100),
            token('MAX CFM', 200, 100),
            token('INLET SIZE', 300, 100),
            token('VAVB5-01', 100, 120),
            token('750', 200, 120),
            token('10', 300, 120),
          ],
        ]),
      );

      const result = await service.extract(PDF);

      expect(result.records).toHaveLength(1);
      expect(result.records[0]).toMatchObject({
        boxId: 'VAVB5-01',
        cfm: 750,
        inletSize: '10"',
      });
      expect(result.records[0].confidence).toBeCloseTo((0.95 + 0.85 + 0.8) / 3);
    });

    it('should recover a stray airflow into the nearest box lacking one', async () => {
      tokenSource.open.mockResolvedValue(
        documentOf([
          [
            token('VAV-1', 100, 100),
            token('10x8', 140, 100),
            token('900 CFM', 100, 200),
          ],
        ]),
      );

      const result = await service.extract(PDF);

      expect(result.records[0]).toMatchObject({
        boxId: 'VAV-1',
        cfm: 900,
        inletSize: '10x8',
      });
      expect(result.records[0].fieldConfidences.cfm).toBeCloseTo(0.57);
      expect(result.diagnostics).toEqual([]);
    });

    it('should keep a plausible airflow over an out-of-range one', async () => {
      tokenSource.open.mockResolvedValue(
        documentOf([
          [token('VAV-1', 100, 100), token('30000 CFM', 100, 115)],
          [token('VAV-1', 100, 100, 1), token('350 CFM', 100, 115, 1)],
        ]),
      );

      const result = await service.extract(PDF);

      expect(result.records).toHaveLength(1);
      expect(result.records[0]).toMatchObject({
        boxId: 'VAV-1',
        cfm: 350,
        pages: [0, 1],
      });
      expect(result.diagnostics).toEqual([
        {
          stage: ExtractionStage.ASSEMBLING,
          reason: DiagnosticReason.FIELD_REJECTED,
          message: 'VAV-1: CFM 30000 outside 25-20000',
          page: 0,
        },
      ]);
    });

    it('should keep every box named in one callout', async () => {
      tokenSource.open.mockResolvedValue(
        documentOf([[token('VAV-1, VAV-2', 100, 100), token('350 CFM', 200, 100)]]),
      );

      const result = await service.extract(PDF);

      expect(
        result.records.map((record) => [record.boxId, record.cfm]),
      ).toEqual([
        ['VAV-1', null],
        ['VAV-2', 350],
      ]);
      expect(result.diagnostics).toEqual([]);
    });

    it('should report empty pages and keep going', async () => {
      tokenSource.open.mockResolvedValue(
        documentOf([[token('VAV-1 350 CFM 10x8', 100, 100)], []]),
      );

      const result = await service.extract(PDF);

      expect(result.records).toHaveLength(1);
      expect(result.diagnostics).toEqual([
        {
          stage: ExtractionStage.EXTRACTING_TOKENS,
          reason: DiagnosticReason.EMPTY_PAGE,
          message: 'Page 2 has no embedded text (image-only or blank page)',
          page: 1,
        },
      ]);
      expect(result.summary.pageCount).toBe(2);
    });

    it('should only read up to the page limit', async () => {
      tokenSource.open.mockResolvedValue(
        documentOf([[token('VAV-1 350 CFM 10x8', 100, 100)], []]),
      );

      const result = await service.extract(PDF, { settings: { maxPages: 1 } });

      expect(result.diagnostics).toEqual([
        {
          stage: ExtractionStage.EXTRACTING_TOKENS,
          reason: DiagnosticReason.PAGE_LIMIT_EXCEEDED,
          message: 'Document has 2 pages, only the first 1 were read',
        },
      ]);
    });

    it('should explain an empty result', async () => {
      tokenSource.open.mockResolvedValue(
        documentOf([[token('GENERAL NOTES', 100, 100)]]),
      );

      const result = await service.extract(PDF);

      expect(result.records).toEqual([]);
      expect(result.diagnostics).toEqual([
        {
          stage: ExtractionStage.VALIDATING,
          reason: DiagnosticReason.NO_RECORDS,
          message: `No text matched the box id pattern ${DEFAULT_BOX_ID_PATTERN}`,
        },
      ]);
      expect(result.summary.completeness).toBe(0);
    });

    it('should fail the run when the document cannot be read', async () => {
      tokenSource.open.mockRejectedValue(
        new DocumentReadError('Document is encrypted'),
      );

      await expect(service.extract(PDF)).rejects.toThrow(
        new DocumentReadError('Document is encrypted'),
      );
    });

    it('should turn a classifier failure into a diagnostic', async () => {
      tokenSource.open.mockResolvedValue(
        documentOf([[token('VAV-1 350 CFM 10x8', 100, 100)]]),
      );
      const spy = jest
        .spyOn(HeuristicFieldClassifierDomainService.prototype, 'extractCandidates')
        .mockImplementationOnce(() => {
          throw new Error('rule table corrupt');
        });

      const result = await service.extract(PDF);

      expect(result.stage).toBe(ExtractionStage.DONE);
      expect(result.records).toEqual([]);
      expect(result.diagnostics[0]).toEqual({
        stage: ExtractionStage.CLASSIFYING,
        reason: DiagnosticReason.CLASSIFICATION_FAILED,
        message: 'rule table corrupt',
        page: 0,
      });
      // the neighborhood still yields a draft, which has no box id
      expect(result.diagnostics[1].message).toBe(
        'Record on page 1 has no box id',
      );
      spy.mockRestore();
    });

    it('should return heuristic results when cancelled', async () => {
      languageModelConfig = { ...DEFAULT_LANGUAGE_MODEL_CONFIG, enabled: true };
      await build();
      tokenSource.open.mockResolvedValue(
        documentOf([[token('VAV-2', 100, 100)]]),
      );
      const controller = new AbortController();
      controller.abort();

      const result = await service.extract(PDF, { signal: controller.signal });

      expect(result.cancelled).toBe(true);
      expect(result.stage).toBe(ExtractionStage.DONE);
      expect(result.records.map((record) => record.boxId)).toEqual(['VAV-2']);
      expect(result.diagnostics.map((d) => d.reason)).toEqual([
        DiagnosticReason.CANCELLED,
      ]);
      expect(languageModel.extractFields).not.toHaveBeenCalled();
    });

    it('should ignore an abort that arrives after classification', async () => {
      tokenSource.open.mockResolvedValue(
        documentOf([[token('VAV-2', 100, 100)]]),
      );
      const controller = new AbortController();
      const validate = validator.validate.bind(validator);
      jest
        .spyOn(validator, 'validate')
        .mockImplementationOnce((records, settings) => {
          controller.abort();
          return validate(records, settings);
        });

      const result = await service.extract(PDF, { signal: controller.signal });

      expect(controller.signal.aborted).toBe(true);
      expect(result.cancelled).toBe(false);
      expect(result.diagnostics).toEqual([]);
      expect(result.records.map((record) => record.boxId)).toEqual(['VAV-2']);
    });

    it('should fill missing fields from the language model', async () => {
      languageModelConfig = { ...DEFAULT_LANGUAGE_MODEL_CONFIG, enabled: true };
      await build();
      tokenSource.open.mockResolvedValue(
        documentOf([[token('VAV-2', 100, 100)]]),
      );
      languageModel.extractFields.mockResolvedValue({
        boxId: 'VAV-2',
        cfm: '400 CFM',
        inletSize: '8"',
        certainty: 1,
      });

      const result = await service.extract(PDF);

      expect(languageModel.extractFields).toHaveBeenCalledTimes(1);
      expect(result.summary.languageModelCalls).toBe(1);
      expect(result.records[0]).toMatchObject({
        boxId: 'VAV-2',
        cfm: 400,
        inletSize: '8"',
      });
      expect(result.records[0].confidence).toBeCloseTo((0.99 + 0.8 + 0.8) / 3);
    });

    it('should skip the language model when a run opts out', async () => {
      languageModelConfig = { ...DEFAULT_LANGUAGE_MODEL_CONFIG, enabled: true };
      await build();
      tokenSource.open.mockResolvedValue(
        documentOf([[token('VAV-2', 100, 100)]]),
      );

      const result = await service.extract(PDF, {
        settings: { useLanguageModel: false },
      });

      expect(languageModel.extractFields).not.toHaveBeenCalled();
      expect(result.records[0]).toMatchObject({ cfm: null, inletSize: null });
    });

    describe('file paths', () => {
      let dir: string;

      beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'vav-extraction-'));
      });

      afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
      });

      it('should read the document from a path', async () => {
        const path = join(dir, 'M-101.pdf');
        await writeFile(path, PDF);
        tokenSource.open.mockResolvedValue(documentOf([[token('VAV-1', 0, 0)]]));

        await service.extract(path);

        expect(tokenSource.open).toHaveBeenCalledWith(PDF);
      });

      it('should reject a path that does not exist', async () => {
        await expect(
          service.extract(join(dir, 'missing.pdf')),
        ).rejects.toThrow(DocumentReadError);
        expect(tokenSource.open).not.toHaveBeenCalled();
      });
    });
  });

  describe('toResponseDto', () => {
    it('should use one-based pages and rounded ratios', async () => {
      tokenSource.open.mockResolvedValue(
        documentOf([[], [token('VAV-1 350 CFM 10x8', 100, 100, 1)]]),
      );

      const dto = service.toResponseDto(await service.extract(PDF));

      expect(dto.records).toEqual([
        {
          boxId: 'VAV-1',
          cfm: 350,
          inletSize: '10x8',
          page: 2,
          pages: [2],
          confidence: 0.933,
        },
      ]);
      expect(dto.diagnostics).toEqual([
        {
          stage: ExtractionStage.EXTRACTING_TOKENS,
          reason: DiagnosticReason.EMPTY_PAGE,
          message: 'Page 1 has no embedded text (image-only or blank page)',
          page: 1,
          boxId: undefined,
        },
      ]);
      expect(dto.summary).toEqual({
        pageCount: 2,
        recordCount: 1,
        completeRecordCount: 1,
        completeness: 1,
        meanConfidence: 0.933,
        languageModelCalls: 0,
      });
      expect(dto.cancelled).toBe(false);
    });
  });
});

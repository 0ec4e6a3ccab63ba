import { Test, TestingModule } from '@nestjs/testing';
import { FieldCandidate } from '../entities/field-candidate.entity';
import { BoundingBox, createToken } from '../entities/token.entity';
import { CandidateSource } from '../enums/candidate-source.enum';
import { DiagnosticReason } from '../enums/diagnostic-reason.enum';
import { FieldKind } from '../enums/field-kind.enum';
import { NeighborhoodKind } from '../enums/neighborhood-kind.enum';
import {
  DEFAULT_LANGUAGE_MODEL_CONFIG,
  DEFAULT_VAV_EXTRACTION_CONFIG,
  createExtractionSettings,
} from '../utils/extraction-settings.util';
import {
  ClassifiedNeighborhood,
  DraftRecord,
  PageAssembly,
  RecordAssemblerDomainService,
  estimateInletSize,
} from './record-assembler.domain.service';

function candidate(
  kind: FieldKind,
  value: string | number,
  confidence: number,
  at: BoundingBox = { x0: 0, y0: 0, x1: 10, y1: 10 },
): FieldCandidate {
  return {
    kind,
    rawText: String(value),
    normalizedValue: value,
    confidence,
    sourceTokens: [createToken(String(value), at, 0, 10)],
    source: CandidateSource.HEURISTIC,
  };
}

function classified(
  kind: NeighborhoodKind,
  index: number,
  anchorBbox: BoundingBox,
  candidates: FieldCandidate[],
): ClassifiedNeighborhood {
  return {
    neighborhood: { kind, page: 0, index, tokens: [], anchorBbox },
    candidates,
  };
}

function draft(overrides: Partial<DraftRecord>): DraftRecord {
  return {
    boxId: 'VAV-1',
    cfm: null,
    inletSize: null,
    page: 0,
    neighborhoodIndex: 0,
    anchorBbox: { x0: 0, y0: 0, x1: 10, y1: 10 },
    confidences: { boxId: 0.95, cfm: 0, inletSize: 0 },
    sources: {},
    ...overrides,
  };
}

const assembly = (page: number, drafts: DraftRecord[]): PageAssembly => ({
  page,
  drafts,
  diagnostics: [],
});

describe('RecordAssemblerDomainService', () => {
  let assembler: RecordAssemblerDomainService;
  const settings = createExtractionSettings();

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [RecordAssemblerDomainService],
    }).compile();

    assembler = module.get<RecordAssemblerDomainService>(
      RecordAssemblerDomainService,
    );
  });

  describe('assemblePage', () => {
    const page = [
      classified(NeighborhoodKind.CALLOUT, 0, { x0: 0, y0: 0, x1: 40, y1: 40 }, [
        candidate(FieldKind.BOX_ID, 'VAV-1', 0.95),
        candidate(FieldKind.CFM, 400, 0.4),
        candidate(FieldKind.CFM, 350, 0.95),
      ]),
      classified(NeighborhoodKind.CALLOUT, 1, { x0: 300, y0: 0, x1: 340, y1: 40 }, [
        candidate(FieldKind.BOX_ID, 'VAV-2', 0.95),
      ]),
      classified(NeighborhoodKind.UNASSIGNED, 2, { x0: 0, y0: 0, x1: 1100, y1: 1100 }, [
        candidate(FieldKind.INLET_SIZE, '8"', 0.85, { x0: 300, y0: 60, x1: 320, y1: 70 }),
        candidate(FieldKind.CFM, 999, 0.4, { x0: 1000, y0: 1000, x1: 1030, y1: 1010 }),
        candidate(FieldKind.BOX_ID, 'VAV-9', 0.75),
      ]),
    ];

    it('should pick the most confident candidate per field', () => {
      const { drafts } = assembler.assemblePage(0, page, settings);

      expect(drafts.map((d) => [d.boxId, d.cfm])).toEqual([
        ['VAV-1', 350],
        ['VAV-2', null],
      ]);
      expect(drafts[0].confidences).toEqual({ boxId: 0.95, cfm: 0.95, inletSize: 0 });
    });

    it('should keep the first candidate on an exact tie', () => {
      const { drafts } = assembler.assemblePage(
        0,
        [
          classified(NeighborhoodKind.CALLOUT, 0, { x0: 0, y0: 0, x1: 40, y1: 40 }, [
            candidate(FieldKind.BOX_ID, 'VAV-1', 0.95),
            candidate(FieldKind.CFM, 300, 0.4),
            candidate(FieldKind.CFM, 500, 0.4),
          ]),
        ],
        settings,
      );

      expect(drafts[0].cfm).toBe(300);
    });

    it('should reject implausible values before they compete', () => {
      const { drafts, diagnostics } = assembler.assemblePage(
        0,
        [
          classified(NeighborhoodKind.CALLOUT, 0, { x0: 0, y0: 0, x1: 40, y1: 40 }, [
            candidate(FieldKind.BOX_ID, 'VAV-1', 0.95),
            candidate(FieldKind.CFM, 30000, 0.95),
            candidate(FieldKind.CFM, 350, 0.4),
            candidate(FieldKind.INLET_SIZE, '100x8', 0.9),
          ]),
          classified(NeighborhoodKind.UNASSIGNED, 1, { x0: 0, y0: 0, x1: 60, y1: 60 }, [
            candidate(FieldKind.INLET_SIZE, '10x8', 0.9, { x0: 50, y0: 50, x1: 60, y1: 60 }),
            candidate(FieldKind.CFM, 5, 0.4, { x0: 50, y0: 50, x1: 60, y1: 60 }),
          ]),
        ],
        settings,
      );

      expect(drafts[0].cfm).toBe(350);
      expect(drafts[0].confidences.cfm).toBe(0.4);
      expect(drafts[0].inletSize).toBe('10x8');
      expect(drafts[0].sources[FieldKind.INLET_SIZE]).toBe(
        CandidateSource.RECOVERED,
      );
      expect(diagnostics).toEqual([
        {
          stage: 'ASSEMBLING',
          reason: DiagnosticReason.FIELD_REJECTED,
          message: 'VAV-1: CFM 30000 outside 25-20000',
          page: 0,
        },
        {
          stage: 'ASSEMBLING',
          reason: DiagnosticReason.FIELD_REJECTED,
          message: 'VAV-1: unrecognized inlet size "100x8"',
          page: 0,
        },
        {
          stage: 'ASSEMBLING',
          reason: DiagnosticReason.FIELD_REJECTED,
          message: 'Unassigned value: CFM 5 outside 25-20000',
          page: 0,
        },
      ]);
    });

    it('should attach nearby unassigned values at reduced confidence', () => {
      const { drafts } = assembler.assemblePage(0, page, settings);

      expect(drafts[1].inletSize).toBe('8"');
      expect(drafts[1].confidences.inletSize).toBeCloseTo(0.51, 10);
      expect(drafts[1].sources[FieldKind.INLET_SIZE]).toBe(
        CandidateSource.RECOVERED,
      );
      expect(drafts[0].inletSize).toBeNull();
    });

    it('should report values no box could take', () => {
      const { diagnostics } = assembler.assemblePage(0, page, settings);

      expect(diagnostics).toEqual([
        {
          stage: 'ASSEMBLING',
          reason: DiagnosticReason.UNASSIGNED_DISCARDED,
          message: 'Discarded 1 value(s) not near any box: 999',
          page: 0,
        },
      ]);
    });

    it('should estimate missing inlet sizes only when asked', () => {
      const estimating = createExtractionSettings(
        DEFAULT_VAV_EXTRACTION_CONFIG,
        DEFAULT_LANGUAGE_MODEL_CONFIG,
        { estimateInletFromCfm: true },
      );

      expect(assembler.assemblePage(0, page, settings).drafts[0].inletSize).toBeNull();

      const [estimated] = assembler.assemblePage(0, page, estimating).drafts;
      expect(estimated.inletSize).toBe('8"');
      expect(estimated.confidences.inletSize).toBe(0.3);
      expect(estimated.sources[FieldKind.INLET_SIZE]).toBe(CandidateSource.ESTIMATED);
    });
  });

  describe('estimateInletSize', () => {
    it('should map airflow to a round inlet', () => {
      expect(estimateInletSize(200)).toBe('6"');
      expect(estimateInletSize(201)).toBe('8"');
      expect(estimateInletSize(700)).toBe('10"');
      expect(estimateInletSize(2500)).toBe('12"');
      expect(estimateInletSize(0)).toBeNull();
    });
  });

  describe('merge', () => {
    const first = assembly(0, [
      draft({
        boxId: 'VAV-1',
        cfm: 350,
        confidences: { boxId: 0.95, cfm: 0.95, inletSize: 0 },
      }),
      draft({ boxId: 'VAV-10', neighborhoodIndex: 1 }),
    ]);
    const second = assembly(1, [
      draft({
        boxId: 'vav 1',
        page: 1,
        cfm: 360,
        inletSize: '10"',
        confidences: { boxId: 0.75, cfm: 0.4, inletSize: 0.85 },
      }),
      draft({ boxId: 'VAV-2', page: 1, neighborhoodIndex: 1 }),
    ]);

    it('should merge one record per box id across pages', () => {
      const [vav1] = assembler.merge([first, second]);

      expect(vav1.boxId).toBe('VAV-1');
      expect(vav1.cfm).toBe(350);
      expect(vav1.inletSize).toBe('10"');
      expect(vav1.page).toBe(0);
      expect(vav1.pages).toEqual([0, 1]);
      expect(vav1.fieldConfidences).toEqual({ boxId: 0.95, cfm: 0.95, inletSize: 0.85 });
      expect(vav1.confidence).toBeCloseTo(2.75 / 3, 10);
    });

    it('should sort records in natural box id order', () => {
      expect(assembler.merge([first, second]).map((r) => r.boxId)).toEqual([
        'VAV-1',
        'VAV-2',
        'VAV-10',
      ]);
    });

    it('should not depend on the order pages arrive in', () => {
      expect(assembler.merge([second, first])).toEqual(
        assembler.merge([first, second]),
      );
    });

    it('should keep drafts without a box id apart', () => {
      const records = assembler.merge([
        assembly(0, [draft({ boxId: '', cfm: 300 }), draft({ boxId: '', cfm: 500 })]),
      ]);

      expect(records.map((r) => [r.boxId, r.cfm])).toEqual([
        ['', 300],
        ['', 500],
      ]);
    });
  });
});

import { Test, TestingModule } from '@nestjs/testing';
import { VavRecord } from '../entities/vav-record.entity';
import { DiagnosticReason } from '../enums/diagnostic-reason.enum';
import { createExtractionSettings } from '../utils/extraction-settings.util';
import { RecordValidatorDomainService } from './record-validator.domain.service';

function record(overrides: Partial<VavRecord>): VavRecord {
  return {
    boxId: 'VAV-1',
    cfm: 350,
    inletSize: '8"',
    page: 0,
    pages: [0],
    confidence: 0.9,
    fieldConfidences: { boxId: 0.9, cfm: 0.9, inletSize: 0.9 },
    ...overrides,
  };
}

describe('RecordValidatorDomainService', () => {
  let validator: RecordValidatorDomainService;
  const settings = createExtractionSettings();

  const oversized = record({ boxId: 'VAV-2', cfm: 50000, inletSize: '10x8' });
  const records = [
    record({}),
    oversized,
    record({ boxId: 'VAV-3', cfm: 400, inletSize: '100x8' }),
    record({ boxId: '', page: 2, pages: [2] }),
    record({ cfm: 500 }),
  ];

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [RecordValidatorDomainService],
    }).compile();

    validator = module.get<RecordValidatorDomainService>(
      RecordValidatorDomainService,
    );
  });

  it('should exclude records without a box id and duplicates', () => {
    const outcome = validator.validate(records, settings);

    expect(outcome.records.map((r) => r.boxId)).toEqual([
      'VAV-1',
      'VAV-2',
      'VAV-3',
    ]);
    expect(
      outcome.diagnostics
        .filter((d) => d.reason === DiagnosticReason.VALIDATION_FAILURE)
        .map((d) => [d.message, d.recordAttempt?.cfm]),
    ).toEqual([
      ['Record on page 3 has no box id', 350],
      ['Duplicate box id VAV-1', 500],
    ]);
  });

  it('should clear implausible fields and keep the record', () => {
    const outcome = validator.validate(records, settings);
    const [, vav2, vav3] = outcome.records;

    expect(vav2.cfm).toBeNull();
    expect(vav2.fieldConfidences.cfm).toBe(0);
    expect(vav2.confidence).toBeCloseTo(0.6, 10);
    expect(vav3.inletSize).toBeNull();
    expect(
      outcome.diagnostics
        .filter((d) => d.reason === DiagnosticReason.FIELD_REJECTED)
        .map((d) => d.message),
    ).toEqual([
      'VAV-2: CFM 50000 outside 25-20000',
      'VAV-3: unrecognized inlet size "100x8"',
    ]);
  });

  it('should not modify its input', () => {
    validator.validate(records, settings);

    expect(oversized.cfm).toBe(50000);
    expect(oversized.fieldConfidences.cfm).toBe(0.9);
  });

  it('should summarize the accepted records', () => {
    const { summary } = validator.validate(records, settings);

    expect(summary.recordCount).toBe(3);
    expect(summary.completeRecordCount).toBe(1);
    expect(summary.completeness).toBeCloseTo(1 / 3, 10);
    expect(summary.meanConfidence).toBeCloseTo(0.7, 10);
  });

  it('should summarize an empty set as zeros', () => {
    expect(validator.summarize([])).toEqual({
      recordCount: 0,
      completeRecordCount: 0,
      completeness: 0,
      meanConfidence: 0,
    });
  });
});

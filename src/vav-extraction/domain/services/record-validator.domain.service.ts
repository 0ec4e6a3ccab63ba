import { Injectable, Logger } from '@nestjs/common';
import { Diagnostic } from '../entities/diagnostic.entity';
import {
  VavRecord,
  isCompleteRecord,
  recordConfidence,
} from '../entities/vav-record.entity';
import { DiagnosticReason } from '../enums/diagnostic-reason.enum';
import { ExtractionStage } from '../enums/extraction-stage.enum';
import { ValidationFailure } from '../errors/extraction.errors';
import {
  ExtractionSettings,
  isPlausibleCfm,
} from '../utils/extraction-settings.util';

export interface RecordSetSummary {
  recordCount: number;
  completeRecordCount: number;
  completeness: number;
  meanConfidence: number;
}

export interface ValidationOutcome {
  records: VavRecord[];
  diagnostics: Diagnostic[];
  summary: RecordSetSummary;
}

/**
 * RecordValidatorDomainService
 *
 * Structural failures (empty or duplicate box id) exclude the record.
 * Field failures (implausible CFM, unrecognized inlet size) clear the field
 * and keep the record. Both are reported as diagnostics.
 */
@Injectable()
export class RecordValidatorDomainService {
  private readonly logger = new Logger(RecordValidatorDomainService.name);

  validate(
    records: readonly VavRecord[],
    settings: ExtractionSettings,
  ): ValidationOutcome {
    const accepted: VavRecord[] = [];
    const diagnostics: Diagnostic[] = [];
    const seen = new Set<string>();

    for (const record of records) {
      const failure = this.structuralFailure(record, seen);
      if (failure) {
        this.logger.warn(`[Validator] ${failure.message}`);
        diagnostics.push({
          stage: ExtractionStage.VALIDATING,
          reason: DiagnosticReason.VALIDATION_FAILURE,
          message: failure.message,
          page: record.page,
          recordAttempt: record,
        });
        continue;
      }
      seen.add(record.boxId);

      const checked: VavRecord = {
        ...record,
        pages: [...record.pages],
        fieldConfidences: { ...record.fieldConfidences },
      };

      if (checked.cfm !== null && !isPlausibleCfm(checked.cfm, settings)) {
        diagnostics.push({
          stage: ExtractionStage.VALIDATING,
          reason: DiagnosticReason.FIELD_REJECTED,
          message: `${checked.boxId}: CFM ${checked.cfm} outside ${settings.cfmRange.min}-${settings.cfmRange.max}`,
          page: checked.page,
          recordAttempt: record,
        });
        checked.cfm = null;
        checked.fieldConfidences.cfm = 0;
      }

      if (
        checked.inletSize !== null &&
        !settings.inletSizePattern.test(checked.inletSize)
      ) {
        diagnostics.push({
          stage: ExtractionStage.VALIDATING,
          reason: DiagnosticReason.FIELD_REJECTED,
          message: `${checked.boxId}: unrecognized inlet size "${checked.inletSize}"`,
          page: checked.page,
          recordAttempt: record,
        });
        checked.inletSize = null;
        checked.fieldConfidences.inletSize = 0;
      }

      checked.confidence = recordConfidence(checked.fieldConfidences);
      accepted.push(checked);
    }

    return {
      records: accepted,
      diagnostics,
      summary: this.summarize(accepted),
    };
  }

  summarize(records: readonly VavRecord[]): RecordSetSummary {
    const recordCount = records.length;
    const completeRecordCount = records.filter(isCompleteRecord).length;
    const totalConfidence = records.reduce(
      (sum, record) => sum + record.confidence,
      0,
    );

    return {
      recordCount,
      completeRecordCount,
      completeness: recordCount > 0 ? completeRecordCount / recordCount : 0,
      meanConfidence: recordCount > 0 ? totalConfidence / recordCount : 0,
    };
  }

  private structuralFailure(
    record: VavRecord,
    seen: ReadonlySet<string>,
  ): ValidationFailure | null {
    if (record.boxId.trim() === '') {
      return new ValidationFailure(
        `Record on page ${record.page + 1} has no box id`,
        record.boxId,
      );
    }
    if (seen.has(record.boxId)) {
      return new ValidationFailure(
        `Duplicate box id ${record.boxId}`,
        record.boxId,
      );
    }
    return null;
  }
}

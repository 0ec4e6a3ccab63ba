import { DiagnosticReason } from '../enums/diagnostic-reason.enum';
import { ExtractionStage } from '../enums/extraction-stage.enum';
import { VavRecord } from './vav-record.entity';

export interface Diagnostic {
  stage: ExtractionStage;
  reason: DiagnosticReason;
  message: string;
  page?: number;
  recordAttempt?: VavRecord;
}

export interface ExtractionSummary {
  pageCount: number;
  recordCount: number;
  completeRecordCount: number;
  /** Fraction of records with all three fields, 0 when there are none */
  completeness: number;
  meanConfidence: number;
  languageModelCalls: number;
}

export interface ExtractionResult {
  records: VavRecord[];
  diagnostics: Diagnostic[];
  summary: ExtractionSummary;
  stage: ExtractionStage;
  cancelled: boolean;
}

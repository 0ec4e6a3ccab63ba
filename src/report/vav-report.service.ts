import { Injectable, Logger } from '@nestjs/common';
import { Workbook, Worksheet } from 'exceljs';
import { ExtractionResult } from '../vav-extraction/domain/entities/diagnostic.entity';

export interface ReportMeta {
  sourceFileName?: string;
  generatedAt?: Date;
}

export const SUMMARY_SHEET = 'VAV Summary';
export const DIAGNOSTICS_SHEET = 'Diagnostics';
export const XLSX_MIME_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

/**
 * Prefixes text a spreadsheet would evaluate as a formula.
 */
export function sanitizeCell(value: string): string {
  return /^[=\-+@]/.test(value) ? `'${value}` : value;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function styleHeader(sheet: Worksheet): void {
  const header = sheet.getRow(1);
  header.font = { bold: true };
  header.fill = {
    type: 'pattern',
    pattern: 'solid',
    fgColor: { argb: 'FFD9E1F2' },
  };
  sheet.views = [{ state: 'frozen', ySplit: 1 }];
}

/**
 * Builds the takeoff workbook: one row per VAV box plus the run diagnostics.
 */
@Injectable()
export class VavReportService {
  private readonly logger = new Logger(VavReportService.name);

  async generateWorkbook(
    result: ExtractionResult,
    meta: ReportMeta = {},
  ): Promise<Buffer> {
    const workbook = new Workbook();
    workbook.creator = 'VAV Takeoff';
    workbook.created = meta.generatedAt ?? new Date();
    if (meta.sourceFileName) {
      workbook.title = sanitizeCell(meta.sourceFileName);
    }

    const summary = workbook.addWorksheet(SUMMARY_SHEET);
    summary.columns = [
      { header: 'Box ID', key: 'boxId', width: 16 },
      { header: 'CFM', key: 'cfm', width: 10 },
      { header: 'Inlet Size', key: 'inletSize', width: 12 },
      { header: 'Page', key: 'page', width: 8 },
      { header: 'Confidence', key: 'confidence', width: 12 },
    ];
    for (const record of result.records) {
      summary.addRow({
        boxId: sanitizeCell(record.boxId),
        cfm: record.cfm,
        inletSize: record.inletSize === null ? null : sanitizeCell(record.inletSize),
        page: record.page + 1,
        confidence: round2(record.confidence),
      });
    }
    summary.getColumn('confidence').numFmt = '0.00';
    styleHeader(summary);

    const diagnostics = workbook.addWorksheet(DIAGNOSTICS_SHEET);
    diagnostics.columns = [
      { header: 'Stage', key: 'stage', width: 24 },
      { header: 'Reason', key: 'reason', width: 24 },
      { header: 'Page', key: 'page', width: 8 },
      { header: 'Message', key: 'message', width: 80 },
    ];
    for (const diagnostic of result.diagnostics) {
      diagnostics.addRow({
        stage: diagnostic.stage,
        reason: diagnostic.reason,
        page: diagnostic.page === undefined ? null : diagnostic.page + 1,
        message: sanitizeCell(diagnostic.message),
      });
    }
    styleHeader(diagnostics);

    const data = await workbook.xlsx.writeBuffer();
    this.logger.log(
      `[Report] Workbook generated: records=${result.records.length} diagnostics=${result.diagnostics.length} bytes=${data.byteLength}`,
    );
    return Buffer.from(data);
  }
}

/**
 * `plan.pdf` → `plan-vav-takeoff.xlsx`
 */
export function reportFileName(originalName?: string): string {
  const base = (originalName ?? '')
    .replace(/\.pdf$/i, '')
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return `${base || 'document'}-vav-takeoff.xlsx`;
}

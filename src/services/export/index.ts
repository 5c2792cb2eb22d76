import fs from 'fs';
import path from 'path';
import type { LedgerHandle } from '../../types/expense';
import type { ExportFormat, ExportRequest, ExportResult } from '../../types/export';
import { filterByDateRange } from '../analytics/queries';
import { IOFailure } from '../ledger/errors';
import { readAll } from '../ledger/store';
import { exportToCSV } from './csv';
import { generateJSON } from './json';
import { exportToPDF } from './pdf';
import { exportToSpreadsheet } from './spreadsheet';

/**
 * Reads the ledger, applies the request's date range and renders the result.
 * With `outputPath` set the artifact is also written to disk.
 */
export async function handleExport(ledger: LedgerHandle, request: ExportRequest, now: Date = new Date()): Promise<ExportResult> {
  const { format, dateRange, outputPath } = request;
  const records = filterByDateRange(readAll(ledger), dateRange?.startDate, dateRange?.endDate);

  let data: Buffer | string;
  switch (format) {
    case 'csv':
      data = exportToCSV(records);
      break;
    case 'json':
      data = generateJSON(records, dateRange, now);
      break;
    case 'pdf':
      data = await exportToPDF(records, dateRange, now);
      break;
    case 'xlsx':
      data = await exportToSpreadsheet(records);
      break;
    default:
      throw new Error(`Unsupported export format: ${String(format)}`);
  }

  const fileName = outputPath ? path.basename(outputPath) : getExportFilename(format, now);

  if (outputPath) {
    writeExport(outputPath, data);
    console.log(`[Export] Exported ${records.length} rows to ${outputPath}`);
  }

  return {
    format,
    fileName,
    rowCount: records.length,
    message: `Exported ${records.length} rows to ${outputPath ?? fileName}`,
    data,
    outputPath,
  };
}

/**
 * Generate filename for an export, e.g. expenses_2024-01-31.csv
 */
export function getExportFilename(format: ExportFormat, now: Date = new Date()): string {
  const date = now.toISOString().split('T')[0];
  return format === 'pdf' ? `expenses_report_${date}.pdf` : `expenses_${date}.${format}`;
}

function writeExport(outputPath: string, data: Buffer | string): void {
  try {
    fs.mkdirSync(path.dirname(path.resolve(outputPath)), { recursive: true });
    fs.writeFileSync(outputPath, data);
  } catch (error) {
    throw new IOFailure(outputPath, 'write export', error);
  }
}

export { exportToCSV } from './csv';
export { generateJSON } from './json';
export { exportToPDF } from './pdf';
export { exportToSpreadsheet, buildWorkbook, EXPENSES_SHEET, SUMMARY_SHEET } from './spreadsheet';

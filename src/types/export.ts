export interface DateRange {
  startDate?: string;
  endDate?: string;
}

export type ExportFormat = 'csv' | 'json' | 'pdf' | 'xlsx';

export interface ExportRequest {
  format: ExportFormat;
  dateRange?: DateRange;
  outputPath?: string;
}

export interface ExportResult {
  format: ExportFormat;
  fileName: string;
  rowCount: number;
  message: string;
  data: Buffer | string;
  outputPath?: string;
}

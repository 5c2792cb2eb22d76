export {
  openLedger,
  ensureInitialized,
  append,
  readAll,
  formatAmount,
  getTotal,
  getCategorySummary,
  getAllRecords,
  getDailyTotals,
  LedgerError,
  ValidationError,
  StorageCorruption,
  IOFailure,
  isLedgerError,
} from './services/ledger';
export type { LedgerErrorKind, ValidationReason } from './services/ledger';
export {
  amountOf,
  filterByDateRange,
  total,
  summaryByCategory,
  dailyTotals,
  categoryBreakdown,
  ledgerStats,
  exportRows,
  generateReportText,
} from './services/analytics';
export { handleExport, exportToCSV, generateJSON, exportToPDF, exportToSpreadsheet } from './services/export';
export type { ExpenseRecord, NewExpense, LedgerHandle } from './types/expense';
export type { CategorySummary, DailyTotals, CategoryStat, LedgerStats } from './types/analytics';
export type { DateRange, ExportFormat, ExportRequest, ExportResult } from './types/export';

import type { CategorySummary, DailyTotals } from '../../types/analytics';
import type { ExpenseRecord, LedgerHandle } from '../../types/expense';
import { dailyTotals, filterByDateRange, summaryByCategory, total } from '../analytics/queries';
import { readAll } from './store';

export { openLedger, ensureInitialized, append, readAll, formatAmount } from './store';
export { LedgerError, ValidationError, StorageCorruption, IOFailure, isLedgerError } from './errors';
export type { LedgerErrorKind, ValidationReason } from './errors';

export function getTotal(ledger: LedgerHandle, start?: string, end?: string): number {
  return total(filterByDateRange(readAll(ledger), start, end));
}

export function getCategorySummary(ledger: LedgerHandle, start?: string, end?: string): CategorySummary {
  return summaryByCategory(filterByDateRange(readAll(ledger), start, end));
}

export function getAllRecords(ledger: LedgerHandle): ExpenseRecord[] {
  return readAll(ledger);
}

export function getDailyTotals(ledger: LedgerHandle, start?: string, end?: string): DailyTotals {
  return dailyTotals(filterByDateRange(readAll(ledger), start, end));
}

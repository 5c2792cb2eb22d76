export {
  amountOf,
  filterByDateRange,
  total,
  summaryByCategory,
  dailyTotals,
  categoryBreakdown,
  ledgerStats,
  exportRows,
} from './queries';
export { generateReportText, describeDateRange } from './reports';
export type { CategorySummary, DailyTotals, CategoryStat, LedgerStats } from '../../types/analytics';

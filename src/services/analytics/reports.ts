import type { ExpenseRecord } from '../../types/expense';
import type { DateRange } from '../../types/export';
import { categoryBreakdown, ledgerStats } from './queries';

export function describeDateRange(range?: DateRange): string {
  const startDate = range?.startDate || undefined;
  const endDate = range?.endDate || undefined;

  if (startDate && endDate) {
    return `${startDate} - ${endDate}`;
  } else if (startDate) {
    return `From ${startDate}`;
  } else if (endDate) {
    return `Until ${endDate}`;
  }
  return 'All Time';
}

/**
 * Plain-text report over already filtered records.
 */
export function generateReportText(records: readonly ExpenseRecord[], range?: DateRange): string {
  const stats = ledgerStats(records);

  let report = `Expense Report: ${describeDateRange(range)}\n`;
  report += `Total Spent: ${formatAmount(stats.totalSpent)}\n`;
  report += `Expenses: ${stats.expenseCount}\n`;

  if (stats.expenseCount === 0) {
    return report;
  }

  report += `Average: ${formatAmount(stats.averageExpense)}\n\n`;
  report += 'Category Breakdown:\n';
  for (const cat of categoryBreakdown(records)) {
    report += `- ${cat.name}: ${formatAmount(cat.amount)} (${cat.percentage}%)\n`;
  }

  return report;
}

function formatAmount(value: number): string {
  return value.toFixed(2);
}

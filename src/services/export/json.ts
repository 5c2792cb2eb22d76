import type { ExpenseRecord } from '../../types/expense';
import type { DateRange } from '../../types/export';
import { amountOf, exportRows, ledgerStats } from '../analytics/queries';

export interface ExportedExpense {
  date: string;
  category: string;
  amount: string;
  note: string;
}

export interface JSONExport {
  exportDate: string;
  period: {
    startDate: string | null;
    endDate: string | null;
  };
  summary: {
    totalSpent: string;
    expenseCount: number;
    averageExpense: string;
    topCategory: string | null;
  };
  expenses: ExportedExpense[];
}

/**
 * Export already filtered records as JSON
 */
export function generateJSON(records: readonly ExpenseRecord[], range?: DateRange, now: Date = new Date()): string {
  const stats = ledgerStats(records);

  const jsonExport: JSONExport = {
    exportDate: now.toISOString(),
    period: {
      startDate: range?.startDate || null,
      endDate: range?.endDate || null,
    },
    summary: {
      totalSpent: stats.totalSpent.toFixed(2),
      expenseCount: stats.expenseCount,
      averageExpense: stats.averageExpense.toFixed(2),
      topCategory: stats.topCategory ?? null,
    },
    expenses: exportRows(records).map((row) => ({
      ...row,
      amount: amountOf(row).toFixed(2),
    })),
  };

  return JSON.stringify(jsonExport, null, 2);
}

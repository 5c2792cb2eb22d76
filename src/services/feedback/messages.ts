import type { CategorySummary, DailyTotals } from '../../types/analytics';
import type { ExpenseRecord } from '../../types/expense';
import { DEFAULT_MESSAGES } from '../../config/constants';
import { amountOf } from '../analytics/queries';

/**
 * Command-line feedback text
 */
export const messages = {
  success: {
    expenseAdded: (record: ExpenseRecord) => `${DEFAULT_MESSAGES.ADDED} ${record.date} ${record.category} ${record.amount}`,
    exported: (rowCount: number, target: string) => `Exported ${rowCount} rows to ${target}`,
  },

  error: {
    missingAmount: 'Amount is required: --amount 12.50',
    unknownCommand: (command: string) => `Unknown command "${command}". Run "expense-ledger help" for usage.`,
  },

  info: {
    usage: [
      'Usage: expense-ledger <command> [options]',
      '',
      'Commands:',
      '  add --amount <n> [--date YYYY-MM-DD] [--category <name>] [--note <text>]',
      '  list [--from YYYY-MM-DD] [--to YYYY-MM-DD]',
      '  total [--from YYYY-MM-DD] [--to YYYY-MM-DD]',
      '  summary [--from YYYY-MM-DD] [--to YYYY-MM-DD]',
      '  daily [--from YYYY-MM-DD] [--to YYYY-MM-DD]',
      '  report [--from YYYY-MM-DD] [--to YYYY-MM-DD]',
      '  export [--format csv|json|pdf|xlsx] [--out <path>] [--from YYYY-MM-DD] [--to YYYY-MM-DD]',
    ].join('\n'),
  },
};

export function formatExpenseTable(records: readonly ExpenseRecord[]): string {
  if (records.length === 0) {
    return DEFAULT_MESSAGES.NO_DATA;
  }

  const lines = [`${'Date'.padEnd(10)}  ${'Category'.padEnd(15)}  ${'Amount'.padEnd(10)}  Note`, '-'.repeat(60)];
  for (const record of records) {
    const category = record.category.slice(0, 15).padEnd(15);
    const amount = amountOf(record).toFixed(2).padStart(10);
    lines.push(`${record.date.padEnd(10)}  ${category}  ${amount}  ${record.note}`);
  }
  return lines.join('\n');
}

export function formatTotal(total: number): string {
  return `Total expenses: ${total.toFixed(2)}`;
}

export function formatCategorySummary(summary: CategorySummary): string {
  if (summary.size === 0) {
    return DEFAULT_MESSAGES.NO_SUMMARY;
  }

  const lines = ['Category summary:'];
  for (const [category, amount] of summary) {
    lines.push(`  ${category.padEnd(15)} → ${amount.toFixed(2)}`);
  }
  return lines.join('\n');
}

export function formatDailyTotals(daily: DailyTotals): string {
  if (daily.size === 0) {
    return DEFAULT_MESSAGES.NO_SUMMARY;
  }

  return Array.from(daily, ([date, amount]) => `${date}  ${amount.toFixed(2).padStart(10)}`).join('\n');
}

import type { CategoryStat, CategorySummary, DailyTotals, LedgerStats } from '../../types/analytics';
import type { ExpenseRecord } from '../../types/expense';
import { ValidationError } from '../ledger/errors';
import { isCalendarDate } from '../validation/schemas';

/**
 * Parses a stored amount into a number.
 */
export function amountOf(record: ExpenseRecord): number {
  return Number(record.amount);
}

/**
 * Reads cents straight from the decimal text. Digits past the second
 * decimal are dropped; the store never writes them.
 */
function toCents(record: ExpenseRecord): bigint {
  const [whole, fraction = ''] = record.amount.split('.');
  return BigInt(whole || '0') * 100n + BigInt(fraction.padEnd(2, '0').slice(0, 2));
}

function fromCents(cents: bigint): number {
  return Number(cents) / 100;
}

/**
 * Keeps records with `start <= date <= end`, compared as ISO date strings.
 * Either bound may be omitted (or empty) to leave that side open.
 */
export function filterByDateRange(records: readonly ExpenseRecord[], start?: string, end?: string): ExpenseRecord[] {
  const from = checkBound(start);
  const to = checkBound(end);

  return records.filter((record) => {
    if (from !== undefined && record.date < from) return false;
    if (to !== undefined && record.date > to) return false;
    return true;
  });
}

function checkBound(bound: string | undefined): string | undefined {
  if (bound === undefined || bound === '') {
    return undefined;
  }
  if (!isCalendarDate(bound)) {
    throw new ValidationError('InvalidDate', `date range bound must be YYYY-MM-DD, got "${bound}"`);
  }
  return bound;
}

export function total(records: readonly ExpenseRecord[]): number {
  let cents = 0n;
  for (const record of records) {
    cents += toCents(record);
  }
  return fromCents(cents);
}

/**
 * Sums amounts per category, largest total first. Equal totals keep the
 * order in which their categories first appear.
 */
export function summaryByCategory(records: readonly ExpenseRecord[]): CategorySummary {
  const sorted = groupCents(records).sort((a, b) => (a.cents === b.cents ? 0 : a.cents > b.cents ? -1 : 1));
  return new Map(sorted.map(({ key, cents }) => [key, fromCents(cents)]));
}

/**
 * Sums amounts per day, earliest day first.
 */
export function dailyTotals(records: readonly ExpenseRecord[]): DailyTotals {
  const groups = groupCents(records, (record) => record.date).sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  return new Map(groups.map(({ key, cents }) => [key, fromCents(cents)]));
}

export function categoryBreakdown(records: readonly ExpenseRecord[]): CategoryStat[] {
  const grandTotal = total(records);
  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record.category, (counts.get(record.category) || 0) + 1);
  }

  return Array.from(summaryByCategory(records), ([name, amount]) => ({
    name,
    amount,
    percentage: grandTotal > 0 ? Math.round((amount / grandTotal) * 100) : 0,
    count: counts.get(name) || 0,
  }));
}

export function ledgerStats(records: readonly ExpenseRecord[]): LedgerStats {
  const totalSpent = total(records);
  const [topCategory] = summaryByCategory(records).keys();
  const dates = records.map((record) => record.date).sort();

  return {
    totalSpent,
    expenseCount: records.length,
    averageExpense: records.length > 0 ? Math.round((totalSpent / records.length) * 100) / 100 : 0,
    topCategory,
    firstExpenseDate: dates[0],
    lastExpenseDate: dates[dates.length - 1],
  };
}

/**
 * Copies records for a downstream writer; the input is left untouched.
 */
export function exportRows(records: readonly ExpenseRecord[]): ExpenseRecord[] {
  return records.map(({ date, category, amount, note }) => ({ date, category, amount, note }));
}

function groupCents(
  records: readonly ExpenseRecord[],
  keyOf: (record: ExpenseRecord) => string = (record) => record.category,
): { key: string; cents: bigint }[] {
  const groups = new Map<string, bigint>();
  for (const record of records) {
    const key = keyOf(record);
    groups.set(key, (groups.get(key) ?? 0n) + toCents(record));
  }
  return Array.from(groups, ([key, cents]) => ({ key, cents }));
}

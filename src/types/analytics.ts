/** Category label to summed amount, largest first. */
export type CategorySummary = Map<string, number>;

/** ISO date to summed amount, earliest first. */
export type DailyTotals = Map<string, number>;

export interface CategoryStat {
  name: string;
  amount: number;
  percentage: number;
  count: number;
}

export interface LedgerStats {
  totalSpent: number;
  expenseCount: number;
  averageExpense: number;
  topCategory?: string;
  firstExpenseDate?: string;
  lastExpenseDate?: string;
}

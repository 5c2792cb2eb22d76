export interface ExpenseRecord {
  date: string;
  category: string;
  /** Decimal text as stored, e.g. "42.50". Parse with `amountOf`. */
  amount: string;
  note: string;
}

export interface NewExpense {
  date: string;
  category: string;
  amount: number | string;
  note?: string;
}

export interface LedgerHandle {
  readonly path: string;
}

export const LEDGER_HEADERS = ['date', 'category', 'amount', 'note'] as const;

export const SPREADSHEET_HEADERS = ['date', 'category', 'amount', 'description'] as const;

export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const AMOUNT_DECIMALS = 2;

export const DEFAULT_EXPORT_FILES = {
  csv: 'expenses_export.csv',
  json: 'expenses_export.json',
  pdf: 'expenses_report.pdf',
  xlsx: 'expenses_export.xlsx',
} as const;

export const DEFAULT_MESSAGES = {
  NO_DATA: 'No expenses found.',
  NO_SUMMARY: 'No data.',
  ADDED: 'Expense added.',
};

import { LEDGER_HEADERS } from '../../config/constants';
import type { ExpenseRecord } from '../../types/expense';
import { exportRows } from '../analytics/queries';
import { formatCsvRow } from '../ledger/csv';

/**
 * Renders records in the ledger's own file format, so the output can be
 * opened again as a ledger. Amounts are copied exactly as stored.
 */
export function exportToCSV(records: readonly ExpenseRecord[]): string {
  const csvLines: string[] = [formatCsvRow(LEDGER_HEADERS)];

  for (const row of exportRows(records)) {
    csvLines.push(formatCsvRow([row.date, row.category, row.amount, row.note]));
  }

  return `${csvLines.join('\n')}\n`;
}

import ExcelJS from 'exceljs';
import { SPREADSHEET_HEADERS } from '../../config/constants';
import type { ExpenseRecord } from '../../types/expense';
import { amountOf, summaryByCategory } from '../analytics/queries';

export const EXPENSES_SHEET = 'Expenses';
export const SUMMARY_SHEET = 'Summary';

export function buildWorkbook(records: readonly ExpenseRecord[]): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();

  const expenses = workbook.addWorksheet(EXPENSES_SHEET);
  expenses.columns = [
    { header: SPREADSHEET_HEADERS[0], key: 'date', width: 12 },
    { header: SPREADSHEET_HEADERS[1], key: 'category', width: 20 },
    { header: SPREADSHEET_HEADERS[2], key: 'amount', width: 12, style: { numFmt: '0.00' } },
    { header: SPREADSHEET_HEADERS[3], key: 'description', width: 40 },
  ];
  for (const record of records) {
    expenses.addRow({
      date: record.date,
      category: record.category,
      amount: amountOf(record),
      description: record.note,
    });
  }

  const summary = workbook.addWorksheet(SUMMARY_SHEET);
  summary.columns = [
    { header: 'category', key: 'category', width: 20 },
    { header: 'total', key: 'total', width: 12, style: { numFmt: '0.00' } },
  ];
  for (const [category, amount] of summaryByCategory(records)) {
    summary.addRow({ category, total: amount });
  }

  return workbook;
}

/**
 * Renders the records as an xlsx workbook: one row per expense on the
 * Expenses sheet, category totals on the Summary sheet.
 */
export async function exportToSpreadsheet(records: readonly ExpenseRecord[]): Promise<Buffer> {
  const data = await buildWorkbook(records).xlsx.writeBuffer();
  return Buffer.from(data);
}

import PDFDocument from 'pdfkit';
import type { ExpenseRecord } from '../../types/expense';
import type { DateRange } from '../../types/export';
import { amountOf, categoryBreakdown, ledgerStats } from '../analytics/queries';
import { describeDateRange } from '../analytics/reports';

const TABLE_HEADERS = ['Date', 'Category', 'Amount', 'Note'];
const COL_WIDTHS = [80, 120, 80, 215];
const TABLE_START_X = 50;
const ROW_HEIGHT = 18;
const PAGE_BOTTOM = 750;

/**
 * Renders already filtered records as a PDF report: summary, category
 * breakdown and one table row per expense in ledger order.
 */
export async function exportToPDF(records: readonly ExpenseRecord[], range?: DateRange, now: Date = new Date()): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({
      size: 'A4',
      margins: { top: 50, bottom: 50, left: 50, right: 50 },
    });
    const buffers: Buffer[] = [];

    doc.on('data', (chunk: Buffer) => buffers.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(buffers)));
    doc.on('error', reject);

    // Header
    doc.fontSize(24).font('Helvetica-Bold').text('Expense Report', { align: 'center' });
    doc.moveDown(0.3);
    doc.fontSize(11).font('Helvetica').text(describeDateRange(range), { align: 'center' });
    doc.moveDown(0.5);

    doc.moveTo(50, doc.y).lineTo(545, doc.y).stroke();
    doc.moveDown();

    const stats = ledgerStats(records);

    doc.fontSize(14).font('Helvetica-Bold').text('Summary');
    doc.moveDown(0.5);
    doc.fontSize(10).font('Helvetica');
    doc.text(`Total Spent: ${stats.totalSpent.toFixed(2)}`);
    doc.text(`Expenses: ${stats.expenseCount}`);
    doc.text(`Average per Expense: ${stats.averageExpense.toFixed(2)}`);
    doc.moveDown();

    const categories = categoryBreakdown(records);
    if (categories.length > 0) {
      doc.fontSize(14).font('Helvetica-Bold').text('Spending by Category');
      doc.moveDown(0.5);
      doc.fontSize(10).font('Helvetica');

      for (const cat of categories) {
        doc.text(`${cat.name}: ${cat.amount.toFixed(2)} (${cat.percentage}%, ${cat.count}x)`);
      }
      doc.moveDown();
    }

    if (records.length > 0) {
      doc.fontSize(14).font('Helvetica-Bold').text('Expenses');
      doc.moveDown(0.5);

      let currentY = drawTableHeader(doc, doc.y);

      for (const record of records) {
        if (currentY > PAGE_BOTTOM) {
          doc.addPage();
          currentY = drawTableHeader(doc, 50);
        }

        const row = [
          record.date,
          truncate(record.category, 20),
          amountOf(record).toFixed(2),
          truncate(record.note, 40),
        ];

        let xPos = TABLE_START_X;
        for (let i = 0; i < row.length; i++) {
          doc.text(row[i], xPos, currentY, { width: COL_WIDTHS[i] });
          xPos += COL_WIDTHS[i];
        }
        currentY += ROW_HEIGHT;
      }
    }

    // Footer
    doc.moveDown(2);
    doc
      .fontSize(8)
      .font('Helvetica')
      .text(`Generated on ${now.toISOString().split('T')[0]}`, TABLE_START_X, doc.y, { align: 'center' });

    doc.end();
  });
}

function drawTableHeader(doc: PDFKit.PDFDocument, y: number): number {
  doc.fontSize(9).font('Helvetica-Bold');
  let xPos = TABLE_START_X;
  for (let i = 0; i < TABLE_HEADERS.length; i++) {
    doc.text(TABLE_HEADERS[i], xPos, y, { width: COL_WIDTHS[i] });
    xPos += COL_WIDTHS[i];
  }

  const nextY = y + ROW_HEIGHT;
  doc.moveTo(TABLE_START_X, nextY - 4).lineTo(TABLE_START_X + 495, nextY - 4).stroke();
  doc.fontSize(8).font('Helvetica');
  return nextY;
}

function truncate(str: string, maxLen: number): string {
  if (!str) return '-';
  return str.length > maxLen ? str.substring(0, maxLen - 3) + '...' : str;
}

import { describe, it, expect } from 'vitest';
import {
  amountOf,
  categoryBreakdown,
  dailyTotals,
  describeDateRange,
  exportRows,
  filterByDateRange,
  generateReportText,
  ledgerStats,
  summaryByCategory,
  total,
} from '../src/services/analytics';
import { ValidationError } from '../src/services/ledger/errors';
import type { ExpenseRecord } from '../src/types/expense';

function rec(date: string, category: string, amount: string, note = ''): ExpenseRecord {
  return { date, category, amount, note };
}

const january: ExpenseRecord[] = [
  rec('2024-01-10', 'Food', '12.50', 'lunch'),
  rec('2024-01-31', 'Rent', '800.00'),
  rec('2024-01-01', 'Food', '7.25', 'backdated'),
  rec('2024-02-01', 'Travel', '30.00'),
  rec('2023-12-31', 'Food', '4.00'),
];

describe('Analytics', () => {
  describe('filterByDateRange', () => {
    it('should include both bounds', () => {
      expect(filterByDateRange(january, '2024-01-01', '2024-01-31')).toEqual([january[0], january[1], january[2]]);
    });

    it('should keep the original order', () => {
      const dates = filterByDateRange(january, '2023-12-01', '2024-12-31').map((record) => record.date);
      expect(dates).toEqual(['2024-01-10', '2024-01-31', '2024-01-01', '2024-02-01', '2023-12-31']);
    });

    it('should leave an omitted bound open', () => {
      expect(filterByDateRange(january, '2024-01-31')).toEqual([january[1], january[3]]);
      expect(filterByDateRange(january, undefined, '2024-01-01')).toEqual([january[2], january[4]]);
      expect(filterByDateRange(january)).toEqual(january);
    });

    it('should treat empty bounds as omitted', () => {
      expect(filterByDateRange(january, '', '')).toEqual(january);
    });

    it('should match a single day when both bounds are equal', () => {
      expect(filterByDateRange(january, '2024-02-01', '2024-02-01')).toEqual([january[3]]);
    });

    it('should return nothing for an inverted range', () => {
      expect(filterByDateRange(january, '2024-02-01', '2024-01-01')).toEqual([]);
    });

    it('should not modify the input', () => {
      const copy = [...january];
      filterByDateRange(january, '2024-01-15');
      expect(january).toEqual(copy);
    });

    it('should reject malformed bounds', () => {
      expect(() => filterByDateRange(january, '2024-13-01')).toThrow(ValidationError);
      expect(() => filterByDateRange(january, undefined, '2024/01/31')).toThrow(
        'date range bound must be YYYY-MM-DD, got "2024/01/31"',
      );
    });
  });

  describe('total', () => {
    it('should be zero for no records', () => {
      expect(total([])).toBe(0);
    });

    it('should sum amounts without floating point drift', () => {
      expect(total([rec('2024-01-01', 'A', '0.10'), rec('2024-01-01', 'A', '0.20')])).toBe(0.3);
      expect(total([rec('2024-01-01', 'A', '10.10'), rec('2024-01-02', 'B', '20.20'), rec('2024-01-03', 'C', '0.30')])).toBe(30.6);
    });

    it('should stay exact for large amounts', () => {
      expect(total([rec('2024-01-01', 'A', '90000000000000.01'), rec('2024-01-02', 'A', '0.02')])).toBe(90000000000000.03);
    });

    it('should read amounts without decimals', () => {
      expect(total([rec('2024-01-01', 'A', '10'), rec('2024-01-02', 'A', '2.5')])).toBe(12.5);
    });

    it('should sum only the filtered range', () => {
      expect(total(filterByDateRange(january, '2024-01-01', '2024-01-31'))).toBe(819.75);
    });
  });

  describe('summaryByCategory', () => {
    it('should rank categories by total', () => {
      const summary = summaryByCategory([rec('2024-01-01', 'A', '10'), rec('2024-01-02', 'B', '30'), rec('2024-01-03', 'A', '5')]);
      expect(Array.from(summary)).toEqual([
        ['B', 30],
        ['A', 15],
      ]);
    });

    it('should break ties by first appearance', () => {
      const summary = summaryByCategory([
        rec('2024-01-01', 'Y', '5.00'),
        rec('2024-01-01', 'X', '5.00'),
        rec('2024-01-01', 'Z', '7.00'),
      ]);
      expect(Array.from(summary.keys())).toEqual(['Z', 'Y', 'X']);
    });

    it('should compare labels exactly', () => {
      const summary = summaryByCategory([rec('2024-01-01', 'food', '1.00'), rec('2024-01-01', 'Food', '2.00'), rec('2024-01-01', 'Food ', '3.00')]);
      expect(Array.from(summary)).toEqual([
        ['Food ', 3],
        ['Food', 2],
        ['food', 1],
      ]);
    });

    it('should be empty for no records', () => {
      expect(summaryByCategory([]).size).toBe(0);
    });

    it('should add up to the total, to the cent', () => {
      const cases = [january, [rec('2024-01-01', 'A', '0.10'), rec('2024-01-01', 'B', '0.20')]];
      for (const records of cases) {
        let sum = 0;
        for (const value of summaryByCategory(records).values()) {
          sum += value;
        }
        expect(Math.round(sum * 100)).toBe(Math.round(total(records) * 100));
      }
    });
  });

  describe('dailyTotals', () => {
    it('should sum each day, earliest first', () => {
      const daily = dailyTotals([
        rec('2024-01-03', 'A', '1.00'),
        rec('2024-01-01', 'B', '2.50'),
        rec('2024-01-03', 'C', '4.00'),
      ]);
      expect(Array.from(daily)).toEqual([
        ['2024-01-01', 2.5],
        ['2024-01-03', 5],
      ]);
    });
  });

  describe('categoryBreakdown', () => {
    it('should add counts and rounded percentages', () => {
      const breakdown = categoryBreakdown([rec('2024-01-01', 'A', '10'), rec('2024-01-02', 'B', '30'), rec('2024-01-03', 'A', '5')]);
      expect(breakdown).toEqual([
        { name: 'B', amount: 30, percentage: 67, count: 1 },
        { name: 'A', amount: 15, percentage: 33, count: 2 },
      ]);
    });

    it('should report zero percent when nothing was spent', () => {
      expect(categoryBreakdown([rec('2024-01-01', 'Free', '0.00')])).toEqual([{ name: 'Free', amount: 0, percentage: 0, count: 1 }]);
    });
  });

  describe('ledgerStats', () => {
    it('should describe an empty ledger', () => {
      expect(ledgerStats([])).toEqual({
        totalSpent: 0,
        expenseCount: 0,
        averageExpense: 0,
        topCategory: undefined,
        firstExpenseDate: undefined,
        lastExpenseDate: undefined,
      });
    });

    it('should describe recorded expenses', () => {
      expect(ledgerStats(january)).toEqual({
        totalSpent: 853.75,
        expenseCount: 5,
        averageExpense: 170.75,
        topCategory: 'Rent',
        firstExpenseDate: '2023-12-31',
        lastExpenseDate: '2024-02-01',
      });
    });
  });

  describe('exportRows', () => {
    it('should copy records in order', () => {
      const rows = exportRows(january);
      expect(rows).toEqual(january);
      expect(rows).not.toBe(january);
      expect(rows[0]).not.toBe(january[0]);
    });

    it('should leave the source untouched when the copy changes', () => {
      const rows = exportRows(january);
      rows[0].note = 'changed';
      expect(january[0].note).toBe('lunch');
    });
  });

  it('should parse stored amounts', () => {
    expect(amountOf(rec('2024-01-01', 'A', '42.50'))).toBe(42.5);
  });

  describe('reports', () => {
    it('should label date ranges', () => {
      expect(describeDateRange()).toBe('All Time');
      expect(describeDateRange({ startDate: '2024-01-01', endDate: '2024-01-31' })).toBe('2024-01-01 - 2024-01-31');
      expect(describeDateRange({ startDate: '2024-01-01' })).toBe('From 2024-01-01');
      expect(describeDateRange({ startDate: '', endDate: '2024-01-31' })).toBe('Until 2024-01-31');
    });

    it('should render a text report', () => {
      const report = generateReportText([rec('2024-01-01', 'A', '10'), rec('2024-01-02', 'B', '30'), rec('2024-01-03', 'A', '5')]);
      expect(report).toBe(
        'Expense Report: All Time\n' +
          'Total Spent: 45.00\n' +
          'Expenses: 3\n' +
          'Average: 15.00\n' +
          '\n' +
          'Category Breakdown:\n' +
          '- B: 30.00 (67%)\n' +
          '- A: 15.00 (33%)\n',
      );
    });

    it('should render an empty report', () => {
      expect(generateReportText([], { startDate: '2024-03-01' })).toBe('Expense Report: From 2024-03-01\nTotal Spent: 0.00\nExpenses: 0\n');
    });
  });
});

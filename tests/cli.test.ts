import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runCli, todayIso, type CliConfig } from '../src/cli';
import { ValidationError } from '../src/services/ledger';

const NOW = new Date(2024, 2, 1, 9, 30);

describe('CLI', () => {
  let dir: string;
  let config: CliConfig;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'expense-cli-'));
    config = {
      LEDGER_PATH: path.join(dir, 'expenses.csv'),
      EXPORT_DIR: path.join(dir, 'exports'),
      DEFAULT_CATEGORY: 'Misc',
    };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  const run = (...argv: string[]) => runCli(argv, config, NOW);

  it('should print usage by default', async () => {
    expect(await run()).toContain('Usage: expense-ledger <command> [options]');
    expect(fs.existsSync(config.LEDGER_PATH)).toBe(false);
  });

  it('should add with today and the default category', async () => {
    expect(await run('add', '--amount', '12.5')).toBe('Expense added. 2024-03-01 Misc 12.50');
    expect(fs.readFileSync(config.LEDGER_PATH, 'utf-8')).toBe('date,category,amount,note\n2024-03-01,Misc,12.50,\n');
  });

  it('should add with every option', async () => {
    await run('add', '--date', '2024-01-15', '--category', ' Groceries ', '--amount', '42.5', '--note', 'weekly shop');
    expect(fs.readFileSync(config.LEDGER_PATH, 'utf-8')).toBe('date,category,amount,note\n2024-01-15,Groceries,42.50,weekly shop\n');
  });

  it('should require an amount', async () => {
    await expect(run('add')).rejects.toThrow('Amount is required: --amount 12.50');
  });

  it('should surface validation errors', async () => {
    await expect(run('add', '--date', '2024-02-30', '--amount', '5')).rejects.toBeInstanceOf(ValidationError);
    await expect(run('add', '--amount=-5')).rejects.toMatchObject({ reason: 'NegativeAmount' });
  });

  describe('queries', () => {
    beforeEach(async () => {
      await run('add', '--date', '2024-01-05', '--category', 'Food', '--amount', '10');
      await run('add', '--date', '2024-01-20', '--category', 'Rent', '--amount', '500');
      await run('add', '--date', '2024-02-01', '--category', 'Food', '--amount', '20');
    });

    it('should print a total for a range', async () => {
      expect(await run('total')).toBe('Total expenses: 530.00');
      expect(await run('total', '--from', '2024-01-10', '--to', '2024-01-31')).toBe('Total expenses: 500.00');
    });

    it('should print the category summary', async () => {
      expect(await run('summary', '--from', '2024-01-01')).toBe(
        `Category summary:\n  Rent${' '.repeat(11)} → 500.00\n  Food${' '.repeat(11)} → 30.00`,
      );
    });

    it('should list records in a range', async () => {
      const lines = (await run('list', '--from', '2024-02-01')).split('\n');
      expect(lines).toHaveLength(3);
      expect(lines[2]).toBe(`2024-02-01  Food${' '.repeat(11)}  ${' '.repeat(5)}20.00  `);
    });

    it('should print daily totals', async () => {
      expect(await run('daily', '--to', '2024-01-10')).toBe(`2024-01-05  ${' '.repeat(5)}10.00`);
    });

    it('should print a report', async () => {
      expect(await run('report', '--from', '2024-02-01')).toContain('Expense Report: From 2024-02-01\nTotal Spent: 20.00');
    });

    it('should export to the default path', async () => {
      const output = await run('export');
      const target = path.join(config.EXPORT_DIR, 'expenses_export.csv');
      expect(output).toBe(`Exported 3 rows to ${target}`);
      expect(fs.readFileSync(target, 'utf-8')).toBe(fs.readFileSync(config.LEDGER_PATH, 'utf-8'));
    });

    it('should export a range to a given path', async () => {
      const target = path.join(dir, 'food.json');
      expect(await run('export', '--format', 'json', '--out', target, '--to', '2024-01-31')).toBe(`Exported 2 rows to ${target}`);
    });

    it('should reject an unknown export format', async () => {
      await expect(run('export', '--format', 'xml')).rejects.toThrow('Format must be: csv, json, pdf or xlsx');
    });

    it('should reject a malformed range', async () => {
      await expect(run('total', '--from', '2024-1-1')).rejects.toMatchObject({ kind: 'ValidationError', reason: 'InvalidDate' });
    });
  });

  it('should reject unknown commands', async () => {
    await expect(run('delete')).rejects.toThrow('Unknown command "delete"');
  });

  it('should reject unknown options', async () => {
    await expect(run('total', '--currency', 'EUR')).rejects.toThrow();
  });

  it('should format the local date', () => {
    expect(todayIso(new Date(2024, 0, 5, 23, 59))).toBe('2024-01-05');
  });
});

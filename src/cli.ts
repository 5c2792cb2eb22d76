#!/usr/bin/env node
import path from 'path';
import { parseArgs } from 'util';
import { DEFAULT_EXPORT_FILES } from './config/constants';
import { env, type Env } from './config/env';
import { filterByDateRange, generateReportText } from './services/analytics';
import { handleExport } from './services/export';
import {
  formatCategorySummary,
  formatDailyTotals,
  formatExpenseTable,
  formatTotal,
  messages,
} from './services/feedback/messages';
import { append, getCategorySummary, getDailyTotals, getTotal, openLedger, readAll } from './services/ledger';
import { ExportFormatSchema, validateInput } from './services/validation/schemas';

export type CliConfig = Pick<Env, 'LEDGER_PATH' | 'EXPORT_DIR' | 'DEFAULT_CATEGORY'>;

const OPTIONS = {
  date: { type: 'string' },
  category: { type: 'string' },
  amount: { type: 'string' },
  note: { type: 'string' },
  from: { type: 'string' },
  to: { type: 'string' },
  format: { type: 'string' },
  out: { type: 'string' },
} as const;

/**
 * Runs one command and returns the text to print. Ledger errors propagate.
 */
export async function runCli(argv: string[], config: CliConfig, now: Date = new Date()): Promise<string> {
  const { values, positionals } = parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  const [command = 'help'] = positionals;

  if (command === 'help') {
    return messages.info.usage;
  }

  const ledger = openLedger(config.LEDGER_PATH);
  const from = values.from?.trim() || undefined;
  const to = values.to?.trim() || undefined;

  switch (command) {
    case 'add': {
      if (values.amount === undefined) {
        throw new Error(messages.error.missingAmount);
      }
      const record = append(ledger, {
        date: values.date?.trim() || todayIso(now),
        category: values.category?.trim() || config.DEFAULT_CATEGORY,
        amount: values.amount,
        note: values.note?.trim() ?? '',
      });
      return messages.success.expenseAdded(record);
    }
    case 'list':
      return formatExpenseTable(filterByDateRange(readAll(ledger), from, to));
    case 'total':
      return formatTotal(getTotal(ledger, from, to));
    case 'summary':
      return formatCategorySummary(getCategorySummary(ledger, from, to));
    case 'daily':
      return formatDailyTotals(getDailyTotals(ledger, from, to));
    case 'report':
      return generateReportText(filterByDateRange(readAll(ledger), from, to), { startDate: from, endDate: to });
    case 'export': {
      const parsed = validateInput(ExportFormatSchema, values.format ?? 'csv');
      if (!parsed.valid) {
        throw new Error(parsed.error);
      }
      const format = parsed.data;
      const outputPath = values.out?.trim() || path.join(config.EXPORT_DIR, DEFAULT_EXPORT_FILES[format]);
      const result = await handleExport(ledger, { format, outputPath, dateRange: { startDate: from, endDate: to } }, now);
      return messages.success.exported(result.rowCount, outputPath);
    }
    default:
      throw new Error(messages.error.unknownCommand(command));
  }
}

/**
 * Local calendar date as YYYY-MM-DD
 */
export function todayIso(now: Date = new Date()): string {
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${now.getFullYear()}-${month}-${day}`;
}

async function main(): Promise<number> {
  try {
    const output = await runCli(process.argv.slice(2), env);
    console.log(output);
    return 0;
  } catch (error) {
    console.error('[CLI] Error:', error instanceof Error ? error.message : String(error));
    return 1;
  }
}

if (require.main === module) {
  main().then((code) => {
    process.exitCode = code;
  });
}

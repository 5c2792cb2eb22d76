import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { AMOUNT_DECIMALS, LEDGER_HEADERS } from '../../config/constants';
import type { ExpenseRecord, LedgerHandle, NewExpense } from '../../types/expense';
import { NewExpenseSchema, isCalendarDate } from '../validation/schemas';
import { CsvSyntaxError, formatCsvRow, parseCsv, type CsvRow } from './csv';
import { IOFailure, StorageCorruption, ValidationError } from './errors';

const HEADER_LINE = `${LEDGER_HEADERS.join(',')}\n`;
const STORED_AMOUNT_PATTERN = /^\d+(?:\.\d{1,2})?$/;

export function openLedger(filePath: string): LedgerHandle {
  const ledger: LedgerHandle = { path: path.resolve(filePath) };
  ensureInitialized(ledger);
  return ledger;
}

/**
 * Creates the ledger file with its header row if it does not exist yet.
 * Safe to call before every operation.
 */
export function ensureInitialized(ledger: LedgerHandle): void {
  if (fs.existsSync(ledger.path)) {
    return;
  }

  try {
    fs.mkdirSync(path.dirname(ledger.path), { recursive: true });
    // 'wx' fails instead of truncating if the file appeared in the meantime
    fs.writeFileSync(ledger.path, HEADER_LINE, { encoding: 'utf-8', flag: 'wx' });
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      return;
    }
    throw new IOFailure(ledger.path, 'initialize', error);
  }

  console.log(`[Ledger] Created ${ledger.path}`);
}

/**
 * Validates an expense and appends it as the newest row.
 * Nothing is written when validation fails.
 */
export function append(ledger: LedgerHandle, input: NewExpense): ExpenseRecord {
  const record = toRecord(input);

  ensureInitialized(ledger);

  const row = `${formatCsvRow([record.date, record.category, record.amount, record.note])}\n`;
  try {
    fs.appendFileSync(ledger.path, rowPrefix(ledger) + row, 'utf-8');
  } catch (error) {
    throw new IOFailure(ledger.path, 'append to', error);
  }

  return record;
}

/**
 * Returns every stored record in insertion order. Any malformed row aborts
 * the read with StorageCorruption.
 */
export function readAll(ledger: LedgerHandle): ExpenseRecord[] {
  ensureInitialized(ledger);

  let text: string;
  try {
    text = fs.readFileSync(ledger.path, 'utf-8');
  } catch (error) {
    throw new IOFailure(ledger.path, 'read', error);
  }

  let rows: CsvRow[];
  try {
    rows = parseCsv(text);
  } catch (error) {
    if (error instanceof CsvSyntaxError) {
      throw new StorageCorruption(ledger.path, error.line, error.message);
    }
    throw error;
  }

  if (rows.length === 0) {
    return [];
  }

  const [header, ...body] = rows;
  const headerMatches =
    header.fields.length === LEDGER_HEADERS.length && LEDGER_HEADERS.every((name, i) => header.fields[i] === name);
  if (!headerMatches) {
    throw new StorageCorruption(ledger.path, header.line, `expected header "${LEDGER_HEADERS.join(',')}"`);
  }

  return body.map(({ line, fields }) => {
    if (fields.length !== LEDGER_HEADERS.length) {
      throw new StorageCorruption(ledger.path, line, `expected ${LEDGER_HEADERS.length} fields, found ${fields.length}`);
    }

    const [date, category, amount, note] = fields;
    if (!isCalendarDate(date)) {
      throw new StorageCorruption(ledger.path, line, `invalid date "${date}"`);
    }
    if (!STORED_AMOUNT_PATTERN.test(amount)) {
      throw new StorageCorruption(ledger.path, line, `invalid amount "${amount}"`);
    }

    return { date, category, amount, note };
  });
}

export function formatAmount(amount: number): string {
  return amount.toFixed(AMOUNT_DECIMALS);
}

function toRecord(input: NewExpense): ExpenseRecord {
  const result = NewExpenseSchema.safeParse(input);
  if (result.success) {
    const { date, category, amount, note } = result.data;
    return { date, category, amount: formatAmount(amount), note };
  }

  const [issue] = result.error.issues;
  switch (issue.path[0]) {
    case 'date':
      throw new ValidationError('InvalidDate', `date must be YYYY-MM-DD, got "${input.date}"`);
    case 'amount':
      if (issue.code === z.ZodIssueCode.custom && issue.params?.reason === 'NegativeAmount') {
        throw new ValidationError('NegativeAmount', 'amount must be non-negative');
      }
      throw new ValidationError('InvalidAmount', `amount must be a number, got "${input.amount}"`);
    case 'category':
      throw new ValidationError('EmptyCategory', 'category must not be empty');
    case 'note':
      throw new ValidationError('InvalidNote', 'note must be text');
    default:
      throw new ValidationError('InvalidInput', issue.message);
  }
}

/**
 * What must precede a new row: the header for a zero-byte file, a line
 * break when the last row was left unterminated, otherwise nothing.
 */
function rowPrefix(ledger: LedgerHandle): string {
  let fd: number | undefined;
  try {
    const { size } = fs.statSync(ledger.path);
    if (size === 0) {
      return HEADER_LINE;
    }
    fd = fs.openSync(ledger.path, 'r');
    const last = Buffer.alloc(1);
    fs.readSync(fd, last, 0, 1, size - 1);
    return last[0] === 0x0a ? '' : '\n';
  } catch (error) {
    throw new IOFailure(ledger.path, 'inspect', error);
  } finally {
    if (fd !== undefined) {
      fs.closeSync(fd);
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

import { z } from 'zod';
import { ISO_DATE_PATTERN } from '../../config/constants';

/** Largest amount whose cents still fit in a safe integer. */
export const MAX_AMOUNT = Math.floor(Number.MAX_SAFE_INTEGER / 100);

/**
 * True for `YYYY-MM-DD` strings naming a real day (leap years included).
 */
export function isCalendarDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) {
    return false;
  }

  const [year, month, day] = value.split('-').map(Number);
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * ISO calendar date validation
 */
export const IsoDateSchema = z
  .string()
  .regex(ISO_DATE_PATTERN, 'Date must be YYYY-MM-DD')
  .refine(isCalendarDate, 'Date is not a valid calendar date');

/**
 * Amount validation: a finite number, or decimal text such as "42.5".
 * The sign is checked by NewExpenseSchema.
 */
export const AmountSchema = z.union([
  z.number().finite(),
  z
    .string()
    .trim()
    .regex(/^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/, 'Amount must be a number (e.g., 20 or 19.99)')
    .transform(Number),
]);

/**
 * Category validation: any non-blank label, kept exactly as given
 */
export const CategorySchema = z.string().refine((val) => val.trim().length > 0, 'Category is required');

export const NoteSchema = z.string().default('');

/**
 * New expense validation. Keys are checked in this order, so the first
 * issue names the first field that failed.
 */
export const NewExpenseSchema = z.object({
  date: IsoDateSchema,
  amount: AmountSchema.refine((val) => val >= 0, {
    message: 'Amount must be non-negative',
    params: { reason: 'NegativeAmount' },
  }).refine((val) => val <= MAX_AMOUNT, 'Amount too large'),
  category: CategorySchema,
  note: NoteSchema,
});

export const ExportFormatSchema = z.enum(['csv', 'json', 'pdf', 'xlsx'], {
  errorMap: () => ({ message: 'Format must be: csv, json, pdf or xlsx' }),
});

/**
 * Validate and parse user input safely
 */
export function validateInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
): { valid: true; data: T } | { valid: false; error: string } {
  const result = schema.safeParse(input);
  if (result.success) {
    return { valid: true, data: result.data };
  }
  return { valid: false, error: result.error.issues[0]?.message || 'Invalid input' };
}

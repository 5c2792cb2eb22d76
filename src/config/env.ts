import dotenv from 'dotenv';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LEDGER_PATH: z.string().min(1).default('./data/expenses.csv'),
  EXPORT_DIR: z.string().min(1).default('./exports'),
  DEFAULT_CATEGORY: z.string().trim().min(1).default('Misc'),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}

dotenv.config();

export const env = loadEnv();

import dotenv from 'dotenv';
import path from 'path';

// Tests read .env.test; the server reads .env, then whatever dotenv finds by default.
const ENV_FILE = process.env.NODE_ENV === 'test' ? '.env.test' : '.env';

dotenv.config({ path: path.resolve(process.cwd(), ENV_FILE) });
if (!process.env.DATABASE_URL) {
  dotenv.config();
}

/**
 * Application configuration resolved from environment variables.
 *
 * @property {number} port - HTTP port of the API server
 * @property {string | undefined} databaseUrl - PostgreSQL connection string (required once the pool is used)
 * @property {string} defaultCurrency - ISO 4217 code used when an invoice omits one
 * @property {number} ledgerMaxAttempts - Attempts per ledger write before LedgerContention is raised
 * @property {number} ledgerRetryDelayMs - Base backoff between attempts (multiplied by the attempt number)
 * @property {number} invoiceDueDays - Days added to the invoice date when no due date is given
 */
export interface AppConfig {
  port: number;
  databaseUrl: string | undefined;
  defaultCurrency: string;
  ledgerMaxAttempts: number;
  ledgerRetryDelayMs: number;
  invoiceDueDays: number;
}

const readInteger = (name: string, fallback: number, min: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${name}: expected an integer >= ${min}, got "${raw}"`);
  }
  return value;
};

export const loadConfig = (): AppConfig => ({
  port: readInteger('PORT', 3001, 1),
  databaseUrl: process.env.DATABASE_URL,
  defaultCurrency: (process.env.DEFAULT_CURRENCY || 'USD').toUpperCase(),
  ledgerMaxAttempts: readInteger('LEDGER_MAX_ATTEMPTS', 5, 1),
  ledgerRetryDelayMs: readInteger('LEDGER_RETRY_DELAY_MS', 10, 0),
  invoiceDueDays: readInteger('INVOICE_DUE_DAYS', 30, 0),
});

export const config: AppConfig = loadConfig();

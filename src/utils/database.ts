import { Pool } from 'pg';
import { config } from './config';

// Shared by the ledger store and the client directory; opened on first use.
let pool: Pool | null = null;

const getPool = (): Pool => {
  if (!pool) {
    if (!config.databaseUrl) {
      throw new Error('DATABASE_URL must be set before the ledger can reach PostgreSQL');
    }
    pool = new Pool({ connectionString: config.databaseUrl });
    // Idle clients that lose their connection report here.
    pool.on('error', (err) => {
      console.error('[Database] Idle client error:', err.message);
    });
  }
  return pool;
};

/**
 * Checks at startup that the ledger database answers before the API starts listening.
 *
 * @throws {Error} The driver error when PostgreSQL is unreachable
 */
const testConnection = async (): Promise<void> => {
  try {
    await getPool().query('SELECT 1');
    console.log('✅ Ledger database reachable.');
  } catch (err) {
    console.error('❌ Ledger database unreachable:', err);
    throw err;
  }
};

/**
 * @example
 * const store = new PgLedgerStore(getDbClient());
 */
const getDbClient = (): Pool => getPool();

/**
 * Drains the pool on shutdown. Safe to call when it was never opened.
 */
const closeDbConnection = async (): Promise<void> => {
  if (pool) {
    await pool.end();
    pool = null;
    console.log('✅ Ledger database pool closed.');
  }
};

export { testConnection, getDbClient, closeDbConnection };

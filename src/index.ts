import { createApp } from './app';
import { PgClientDirectory, PgLedgerStore } from './repositories/pg-ledger.store';
import { config } from './utils/config';
import { closeDbConnection, getDbClient, testConnection } from './utils/database';

const start = async (): Promise<void> => {
  await testConnection();

  const pool = getDbClient();
  const app = createApp({
    store: new PgLedgerStore(pool),
    clients: new PgClientDirectory(pool),
  });

  const server = app.listen(config.port, () => {
    console.log(`🚀 Ledger API listening on port ${config.port}`);
  });

  const shutdown = (signal: string): void => {
    console.log(`${signal} received, shutting down...`);
    server.close(() => {
      closeDbConnection()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error('❌ Error during shutdown:', err);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

start().catch((err: unknown) => {
  console.error('❌ Failed to start server:', err);
  process.exit(1);
});

import { createApp } from './app';
import { AuthHandlers } from './auth/handlers';
import { AuthService } from './auth/service';
import { config } from './config';
import { createPool, initialiseSchema, PgDatabase } from './db';
import type { Database } from './db';
import { InMemoryDatabase } from './memory/database';

async function openDatabase(): Promise<Database> {
  if (config.databaseDriver === 'memory') {
    if (config.nodeEnv === 'production') {
      throw new Error('Production mode requires DATABASE_DRIVER=postgres');
    }
    console.log('Using in-memory database; data is lost on restart');
    return new InMemoryDatabase();
  }

  const pool = createPool(config.database);
  const client = await pool.connect();
  console.log('Database connected successfully');
  client.release();

  await initialiseSchema(pool);
  return new PgDatabase(pool);
}

async function main(): Promise<void> {
  const database = await openDatabase();
  const authService = new AuthService(database, {
    hashIterations: config.auth.passwordHashIterations,
  });
  const app = createApp({
    handlers: new AuthHandlers(authService),
    sessionCookieName: config.auth.sessionCookieName,
    corsOrigin: config.corsOrigin,
  });

  const server = app.listen(config.port, () => {
    console.log(`Server is running on port ${config.port}`);
  });

  const shutdown = (signal: string): void => {
    console.log(`Received ${signal}, shutting down`);
    server.close(() => {
      database
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error('Failed to close database:', err);
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('Startup failed:', err);
  process.exit(1);
});

import type { Server } from 'http';
import { pathToFileURL } from 'url';
import dotenv from 'dotenv';
import type { Pool } from 'pg';
import { ConfigurationError } from '../../application/errors.js';
import { loadConfig, type AppConfig } from '../../config/env.js';
import { PasswordHasher } from '../../domain/auth/password.js';
import { createPool, pingDatabase } from '../db/pool.js';
import { PgUserRepo } from '../db/userRepo.js';
import { createLogger, type Logger } from '../logger.js';
import { createApp } from './app.js';

export interface RunningServer {
  server: Server;
  close: () => Promise<void>;
}

/**
 * Bring the service up: store reachable and hasher working before the port
 * opens. Anything failing here is a ConfigurationError.
 */
export async function startServer(config: AppConfig, logger: Logger): Promise<RunningServer> {
  const hasher = new PasswordHasher();
  const pool = createPool(config.db, logger);

  try {
    await pingDatabase(pool);
  } catch (error) {
    await pool.end();
    throw new ConfigurationError('Database unreachable at startup', { cause: error });
  }
  logger.info('Connected to the database');

  try {
    await hasher.selfTest();
  } catch (error) {
    await pool.end();
    throw error;
  }

  const app = createApp({
    userRepo: new PgUserRepo(pool),
    hasher,
    logger,
    checkHealth: () => pingDatabase(pool),
  });

  const server = await listen(app, config.http.host, config.http.port);
  logger.info('Server listening', {
    url: `http://${config.http.host}:${config.http.port}`,
    docs: `http://${config.http.host}:${config.http.port}/docs`,
  });

  return {
    server,
    close: () => shutdown(server, pool, logger),
  };
}

function listen(
  app: ReturnType<typeof createApp>,
  host: string,
  port: number
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}

async function shutdown(server: Server, pool: Pool, logger: Logger): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  await pool.end();
  logger.info('Server stopped');
}

async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();
  const logger = createLogger({
    level: config.logLevel,
    pretty: config.nodeEnv === 'development',
  });

  const running = await startServer(config, logger);

  const stop = (signal: NodeJS.Signals) => {
    logger.info('Shutting down', { signal });
    void running.close().catch((error: unknown) => {
      logger.error(error instanceof Error ? error : String(error), { signal });
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
}

if (process.argv[1] && pathToFileURL(process.argv[1]).href === import.meta.url) {
  // Startup failures leave nothing open, so the process ends on its own.
  main().catch((error: unknown) => {
    createLogger().error(error instanceof Error ? error : String(error), { fatal: true });
    process.exitCode = 1;
  });
}

/**
 * Process entry point.
 * Opens the store once, serves HTTP until SIGINT/SIGTERM, then drains
 * in-flight requests and releases the store.
 */

import { loadConfig, loadEnvFile } from './config.js';
import { withDatabase } from './db.js';
import { createContainer } from './container.js';
import { createRouter } from './api/router.js';
import { createHttpServer, listen, close } from './server.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { SupabaseEvaluationRepository } from './repositories/SupabaseEvaluationRepository.js';
import { PersistenceError } from './errors.js';

function shutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve('SIGINT'));
    process.once('SIGTERM', () => resolve('SIGTERM'));
  });
}

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  const logProvider = new ConsoleLogProvider({
    outputToConsole: true,
    minLevel: config.logLevel,
  });

  logProvider.info(`Starting ${config.appName} v${config.appVersion}`);

  await withDatabase(config, async (db) => {
    const evaluationRepo = new SupabaseEvaluationRepository(db.client, config.evaluationsTable);

    try {
      await evaluationRepo.ping();
      logProvider.info('Connected to evaluation store', { table: config.evaluationsTable });
    } catch (err) {
      // Keep serving; each request reports the failure on its own.
      logProvider.warn('Evaluation store unreachable at startup', {
        cause: err instanceof PersistenceError ? err.internalMessage : String(err),
      });
    }

    const container = createContainer({
      evaluationRepo,
      logProvider,
      app: { name: config.appName, version: config.appVersion },
      maxBodyBytes: config.maxBodyBytes,
    });
    const router = createRouter(container);
    const server = createHttpServer(router.handle, logProvider, {
      maxBodyBytes: config.maxBodyBytes,
    });

    const port = await listen(server, config.port, config.host);
    logProvider.info(`Listening on http://${config.host}:${port}`);

    const signal = await shutdownSignal();
    logProvider.info(`Received ${signal}, shutting down`);
    await close(server);
  });

  logProvider.info('Evaluation store released');
  await logProvider.flush();
}

main().catch((err: unknown) => {
  console.error('[FATAL]', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});

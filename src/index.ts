import { buildApp } from './app.js';
import { getConfig } from './config/index.js';
import { getDatabaseParams } from './config/database.js';
import { DbRegistry } from './db/db-registry.js';
import { loadDefaultJobOrders } from './services/job-order-defaults.js';
import { SettingsRepository } from './services/settings-repository.js';
import { createChildLogger } from './utils/logger.js';

const log = createChildLogger('server');

// Safety net: log unhandled rejections instead of crashing the process
process.on('unhandledRejection', (reason) => {
  log.error({ err: reason }, 'Unhandled promise rejection (process kept alive)');
});

async function main() {
  const config = getConfig();

  const registry = new DbRegistry({
    retry: {
      initialDelayMs: config.DB_CONNECT_RETRY_DELAY_MS,
      multiplier: config.DB_CONNECT_BACKOFF_MULTIPLIER,
      maxDelayMs: config.DB_CONNECT_MAX_DELAY_MS,
      maxAttempts: config.DB_CONNECT_MAX_ATTEMPTS,
    },
    poolMax: config.DB_POOL_MAX,
    statementTimeoutMs: config.DB_STATEMENT_TIMEOUT_MS,
  });

  let app: Awaited<ReturnType<typeof buildApp>> | undefined;

  try {
    for (const name of config.DB_NAMES) {
      registry.register(name, getDatabaseParams(name, config), config.DB_AUTO_COMMIT);
    }

    const repository = new SettingsRepository(registry, loadDefaultJobOrders(config.JOB_ORDER_DEFAULTS_PATH));
    const server = await buildApp({ config, registry, repository });
    app = server;
    server.addHook('onClose', async () => {
      await registry.close();
    });

    // Graceful shutdown
    const shutdown = async (signal: string) => {
      log.info({ signal }, 'Received shutdown signal');
      try {
        await server.close();
        log.info('Graceful shutdown complete');
        process.exit(0);
      } catch (err) {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));

    await server.listen({ port: config.PORT, host: config.HOST });
    log.info({ port: config.PORT, databases: registry.names() }, 'Server started');
  } catch (err) {
    log.fatal({ err }, 'Failed to start server');
    // The onClose hook closes the registry once the app exists
    await (app ? app.close() : registry.close());
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Startup failed');
  process.exit(1);
});

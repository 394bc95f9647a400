// This is the process entrypoint that loads configuration, starts the HTTP server, and handles graceful shutdown.

import { describeConfig, loadConfig, type AppConfig } from './config/config.js';
import { createServer } from './server.js';
import { JournalctlLogReader } from './systemd/journal-reader.js';
import { SystemctlUnitLister } from './systemd/unit-lister.js';
import { createLogger, errorForLog } from './utils/logger.js';

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  createLogger('error').fatal({ event: 'config_invalid', error: errorForLog(error) }, 'config_invalid');
  process.exit(1);
}

const adapterLogger = createLogger(config.logLevel).child({ component: 'systemd' });
const { app } = createServer({
  config,
  unitLister: new SystemctlUnitLister({ timeoutMs: config.adapterTimeoutMs, logger: adapterLogger }),
  logReader: new JournalctlLogReader({
    timeoutMs: config.adapterTimeoutMs,
    maxEntries: config.journalMaxEntries,
    logger: adapterLogger
  })
});

// This helper closes the listener so in-flight requests finish before the process exits.
async function shutdown(signal: string): Promise<void> {
  app.log.info({ event: 'shutdown_started', signal }, 'shutdown_started');

  try {
    await app.close();
    app.log.info({ event: 'shutdown_completed', signal }, 'shutdown_completed');
    process.exit(0);
  } catch (error) {
    app.log.error({ event: 'shutdown_failed', signal, error: errorForLog(error) }, 'shutdown_failed');
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

app
  .listen({ host: config.bindAddr, port: config.bindPort })
  .then(() => {
    app.log.info({ event: 'server_started', config: describeConfig(config) }, 'server_started');
  })
  .catch((error: unknown) => {
    app.log.error({ event: 'server_start_failed', error: errorForLog(error) }, 'server_start_failed');
    process.exit(1);
  });

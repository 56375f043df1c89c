import type { Server } from 'node:http';
import { createApp } from './app.js';
import { loadConfig } from './core/config.js';
import { getLogger } from './core/logger.js';
import { createRuntime } from './core/Orchestrator.js';

const log = getLogger('server');

export function main(): Server {
  const cfg = loadConfig();
  const orchestrator = createRuntime(cfg);
  const app = createApp(orchestrator, { log: getLogger('http') });

  const server = app.listen(cfg.port, () => {
    log.info('server_listening', {
      port: cfg.port,
      maxConcurrent: cfg.maxConcurrent,
      downloadDir: cfg.downloadDir,
      apiKeyRequired: Boolean(cfg.apiKey),
    });
  });

  let closing = false;
  const shutdown = (reason: string, exitCode = 0) => {
    if (closing) return;
    closing = true;
    log.info('shutdown_begin', { reason });

    const force = setTimeout(() => {
      log.error('shutdown_forced', { reason });
      process.exit(1);
    }, cfg.cancelGraceMs + 10_000);
    force.unref();

    server.close((err) => {
      if (err) log.warn('server_close_failed', { error: String(err) });
    });
    orchestrator.shutdown({ cancelRunning: true }).then(
      () => {
        log.info('shutdown_complete');
        process.exit(exitCode);
      },
      (err: unknown) => {
        log.error('shutdown_failed', { error: String(err) });
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('unhandledRejection', (reason) => {
    log.error('unhandled_rejection', { reason: reason instanceof Error ? reason.stack : String(reason) });
  });
  process.on('uncaughtException', (err) => {
    log.error('uncaught_exception', { error: err.stack || err.message });
    shutdown('uncaughtException', 1);
  });

  return server;
}

if (process.env.NODE_ENV !== 'test') {
  main();
}

#!/usr/bin/env node
import { loadConfig } from './config.js';
import { SetupError, SignalingGateway } from './gateway.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const gateway = new SignalingGateway({
    config,
    events: {
      onError: (message) => gateway.app.log.warn({ message }, 'client_error'),
    },
  });
  const log = gateway.app.log;

  let forceExitTimer: NodeJS.Timeout | null = null;

  async function shutdown(signal: string): Promise<void> {
    log.info({ signal, clients: gateway.clientCount }, 'Shutdown requested');

    forceExitTimer = setTimeout(() => {
      log.error({ graceMs: config.SHUTDOWN_GRACE_MS }, 'Graceful shutdown timed out; forcing exit');
      process.exit(1);
    }, config.SHUTDOWN_GRACE_MS);
    forceExitTimer.unref();

    gateway.stop();
    await gateway.join();
    process.exit(0);
  }

  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));

  try {
    await gateway.start();
  } catch (err) {
    if (!(err instanceof SetupError)) throw err;
    log.fatal({ err: err.message }, 'signaling gateway failed to start');
    process.exit(1);
  }

  process.once('exit', () => {
    if (forceExitTimer) clearTimeout(forceExitTimer);
  });
}

main().catch((err: unknown) => {
  // Configuration errors land here, before any logger exists.
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});

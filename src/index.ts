import { env } from './env';
import { log } from './log';
import { closeRedisClient } from './redis/client';
import { buildServer } from './server';

const SHUTDOWN_GRACE_MS = 10_000;

const { server, sessionManager, wss } = buildServer();

server.listen(env.PORT, () => {
  log.info({ event: 'server_listening', port: env.PORT }, 'server listening');
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ event: 'server_shutdown', signal }, 'shutting down');

  const forceExit = setTimeout(() => {
    log.error({ event: 'server_shutdown_timeout' }, 'shutdown timed out');
    process.exit(1);
  }, SHUTDOWN_GRACE_MS);
  forceExit.unref();

  await sessionManager.shutdown(`signal_${signal.toLowerCase()}`);
  wss.close();
  await new Promise<void>((resolve) => {
    server.close((error) => {
      if (error) {
        log.warn({ event: 'server_close_failed', err: error }, 'server close failed');
      }
      resolve();
    });
  });
  await closeRedisClient();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      log.error({ event: 'server_shutdown_failed', err: error }, 'shutdown failed');
      process.exit(1);
    });
  });
}

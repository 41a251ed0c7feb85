import { env } from './env';
import { log } from './log';
import { closeRedisClient } from './redis/client';
import { buildServer } from './server';

const { server, close } = buildServer();

server.listen(env.PORT, () => {
  log.info({ port: env.PORT }, 'server listening');
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  log.info({ signal }, 'shutting down');
  await close();
  await closeRedisClient();
  log.info('shutdown complete');
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error({ err: error }, 'shutdown failed');
        process.exit(1);
      });
  });
}

import { env } from './env';
import { log } from './log';
import { buildServer } from './server';

const { server, wss, sessionManager } = buildServer();

server.listen(env.PORT, () => {
  log.info({ port: env.PORT, public_base_url: env.PUBLIC_BASE_URL }, 'server listening');
});

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  log.info({ event: 'shutdown', signal, active_sessions: sessionManager.activeCount }, 'shutting down');

  await sessionManager.shutdown('shutdown');
  wss.close();
  server.close((error) => {
    if (error) {
      log.error({ err: error }, 'server close failed');
      process.exitCode = 1;
    }
  });
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      log.error({ err: error }, 'shutdown failed');
      process.exit(1);
    });
  });
}

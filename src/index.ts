import { buildRuntimeConfig } from './config';
import { env } from './env';
import { errorMessage } from './errors';
import { log } from './log';
import { createRuntime } from './runtime';
import { buildServer } from './server';

async function main(): Promise<void> {
  const config = buildRuntimeConfig(env);
  const runtime = await createRuntime(config, {
    onFatal: (error) => {
      log.fatal({ event: 'engine_fatal', err: error.message }, 'inference engine lost; exiting');
      process.exit(1);
    },
  });
  await runtime.start();

  const { server } = buildServer(runtime, { maxUploadBytes: config.ingest.maxUploadBytes });
  server.listen(config.port, () => {
    log.info({ port: config.port }, 'server listening');
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'shutting down');
    server.close();
    runtime
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error({ err: errorMessage(error) }, 'shutdown failed');
        process.exit(1);
      });
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((error: unknown) => {
  log.fatal({ err: errorMessage(error) }, 'startup failed');
  process.exit(1);
});

import { createApplication } from './application.js';

// -----------------------------------------------------------------------------
// Main Entry Point
// -----------------------------------------------------------------------------

async function main(): Promise<void> {
  const app = await createApplication();
  const { config, logger } = app;

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down');
    app.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    await app.start();
    logger.info(
      {
        rest: `http://${config.host}:${config.port}`,
        websocket: `ws://${config.host}:${config.port}/ws`,
        push: app.services.pushProvider.name,
      },
      'Key relay listening'
    );
  } catch (error) {
    logger.error({ err: error }, 'Failed to start');
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});

import 'dotenv/config';
import http from 'http';

import { createApp } from './app';
import { WS_PATH } from './realtime/connectionManager';
import { logger } from './utils/logger';

async function bootstrap(): Promise<void> {
  const context = await createApp();
  const { app, config, connections } = context;
  const server = http.createServer(app);
  connections.attach(server);

  server.listen(config.PORT, () => {
    logger.info('server', `Conversion engine listening on port ${config.PORT}`);
    logger.info('server', `Open http://${config.HOST}:${config.PORT}/ (real-time channel at ${WS_PATH})`);
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('server', `Received ${signal}, shutting down`);

    context
      .dispose()
      .then(
        (errors) =>
          new Promise<number>((resolve) => {
            server.close(() => resolve(errors.length > 0 ? 1 : 0));
          })
      )
      .then((code) => {
        process.exit(code);
      })
      .catch((error: unknown) => {
        logger.error('server', 'Shutdown failed', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

bootstrap().catch((error: unknown) => {
  logger.error('server', 'Failed to start server', error);
  process.exit(1);
});

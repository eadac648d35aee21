import { createLogger, errorMessage } from '@graphrun/shared';
import { loadConfig } from './config';
import { createServer } from './server';

const logger = createLogger({ name: 'graph-service' });

async function start() {
  try {
    const config = loadConfig();
    const server = await createServer({ config });

    await server.listen({ port: config.port, host: config.host });

    logger.info({ port: config.port, host: config.host }, 'Graph Service started');

    // Graceful shutdown
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
    signals.forEach((signal) => {
      process.once(signal, () => {
        logger.info(`Received ${signal}, closing server gracefully`);
        server.close().then(
          () => process.exit(0),
          (error: unknown) => {
            logger.error({ error: errorMessage(error) }, 'Failed to close server');
            process.exit(1);
          }
        );
      });
    });
  } catch (err) {
    logger.error(err, 'Failed to start server');
    process.exit(1);
  }
}

void start();

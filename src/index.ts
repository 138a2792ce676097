
import 'module-alias/register';
import './pre-start'; // Must be the first import
import logger from 'jet-logger';
import env from './config/env';
import server from './server';
import { catalogStore } from './lib/inventory/catalog-store';

// **** Run **** //

const SERVER_START_MSG = 'Express server started on port: ' + env.PORT;

const startServer = async () => {
  try {
    await catalogStore.reload(env.LISTINGS_SOURCE);
  } catch {
    // Keep serving: an inventory can still be loaded through the API
    logger.err(`No se pudo cargar el inventario inicial (${env.LISTINGS_SOURCE})`);
  }

  const httpServer = server.listen(env.PORT, () => logger.info(SERVER_START_MSG));

  const gracefulShutdown = () => {
    logger.info('Shutting down gracefully...');
    httpServer.close((error) => {
      if (error) {
        logger.err(`Error during shutdown: ${error.message}`);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGTERM', gracefulShutdown);
  process.on('SIGINT', gracefulShutdown);
};

startServer().catch((error: unknown) => {
  logger.err(`Failed to start server: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});

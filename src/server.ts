import { buildApp } from './app.js';
import { appConfig } from './core/env.js';

const app = await buildApp();

try {
  await app.listen({
    host: appConfig.HOST,
    port: appConfig.PORT
  });

  app.log.info(
    { heightClock: appConfig.HEIGHT_CLOCK, storage: appConfig.hasDatabaseConfig ? 'postgres' : 'memory' },
    'Insurance ledger ready'
  );
} catch (error) {
  app.log.error({ err: error }, 'Failed to start server');
  process.exit(1);
}

const gracefulShutdown = async () => {
  try {
    await app.close();
    process.exit(0);
  } catch (error) {
    app.log.error({ err: error }, 'Error during shutdown');
    process.exit(1);
  }
};

process.on('SIGINT', () => void gracefulShutdown());
process.on('SIGTERM', () => void gracefulShutdown());

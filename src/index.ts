import 'dotenv/config';
import { env } from './config/env';
import { initializeDatabase, closeDatabase } from './database';
import { seedDefaultData } from './database/seed';
import { getRepositories } from './repositories';
import { getAuthServices } from './services';
import { createApp } from './app';
import { Logger } from './utils/logger';

async function startServer(): Promise<void> {
  await initializeDatabase();

  const services = getAuthServices();

  if (env.SEED_DEMO_DATA && env.NODE_ENV !== 'production') {
    await seedDefaultData(getRepositories(), services.hasher, {
      adminPassword: process.env.SEED_ADMIN_PASSWORD || 'admin123',
    });
  }

  services.cleanup.start();

  const app = createApp(services.session);
  const server = app.listen(env.PORT, () => {
    Logger.info(`Server is running on http://localhost:${env.PORT}`);
    Logger.info(`Swagger documentation available at http://localhost:${env.PORT}/api-docs`);
  });

  const shutdown = (signal: string): void => {
    Logger.info('Shutting down', { signal });
    services.cleanup.stop();
    server.close(() => {
      closeDatabase()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          Logger.error('Error while closing database', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

startServer().catch((error: unknown) => {
  Logger.error('Failed to start server', error);
  process.exit(1);
});

import 'reflect-metadata';
import { createApp } from './app';
import { bootstrap } from './bootstrap';
import { config } from './config';
import { createLogger } from './logger';
import AppDataSource from './ormconfig';
import { createServices } from './services';

const log = createLogger('server');

async function main() {
  await AppDataSource.initialize();
  log.info('DB initialized');

  if (config.database.runMigrationsOnStart) {
    log.info('Running migrations...');
    await AppDataSource.runMigrations();
    log.info('Migrations complete');
  }

  const services = createServices(AppDataSource);
  await bootstrap(AppDataSource, services);

  const app = createApp(AppDataSource, services);
  app.listen(config.port, () => log.info(`Server listening at http://localhost:${config.port}`));
}

main().catch((err) => {
  log.error('Startup error', err);
  process.exit(1);
});

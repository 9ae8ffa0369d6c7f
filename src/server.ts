import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), './.env') });

import { createApp } from './app';
import { loadConfig } from './config';
import { seedCollections } from './seeds/seed';
import { createServices } from './services';

async function main() {
  const config = loadConfig();
  const services = createServices(config);

  if (config.seedOnStart) {
    await seedCollections(services.store);
  }
  console.log(`Data directory: ${config.dataDir}`);

  const app = createApp(config, services);
  const server = app.listen(config.port, config.host, () => {
    console.log(`Server listening at http://${config.host}:${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, shutting down`);
    server.close((err) => {
      if (err) {
        console.error('Error while closing server', err);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  console.error('Startup error', err);
  process.exit(1);
});

import { buildApp } from './app';
import { loadConfig } from './config';
import { createLogger } from './middleware/logger';
import { seedSchema } from './schemas';
import seedData from './data/seed.json';

const config = loadConfig();
const logger = createLogger(config);
const seed = seedSchema.parse(seedData);

const app = buildApp({ config, logger, seed });

const start = async () => {
  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, 'shutting down');
    app.close().then(
      () => process.exit(0),
      err => {
        app.log.error(err);
        process.exit(1);
      }
    );
  });
}

void start();

import { buildServices, createApp } from './app';
import { loadConfigFromEnv } from './config';
import { openDatabase } from './db';
import { createLogger } from './logger';

// config errors surface here, before the server accepts anything
const config = loadConfigFromEnv();
const logger = createLogger({ level: config.log.level, format: config.log.format });
const db = openDatabase(config.dataFile);

const app = createApp(buildServices(config, { db, logger }));

app.listen(config.port, () => {
  logger.info(`listening http://localhost:${config.port}`, {
    staticToken: config.staticAccessToken !== undefined,
    oauth: config.oauth !== undefined,
    accounts: config.jwt.secret !== undefined,
  });
});

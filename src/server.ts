import { Server } from 'http';
import { config } from './config';
import { createRedisClient } from './config/redis';
import { createRedisCommands, RedisPremiumStore } from './models/premium-table.model';
import { PremiumService } from './services/premium.service';
import App from './app';
import logger from './utils/logger';
import { setupShutdownHandlers } from './utils/shutdown';

const redis = createRedisClient(config.redis);
const store = new RedisPremiumStore(createRedisCommands(redis), config.redis.keyPrefix);
const premiumService = new PremiumService(store, config.tables);
const { app } = new App(config, premiumService);

const server: Server = app.listen(config.port, config.host, () => {
  logger.info('Premium API started', {
    host: config.host,
    port: config.port,
    environment: config.nodeEnv,
    tables: config.tables.path,
    swaggerUI: '/api-docs',
  });
});

const closeServer = (): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });

setupShutdownHandlers(async () => {
  await closeServer();
  await store.close();
});

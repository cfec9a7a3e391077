import Redis from 'ioredis';
import { RedisConfig } from './index';
import logger from '../utils/logger';

export const createRedisClient = (redisConfig: RedisConfig): Redis => {
  const client = new Redis({
    host: redisConfig.host,
    port: redisConfig.port,
    password: redisConfig.password,
    db: redisConfig.db,
    lazyConnect: true,
    maxRetriesPerRequest: 2,
  });

  client.on('ready', () => {
    logger.info('Redis connection ready', { host: redisConfig.host, port: redisConfig.port, db: redisConfig.db });
  });

  client.on('error', (error: Error) => {
    logger.error('Redis connection error', { host: redisConfig.host, port: redisConfig.port, error: error.message });
  });

  return client;
};

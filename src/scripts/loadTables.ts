import { config } from '../config';
import { createRedisClient } from '../config/redis';
import { createRedisCommands, RedisPremiumStore } from '../models/premium-table.model';
import { PremiumService } from '../services/premium.service';
import logger, { errorMeta } from '../utils/logger';
import { parseArgs } from './args';

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2), { file: config.tables.path, sheet: config.tables.sheet });
  const store = new RedisPremiumStore(createRedisCommands(createRedisClient(config.redis)), config.redis.keyPrefix);
  const service = new PremiumService(store, { path: options.file, sheet: options.sheet });

  try {
    if (options.unload) {
      const { deleted } = await service.unload();
      logger.info(`Removed ${deleted} premium table key(s)`);
    } else {
      const { keys, entries } = await service.load();
      logger.info(`Loaded ${entries} premium(s) into ${keys} key(s)`, { file: options.file, sheet: options.sheet });
    }
  } finally {
    await store.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Premium table script failed', errorMeta(error));
    process.exitCode = 1;
  });
}

import { LoadSummary, PremiumTableEntry } from '../types/premium.types';

export interface PremiumStore {
  replaceAll(entries: PremiumTableEntry[]): Promise<LoadSummary>;
  findPremiums(code: string, sumInsured: string, band: number): Promise<string[]>;
  countKeys(): Promise<number>;
  clear(): Promise<number>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export interface ScoredMember {
  score: number;
  member: string;
}

/**
 * The handful of Redis operations the matrix needs. Kept narrow so the store
 * can run against a fake in tests.
 */
export interface RedisCommands {
  replaceSortedSets(sets: Map<string, ScoredMember[]>): Promise<void>;
  rangeByScore(key: string, min: number, max: number): Promise<string[]>;
  scanKeys(pattern: string): Promise<string[]>;
  del(keys: string[]): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<void>;
}

export interface RedisTransaction {
  del(key: string): unknown;
  zadd(key: string, score: number, member: string): unknown;
  exec(): Promise<Array<[error: Error | null, result: unknown]> | null>;
}

/** The slice of an ioredis client that `createRedisCommands` drives. */
export interface RedisClient {
  status: string;
  multi(): RedisTransaction;
  zrangebyscore(key: string, min: number, max: number): Promise<string[]>;
  scan(
    cursor: string,
    matchToken: 'MATCH',
    pattern: string,
    countToken: 'COUNT',
    count: number
  ): Promise<[cursor: string, keys: string[]]>;
  del(...keys: string[]): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
  disconnect(): void;
}

export const SCAN_COUNT = 500;

export const createRedisCommands = (redis: RedisClient): RedisCommands => ({
  replaceSortedSets: async (sets) => {
    const transaction = redis.multi();
    for (const [key, members] of sets) {
      transaction.del(key);
      for (const { score, member } of members) {
        transaction.zadd(key, score, member);
      }
    }

    const results = await transaction.exec();
    if (results === null) {
      throw new Error('Redis transaction was aborted');
    }
    for (const [error] of results) {
      if (error) {
        throw error;
      }
    }
  },
  rangeByScore: (key, min, max) => redis.zrangebyscore(key, min, max),
  scanKeys: async (pattern) => {
    const keys: string[] = [];
    let cursor = '0';
    do {
      const [next, batch] = await redis.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_COUNT);
      keys.push(...batch);
      cursor = next;
    } while (cursor !== '0');
    return keys;
  },
  del: async (keys) => (keys.length === 0 ? 0 : redis.del(...keys)),
  ping: () => redis.ping(),
  quit: async () => {
    // a lazy client that never connected has nothing to flush
    if (redis.status === 'wait' || redis.status === 'end') {
      redis.disconnect();
      return;
    }
    await redis.quit();
  },
});

// Glob metacharacters SCAN MATCH would otherwise interpret in the prefix
const escapePattern = (value: string): string => value.replace(/[*?[\]\\]/g, '\\$&');

const DEL_BATCH = 500;

/**
 * Rate matrix held as one sorted set per `code:sumInsured`. Each member is
 * `<band>:<premium>` scored by its band, so a band lookup is a single
 * ZRANGEBYSCORE and equal premiums in different bands stay distinct.
 */
export class RedisPremiumStore implements PremiumStore {
  constructor(
    private commands: RedisCommands,
    private keyPrefix = 'premium:'
  ) {}

  keyFor(code: string, sumInsured: string): string {
    return `${this.keyPrefix}${code}:${sumInsured}`;
  }

  async replaceAll(entries: PremiumTableEntry[]): Promise<LoadSummary> {
    const sets = new Map<string, ScoredMember[]>();
    for (const entry of entries) {
      const key = this.keyFor(entry.code, entry.sumInsured);
      const members = sets.get(key) ?? [];
      members.push({ score: entry.band, member: `${entry.band}:${entry.premium}` });
      sets.set(key, members);
    }

    await this.commands.replaceSortedSets(sets);
    return { keys: sets.size, entries: entries.length };
  }

  async findPremiums(code: string, sumInsured: string, band: number): Promise<string[]> {
    const members = await this.commands.rangeByScore(this.keyFor(code, sumInsured), band, band);
    return members.map((member) => {
      const separator = member.indexOf(':');
      return separator === -1 ? member : member.slice(separator + 1);
    });
  }

  async countKeys(): Promise<number> {
    const keys = await this.commands.scanKeys(`${escapePattern(this.keyPrefix)}*`);
    return new Set(keys).size;
  }

  async clear(): Promise<number> {
    const keys = [...new Set(await this.commands.scanKeys(`${escapePattern(this.keyPrefix)}*`))];
    let deleted = 0;
    for (let i = 0; i < keys.length; i += DEL_BATCH) {
      deleted += await this.commands.del(keys.slice(i, i + DEL_BATCH));
    }
    return deleted;
  }

  async ping(): Promise<boolean> {
    return (await this.commands.ping()) === 'PONG';
  }

  async close(): Promise<void> {
    await this.commands.quit();
  }
}

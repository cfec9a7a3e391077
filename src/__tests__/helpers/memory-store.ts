import { expect } from 'vitest';
import { PremiumStore } from '../../models/premium-table.model';
import { LoadSummary, PremiumErrorCode, PremiumTableEntry } from '../../types/premium.types';
import { PremiumError } from '../../utils/errors';

export class InMemoryPremiumStore implements PremiumStore {
  public entries = new Map<string, PremiumTableEntry[]>();
  public failure?: Error;
  public closed = false;

  private check(): void {
    if (this.failure) {
      throw this.failure;
    }
  }

  async replaceAll(entries: PremiumTableEntry[]): Promise<LoadSummary> {
    this.check();
    const grouped = new Map<string, PremiumTableEntry[]>();
    for (const entry of entries) {
      const key = `${entry.code}:${entry.sumInsured}`;
      grouped.set(key, [...(grouped.get(key) ?? []), entry]);
    }
    for (const [key, group] of grouped) {
      this.entries.set(key, group);
    }
    return { keys: grouped.size, entries: entries.length };
  }

  async findPremiums(code: string, sumInsured: string, band: number): Promise<string[]> {
    this.check();
    return (this.entries.get(`${code}:${sumInsured}`) ?? [])
      .filter((entry) => entry.band === band)
      .map((entry) => entry.premium);
  }

  async countKeys(): Promise<number> {
    this.check();
    return this.entries.size;
  }

  async clear(): Promise<number> {
    this.check();
    const deleted = this.entries.size;
    this.entries.clear();
    return deleted;
  }

  async ping(): Promise<boolean> {
    this.check();
    return true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

const BANDS = [1, 2, 3, 4, 5, 6, 7];

export const sampleEntries = (): PremiumTableEntry[] => [
  ...[450, 600, 750, 980, 1250, 1600, 2100].map((premium, index) => ({
    code: '1A',
    sumInsured: '100000',
    band: BANDS[index],
    premium: String(premium),
  })),
  ...[800, 1050, 1300, 1700, 2150, 2750, 3600].map((premium, index) => ({
    code: '1A',
    sumInsured: '200000',
    band: BANDS[index],
    premium: String(premium),
  })),
];

export const expectPremiumError = async (promise: Promise<unknown>, code: PremiumErrorCode): Promise<PremiumError> => {
  let caught: unknown;
  try {
    await promise;
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(PremiumError);
  if (!(caught instanceof PremiumError)) {
    throw new Error('Expected a PremiumError');
  }
  expect(caught.code).toBe(code);
  return caught;
};

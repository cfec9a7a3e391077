import { PremiumStore } from '../models/premium-table.model';
import { TablesConfig } from '../config';
import {
  LoadSummary,
  PremiumQuote,
  PremiumRequest,
  PremiumTableEntry,
  TableStatus,
  UnloadSummary,
} from '../types/premium.types';
import { PremiumError } from '../utils/errors';
import logger, { errorMeta } from '../utils/logger';
import { ageBand, calculateAge } from './age.service';
import { readPremiumTable } from './workbook.service';

export type TableReader = (file: string, sheet: string) => Promise<PremiumTableEntry[]>;

export class PremiumService {
  constructor(
    private store: PremiumStore,
    private tables: TablesConfig,
    private clock: () => Date = () => new Date(),
    private readTable: TableReader = readPremiumTable
  ) {}

  async calculate(request: PremiumRequest): Promise<PremiumQuote> {
    const now = this.clock();
    const age = calculateAge(request.dateOfBirth, now);
    const band = ageBand(age);

    logger.debug('Age band resolved', { code: request.code, age, band });

    if (band === 0) {
      logger.warn('Applicant age outside insurable bands', { code: request.code, age });
      throw PremiumError.riskCalculation();
    }

    let premiums: string[];
    try {
      premiums = await this.store.findPremiums(request.code, request.sumInsured, band);
    } catch (error) {
      logger.error('Premium lookup failed', { code: request.code, sumInsured: request.sumInsured, band, ...errorMeta(error) });
      throw PremiumError.internal();
    }

    if (premiums.length !== 1) {
      logger.error('Expected exactly one premium for band', {
        code: request.code,
        sumInsured: request.sumInsured,
        band,
        found: premiums.length,
      });
      throw PremiumError.riskCalculation();
    }

    return {
      code: request.code,
      sumInsured: request.sumInsured,
      age,
      ageBand: band,
      premium: premiums[0],
      calculatedAt: now.toISOString(),
    };
  }

  async load(): Promise<LoadSummary> {
    try {
      const entries = await this.readTable(this.tables.path, this.tables.sheet);
      const summary = await this.store.replaceAll(entries);
      logger.info('Premium tables loaded', { ...summary, file: this.tables.path, sheet: this.tables.sheet });
      return summary;
    } catch (error) {
      logger.error('Premium tables load failed', { file: this.tables.path, sheet: this.tables.sheet, ...errorMeta(error) });
      throw PremiumError.internal();
    }
  }

  async unload(): Promise<UnloadSummary> {
    try {
      const deleted = await this.store.clear();
      logger.info('Premium tables unloaded', { deleted });
      return { deleted };
    } catch (error) {
      logger.error('Premium tables unload failed', errorMeta(error));
      throw PremiumError.internal();
    }
  }

  async status(): Promise<TableStatus> {
    try {
      const keys = await this.store.countKeys();
      return { loaded: keys > 0, keys };
    } catch (error) {
      logger.error('Premium tables check failed', errorMeta(error));
      throw PremiumError.internal();
    }
  }

  async isStoreReachable(): Promise<boolean> {
    try {
      return await this.store.ping();
    } catch (error) {
      logger.warn('Premium store ping failed', errorMeta(error));
      return false;
    }
  }
}

import path from 'path';
import { Workbook, Row } from 'exceljs';
import { PremiumTableEntry } from '../types/premium.types';
import { PremiumTableError } from '../utils/errors';
import logger from '../utils/logger';

// Worksheet columns, 1-based as exceljs numbers them
const CODE_COLUMN = 1;
const SUM_INSURED_COLUMN = 2;
const PREMIUM_COLUMN = 4;

const isPremium = (value: string): boolean =>
  value !== '' && Number.isFinite(Number(value)) && Number(value) >= 0;

const cellText = (row: Row, column: number): string => row.getCell(column).text.trim();

/**
 * Reads the rate matrix from a workbook. Each row holds a code, a sum
 * insured, an informational band label and a premium; rows sharing a code
 * and sum insured are numbered into age bands 1, 2, ... in sheet order.
 */
export const readPremiumTable = async (file: string, sheetName: string): Promise<PremiumTableEntry[]> => {
  const resolved = path.resolve(file);
  const workbook = new Workbook();

  try {
    await workbook.xlsx.readFile(resolved);
  } catch (error) {
    throw new PremiumTableError(
      `Cannot open workbook ${resolved}: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }

  const sheet = workbook.getWorksheet(sheetName);
  if (!sheet) {
    throw new PremiumTableError(`Worksheet ${sheetName} not found in ${resolved}`);
  }

  const rows: Array<{ row: Row; rowNumber: number }> = [];
  sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    rows.push({ row, rowNumber });
  });

  const entries: PremiumTableEntry[] = [];
  const bands = new Map<string, number>();

  rows.forEach(({ row, rowNumber }, index) => {
    const code = cellText(row, CODE_COLUMN);
    const sumInsured = cellText(row, SUM_INSURED_COLUMN);
    const premium = cellText(row, PREMIUM_COLUMN);

    if (index === 0 && !isPremium(premium)) {
      logger.debug('Skipping premium table header', { rowNumber });
      return;
    }
    if (code === '' && sumInsured === '' && premium === '') {
      return;
    }
    if (code === '' || sumInsured === '') {
      throw new PremiumTableError(`Row ${rowNumber}: code and sum insured are required`);
    }
    if (!isPremium(premium)) {
      throw new PremiumTableError(`Row ${rowNumber}: premium "${premium}" is not a number`);
    }

    const key = `${code}:${sumInsured}`;
    const band = (bands.get(key) ?? 0) + 1;
    bands.set(key, band);
    entries.push({ code, sumInsured, band, premium: String(Number(premium)) });
  });

  logger.info('Premium table read', { file: resolved, sheet: sheetName, entries: entries.length, keys: bands.size });
  return entries;
};

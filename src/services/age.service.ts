import { PremiumError } from '../utils/errors';

const DATE_OF_BIRTH = /^(\d{4})-(\d{2})-(\d{2})$/;

interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export const parseDateOfBirth = (value: string): CalendarDate => {
  const match = DATE_OF_BIRTH.exec(value);
  if (!match) {
    throw PremiumError.invalidInput([{ field: 'dateOfBirth', message: 'Date of birth must be YYYY-MM-DD' }]);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  // Years 0-99 stay as written; 2023-02-30 rolls into March and fails the round trip
  const probe = new Date(0);
  probe.setUTCFullYear(year, month - 1, day);
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    throw PremiumError.invalidInput([{ field: 'dateOfBirth', message: 'Date of birth is not a calendar date' }]);
  }

  return { year, month, day };
};

/**
 * Completed years between the date of birth and `today`, using the local
 * calendar date of `today`.
 */
export const calculateAge = (dateOfBirth: string, today: Date = new Date()): number => {
  const born = parseDateOfBirth(dateOfBirth);
  const month = today.getMonth() + 1;
  const day = today.getDate();

  let years = today.getFullYear() - born.year;
  if (month < born.month || (month === born.month && day < born.day)) {
    years -= 1;
  }
  return years;
};

// Upper bound of each band, inclusive. Anything above the last bound is band 7.
const BAND_LIMITS = [35, 45, 55, 60, 65, 70];

export const MIN_INSURABLE_AGE = 18;

export const ageBand = (age: number): number => {
  if (!Number.isInteger(age) || age < MIN_INSURABLE_AGE) {
    return 0;
  }
  const index = BAND_LIMITS.findIndex((limit) => age <= limit);
  return index === -1 ? BAND_LIMITS.length + 1 : index + 1;
};

import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';

dayjs.extend(customParseFormat);

const ISO_FORMAT = 'YYYY-MM-DD';

const ACCEPTED_FORMATS = [
  ISO_FORMAT,
  'DD/MM/YYYY',
  'DD/MM/YY',
  'D MMM YYYY',
  'DD MMM YYYY',
  'D MMMM YYYY',
  'DD MMMM YYYY',
];

const repeatingWhitespace = /\s+/g;

/** Strictly parses a statement date and returns it as an ISO date, or null. */
export const parseStatementDate = (input: string): string | null => {
  const cleaned = input.trim().replace(repeatingWhitespace, ' ');
  if (!cleaned) {
    return null;
  }

  for (const format of ACCEPTED_FORMATS) {
    const parsed = dayjs(cleaned, format, true);
    if (parsed.isValid()) {
      return parsed.format(ISO_FORMAT);
    }
  }

  return null;
};

export const addDays = (isoDate: string, days: number): string =>
  dayjs(isoDate, ISO_FORMAT, true).add(days, 'day').format(ISO_FORMAT);

export const compareIsoDates = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export const maxIsoDate = (a: string, b: string): string => (compareIsoDates(a, b) >= 0 ? a : b);

export const minIsoDate = (a: string, b: string): string => (compareIsoDates(a, b) <= 0 ? a : b);

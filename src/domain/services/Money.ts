const unicodeMinus = /[−–—]/g;
const groupingAndSymbols = /[£$€,\s ]/g;
const trailingMarker = /\s*(CR|DR|CREDIT|DEBIT)\.?$/i;
const plainDecimal = /^[+-]?\d+(?:\.\d{1,2})?$/;

export type MoneyInput = string | number | null | undefined;

export const isBlankMoney = (value: MoneyInput): boolean =>
  value === null || value === undefined || (typeof value === 'string' && value.trim() === '');

/**
 * Parses a statement amount into a 2dp number. Accepts the usual UK statement
 * spellings: "£1,234.56", "(12.34)", "12.50 DR", "1,000.00 CR", unicode minus.
 * Returns null for anything that is not a minor-unit precise number; values are
 * never rounded into shape.
 */
export const parseMoney = (value: string | number): number | null => {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return null;
    }
    const cents = value * 100;
    if (Math.abs(cents - Math.round(cents)) > 1e-6) {
      return null;
    }
    return fromMinorUnits(Math.round(cents));
  }

  let text = value.trim().replace(unicodeMinus, '-');
  let negative = false;

  const marker = text.match(trailingMarker);
  if (marker) {
    negative = /^D/i.test(marker[1]);
    text = text.slice(0, marker.index).trim();
  }

  if (text.startsWith('(') && text.endsWith(')')) {
    negative = true;
    text = text.slice(1, -1);
  }

  text = text.replace(groupingAndSymbols, '');
  // "-£5.00" leaves "-5.00", "£-5.00" as well
  if (!plainDecimal.test(text)) {
    return null;
  }

  const parsed = Number(text);
  return negative ? -Math.abs(parsed) : parsed;
};

export const toMinorUnits = (value: number): number => Math.round(value * 100);

export const fromMinorUnits = (minor: number): number => {
  const value = minor / 100;
  return Object.is(value, -0) ? 0 : value;
};

export const sumMinorUnits = (values: readonly number[]): number =>
  values.reduce((total, value) => total + toMinorUnits(value), 0);

export const formatMoney = (value: number): string => {
  const sign = value < 0 ? '-' : '';
  return `${sign}${Math.abs(value).toFixed(2)}`;
};

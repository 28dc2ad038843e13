import { CanonicalTransaction } from '../entities/CanonicalTransaction.js';
import { compareIsoDates } from './StatementDate.js';

/**
 * The one sort key of a ledger: transaction date, then the start of the period
 * the row came from (unknown starts last), then the row's position within its
 * source document. Period id settles the remaining ties so the order never
 * depends on input order.
 */
export const compareLedgerOrder = (
  a: CanonicalTransaction,
  b: CanonicalTransaction,
  periodStarts: ReadonlyMap<string, string | null>,
): number => {
  const byDate = compareIsoDates(a.date, b.date);
  if (byDate !== 0) {
    return byDate;
  }

  const startA = periodStarts.get(a.sourcePeriodId) ?? null;
  const startB = periodStarts.get(b.sourcePeriodId) ?? null;
  if (startA !== startB) {
    if (startA === null) return 1;
    if (startB === null) return -1;
    const byStart = compareIsoDates(startA, startB);
    if (byStart !== 0) {
      return byStart;
    }
  }

  if (a.sourcePeriodId === b.sourcePeriodId) {
    return a.sequenceIndex - b.sequenceIndex;
  }

  const bySequence = a.sequenceIndex - b.sequenceIndex;
  if (bySequence !== 0) {
    return bySequence;
  }
  return a.sourcePeriodId < b.sourcePeriodId ? -1 : 1;
};

export const buildPeriodStartIndex = (
  periods: readonly { periodId: string; startDate: string | null }[],
): Map<string, string | null> => new Map(periods.map((period) => [period.periodId, period.startDate]));

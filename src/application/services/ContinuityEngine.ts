import { CanonicalTransaction, toTransactionRef } from '../../domain/entities/CanonicalTransaction.js';
import {
  BalanceMismatch,
  ContinuityReport,
  ContinuityStatus,
  DateRange,
  DuplicateCandidate,
  Gap,
  Overlap,
  PeriodLink,
  PeriodSummary,
  RunningBalanceBreak,
  StatementTotalsCheck,
  UncheckedReason,
} from '../../domain/entities/ContinuityReport.js';
import { Ledger } from '../../domain/entities/Ledger.js';
import { StatementPeriod } from '../../domain/entities/StatementPeriod.js';
import { ReconciliationInputError } from '../../domain/errors/PipelineError.js';
import { buildPeriodStartIndex, compareLedgerOrder } from '../../domain/services/LedgerOrdering.js';
import { fromMinorUnits, sumMinorUnits, toMinorUnits } from '../../domain/services/Money.js';
import { addDays, compareIsoDates, maxIsoDate, minIsoDate } from '../../domain/services/StatementDate.js';
import { logger } from '../../infrastructure/logging/Logger.js';

export interface ContinuityEngineOptions {
  /** Allowed |delta| in minor units. Defaults to 0: exact equality. */
  balanceToleranceMinorUnits?: number;
}

interface OrderedPeriod {
  period: StatementPeriod;
  start: string;
  end: string;
  endInferred: boolean;
}

interface PeriodCheck {
  summary: PeriodSummary;
  breaks: RunningBalanceBreak[];
  comparisons: number;
}

interface BoundaryWalk {
  gaps: Gap[];
  overlaps: Overlap[];
  overlapPairs: Array<{ window: DateRange; periodIds: [string, string] }>;
  balanceMismatches: BalanceMismatch[];
  links: PeriodLink[];
  unverifiedBoundaries: number;
  comparisons: number;
}

/**
 * Stitches the normalized statement periods of one account into a single
 * ledger and a continuity report. Findings are data, never exceptions: the
 * engine always returns every input row in ledger order.
 */
export class ContinuityEngine {
  private readonly toleranceMinorUnits: number;

  constructor(options: ContinuityEngineOptions = {}) {
    this.toleranceMinorUnits = options.balanceToleranceMinorUnits ?? 0;
  }

  reconcile(periods: readonly StatementPeriod[]): Ledger {
    this.assertReconcilable(periods);

    const orderable = periods
      .flatMap((period) => (period.startDate === null ? [] : [this.toOrderedPeriod(period, period.startDate)]))
      .sort(compareOrderedPeriods);
    const unorderable = periods
      .filter((period) => period.startDate === null)
      .sort((a, b) => (a.periodId < b.periodId ? -1 : 1));

    const checks = [...orderable.map((entry) => entry.period), ...unorderable].map((period) =>
      this.checkWithinPeriod(period, orderable.find((entry) => entry.period === period)),
    );

    const walk = this.walkBoundaries(orderable);

    const transactions = this.merge(periods);
    const duplicateCandidates = this.findDuplicateCandidates(transactions, walk.overlapPairs);

    const runningBalanceBreaks = checks.flatMap((check) => check.breaks);
    const totalsMismatch = checks.some((check) => check.summary.totalsCheck.status === 'mismatch');
    const comparisons = walk.comparisons + checks.reduce((total, check) => total + check.comparisons, 0);

    const uncheckedReasons: UncheckedReason[] = [];
    if (comparisons === 0) uncheckedReasons.push('balances_not_found');
    if (unorderable.length > 0) uncheckedReasons.push('unorderable_periods');
    if (walk.unverifiedBoundaries > 0) uncheckedReasons.push('boundary_unverified');

    const extractorVersions = Array.from(new Set(periods.map((period) => period.extractorVersion))).sort();

    const report: ContinuityReport = deepFreeze({
      coveredPeriods: checks.map((check) => check.summary),
      gaps: walk.gaps,
      overlaps: walk.overlaps,
      balanceMismatches: walk.balanceMismatches,
      runningBalanceBreaks,
      duplicateCandidates,
      duplicateStatements: findDuplicateStatements(periods),
      links: walk.links,
      unorderablePeriodIds: unorderable.map((period) => period.periodId),
      extractorVersions,
      mixedExtractorVersions: extractorVersions.length > 1,
      uncheckedReasons,
      overallStatus: deriveStatus({
        uncheckedReasons,
        hasMismatch: walk.balanceMismatches.length > 0 || runningBalanceBreaks.length > 0 || totalsMismatch,
        hasGap: walk.gaps.length > 0,
      }),
    });

    const ordered = [...orderable.map((entry) => entry.period), ...unorderable];
    const accountId = ordered[0].accountId;

    logger.debug('Reconciled account', {
      account_id: accountId,
      period_count: periods.length,
      transaction_count: transactions.length,
      status: report.overallStatus,
      gaps: report.gaps.length,
      balance_mismatches: report.balanceMismatches.length,
      duplicate_candidates: report.duplicateCandidates.length,
    });

    return Object.freeze({
      accountId,
      institution: ordered[0].institution,
      holderName: ordered.find((period) => period.holderName !== null)?.holderName ?? null,
      periods: Object.freeze(ordered),
      transactions: Object.freeze(transactions),
      report,
    });
  }

  private assertReconcilable(periods: readonly StatementPeriod[]): void {
    if (periods.length === 0) {
      throw new ReconciliationInputError('At least one statement period is required');
    }

    const [first] = periods;
    const foreign = periods.find(
      (period) => period.accountId !== first.accountId || period.institution !== first.institution,
    );
    if (foreign) {
      throw new ReconciliationInputError('All periods of a reconciliation must belong to one account', {
        expected: { accountId: first.accountId, institution: first.institution },
        received: { accountId: foreign.accountId, institution: foreign.institution, periodId: foreign.periodId },
      });
    }

    const seen = new Set<string>();
    for (const period of periods) {
      if (seen.has(period.periodId)) {
        throw new ReconciliationInputError(`Period ${period.periodId} was supplied more than once`, {
          periodId: period.periodId,
        });
      }
      seen.add(period.periodId);
    }
  }

  private toOrderedPeriod(period: StatementPeriod, start: string): OrderedPeriod {
    if (period.endDate !== null) {
      return { period, start, end: period.endDate, endInferred: false };
    }

    // No declared end: the period covers at least up to its last transaction.
    const lastTransaction = period.transactions.reduce<string>(
      (latest, txn) => maxIsoDate(latest, txn.date),
      start,
    );
    return { period, start, end: lastTransaction, endInferred: true };
  }

  private checkWithinPeriod(period: StatementPeriod, ordered: OrderedPeriod | undefined): PeriodCheck {
    const tolerance = this.toleranceMinorUnits;
    const rows = [...period.transactions].sort((a, b) => a.sequenceIndex - b.sequenceIndex);

    const breaks: RunningBalanceBreak[] = [];
    let comparisons = 0;
    let rowsChecked = 0;
    let running = period.openingBalance === null ? null : toMinorUnits(period.openingBalance);

    for (const txn of rows) {
      const amount = toMinorUnits(txn.amount);

      if (txn.runningBalance === null) {
        // Balance not printed on this row: carry the expectation forward.
        running = running === null ? null : running + amount;
        continue;
      }

      const actual = toMinorUnits(txn.runningBalance);
      if (running !== null) {
        const expected = running + amount;
        rowsChecked += 1;
        if (Math.abs(actual - expected) > tolerance) {
          breaks.push({
            periodId: period.periodId,
            sequenceIndex: txn.sequenceIndex,
            expected: fromMinorUnits(expected),
            actual: fromMinorUnits(actual),
            delta: fromMinorUnits(actual - expected),
          });
        }
      }
      running = actual;
    }
    comparisons += rowsChecked;

    let totalsCheck: StatementTotalsCheck = { status: 'balances_not_found', expected: null, actual: null, delta: null };
    if (period.openingBalance !== null && period.closingBalance !== null) {
      const expected = toMinorUnits(period.openingBalance) + sumMinorUnits(rows.map((txn) => txn.amount));
      const actual = toMinorUnits(period.closingBalance);
      comparisons += 1;
      totalsCheck = {
        status: Math.abs(actual - expected) > tolerance ? 'mismatch' : 'ok',
        expected: fromMinorUnits(expected),
        actual: fromMinorUnits(actual),
        delta: fromMinorUnits(actual - expected),
      };
    }

    return {
      summary: {
        periodId: period.periodId,
        sourceDocumentId: period.sourceDocumentId,
        startDate: period.startDate,
        endDate: period.endDate,
        effectiveEndDate: ordered?.end ?? period.endDate,
        endDateInferred: ordered?.endInferred ?? false,
        openingBalance: period.openingBalance,
        closingBalance: period.closingBalance,
        extractorVersion: period.extractorVersion,
        transactionCount: rows.length,
        totalsCheck,
        runningBalanceRowsChecked: rowsChecked,
      },
      breaks,
      comparisons,
    };
  }

  /**
   * Walks the ordered periods against a coverage frontier: the latest end date
   * seen so far and the period that owns it. Each following period either
   * overlaps the frontier, touches it, or leaves a gap after it.
   */
  private walkBoundaries(ordered: readonly OrderedPeriod[]): BoundaryWalk {
    const walk: BoundaryWalk = {
      gaps: [],
      overlaps: [],
      overlapPairs: [],
      balanceMismatches: [],
      links: [],
      unverifiedBoundaries: 0,
      comparisons: 0,
    };

    if (ordered.length === 0) {
      return walk;
    }

    let frontier = ordered[0];

    for (const next of ordered.slice(1)) {
      const previous = frontier;
      const link: PeriodLink = {
        fromPeriodId: previous.period.periodId,
        toPeriodId: next.period.periodId,
        status: 'continuous',
        verified: true,
      };

      if (compareIsoDates(next.start, previous.end) <= 0) {
        const overlap = this.resolveOverlap(previous, next);
        walk.overlaps.push(overlap);
        walk.overlapPairs.push({
          window: overlap.window,
          periodIds: [previous.period.periodId, next.period.periodId],
        });
        link.status = 'overlap';
        if (overlap.balanceDifference !== null) {
          walk.comparisons += 1;
        }
        if (!overlap.explainedByDuplicates) {
          walk.unverifiedBoundaries += 1;
          link.verified = false;
        }
      } else {
        const firstUncovered = addDays(previous.end, 1);
        const hasGap = compareIsoDates(next.start, firstUncovered) > 0;
        if (hasGap) {
          walk.gaps.push({
            from: firstUncovered,
            to: addDays(next.start, -1),
            afterPeriodId: previous.period.periodId,
            beforePeriodId: next.period.periodId,
          });
        }

        const mismatch = this.chainBalances(previous.period, next.period);
        if (mismatch === undefined) {
          walk.unverifiedBoundaries += 1;
          link.verified = false;
          link.status = hasGap ? 'gap' : 'unverified';
        } else {
          walk.comparisons += 1;
          if (mismatch) {
            walk.balanceMismatches.push(mismatch);
            link.status = 'balance_mismatch';
          } else if (hasGap) {
            link.status = 'gap';
          }
        }
      }

      walk.links.push(link);
      if (compareIsoDates(next.end, frontier.end) >= 0) {
        frontier = next;
      }
    }

    return walk;
  }

  /**
   * @returns undefined when either balance is missing, null when they chain,
   * otherwise the mismatch (delta = actual opening - expected opening)
   */
  private chainBalances(previous: StatementPeriod, next: StatementPeriod): BalanceMismatch | null | undefined {
    if (previous.closingBalance === null || next.openingBalance === null) {
      return undefined;
    }

    const expected = toMinorUnits(previous.closingBalance);
    const actual = toMinorUnits(next.openingBalance);
    if (Math.abs(actual - expected) <= this.toleranceMinorUnits) {
      return null;
    }

    return {
      periodId: next.periodId,
      previousPeriodId: previous.periodId,
      expected: previous.closingBalance,
      actual: next.openingBalance,
      delta: fromMinorUnits(actual - expected),
    };
  }

  /**
   * Matches the later period's rows inside the overlap window against the
   * earlier period's rows one-for-one. The overlap is explained when the
   * matched amounts account exactly for the balance step between the two
   * statements; a shared day without rows whose balances chain is explained by
   * nothing. Nothing is removed; this is evidence for the operator.
   */
  private resolveOverlap(earlier: OrderedPeriod, later: OrderedPeriod): Overlap {
    const window: DateRange = { from: later.start, to: minIsoDate(earlier.end, later.end) };
    const inWindow = (txn: CanonicalTransaction) =>
      compareIsoDates(txn.date, window.from) >= 0 && compareIsoDates(txn.date, window.to) <= 0;

    const available = new Map<string, number>();
    for (const txn of earlier.period.transactions.filter(inWindow)) {
      const key = duplicateKey(txn);
      available.set(key, (available.get(key) ?? 0) + 1);
    }

    let duplicateSum = 0;
    for (const txn of later.period.transactions.filter(inWindow)) {
      const key = duplicateKey(txn);
      const remaining = available.get(key) ?? 0;
      if (remaining > 0) {
        available.set(key, remaining - 1);
        duplicateSum += toMinorUnits(txn.amount);
      }
    }

    const { closingBalance } = earlier.period;
    const { openingBalance } = later.period;
    const difference =
      closingBalance === null || openingBalance === null
        ? null
        : toMinorUnits(closingBalance) - toMinorUnits(openingBalance);

    return {
      window,
      earlierPeriodId: earlier.period.periodId,
      laterPeriodId: later.period.periodId,
      duplicateSum: fromMinorUnits(duplicateSum),
      balanceDifference: difference === null ? null : fromMinorUnits(difference),
      explainedByDuplicates:
        difference !== null && Math.abs(difference - duplicateSum) <= this.toleranceMinorUnits,
    };
  }

  private merge(periods: readonly StatementPeriod[]): CanonicalTransaction[] {
    const periodStarts = buildPeriodStartIndex(periods);
    return periods
      .flatMap((period) => period.transactions)
      .sort((a, b) => compareLedgerOrder(a, b, periodStarts));
  }

  private findDuplicateCandidates(
    transactions: readonly CanonicalTransaction[],
    overlapPairs: BoundaryWalk['overlapPairs'],
  ): DuplicateCandidate[] {
    const groups = new Map<string, CanonicalTransaction[]>();
    for (const txn of transactions) {
      const key = duplicateKey(txn);
      const group = groups.get(key);
      if (group) {
        group.push(txn);
      } else {
        groups.set(key, [txn]);
      }
    }

    const withinOverlap = (a: CanonicalTransaction, b: CanonicalTransaction): boolean =>
      overlapPairs.some(
        ({ window, periodIds }) =>
          periodIds.includes(a.sourcePeriodId) &&
          periodIds.includes(b.sourcePeriodId) &&
          a.sourcePeriodId !== b.sourcePeriodId &&
          compareIsoDates(a.date, window.from) >= 0 &&
          compareIsoDates(a.date, window.to) <= 0,
      );

    // Groups come out in order of first occurrence, members in ledger order.
    const candidates: DuplicateCandidate[] = [];
    for (const group of groups.values()) {
      for (let i = 0; i < group.length; i += 1) {
        for (let j = i + 1; j < group.length; j += 1) {
          candidates.push({
            first: toTransactionRef(group[i]),
            second: toTransactionRef(group[j]),
            withinOverlap: withinOverlap(group[i], group[j]),
            samePeriod: group[i].sourcePeriodId === group[j].sourcePeriodId,
          });
        }
      }
    }

    return candidates;
  }
}

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
};

const compareOrderedPeriods = (a: OrderedPeriod, b: OrderedPeriod): number =>
  compareIsoDates(a.start, b.start) ||
  compareIsoDates(a.end, b.end) ||
  (a.period.periodId < b.period.periodId ? -1 : a.period.periodId > b.period.periodId ? 1 : 0);

// Same account is implied: the engine only ever sees one account.
const duplicateKey = (txn: CanonicalTransaction): string =>
  JSON.stringify([txn.date, toMinorUnits(txn.amount), txn.description]);

const findDuplicateStatements = (periods: readonly StatementPeriod[]): string[][] => {
  const byFingerprint = new Map<string, string[]>();
  for (const period of periods) {
    if (period.fingerprint === null) continue;
    byFingerprint.set(period.fingerprint, [...(byFingerprint.get(period.fingerprint) ?? []), period.periodId]);
  }

  return Array.from(byFingerprint.values())
    .filter((group) => group.length > 1)
    .map((group) => [...group].sort())
    .sort((a, b) => (a[0] < b[0] ? -1 : 1));
};

export const deriveStatus = (input: {
  uncheckedReasons: readonly UncheckedReason[];
  hasMismatch: boolean;
  hasGap: boolean;
}): ContinuityStatus => {
  if (input.uncheckedReasons.length > 0) return 'unchecked';
  if (input.hasMismatch) return 'balance_mismatch';
  if (input.hasGap) return 'gaps_detected';
  return 'continuous';
};

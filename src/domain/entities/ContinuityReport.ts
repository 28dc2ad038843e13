import { TransactionRef } from './CanonicalTransaction.js';

export type ContinuityStatus = 'continuous' | 'gaps_detected' | 'balance_mismatch' | 'unchecked';

export type UncheckedReason = 'balances_not_found' | 'unorderable_periods' | 'boundary_unverified';

export type LinkStatus = 'continuous' | 'balance_mismatch' | 'gap' | 'overlap' | 'unverified';

export interface DateRange {
  from: string;
  to: string;
}

export interface StatementTotalsCheck {
  status: 'ok' | 'mismatch' | 'balances_not_found';
  expected: number | null;
  actual: number | null;
  delta: number | null;
}

export interface PeriodSummary {
  periodId: string;
  sourceDocumentId: string;
  startDate: string | null;
  endDate: string | null;
  effectiveEndDate: string | null;
  endDateInferred: boolean;
  openingBalance: number | null;
  closingBalance: number | null;
  extractorVersion: string;
  transactionCount: number;
  totalsCheck: StatementTotalsCheck;
  runningBalanceRowsChecked: number;
}

export interface Gap extends DateRange {
  afterPeriodId: string;
  beforePeriodId: string;
}

export interface Overlap {
  window: DateRange;
  earlierPeriodId: string;
  laterPeriodId: string;
  duplicateSum: number;
  /** earlier closing minus later opening, null when either balance is missing */
  balanceDifference: number | null;
  explainedByDuplicates: boolean;
}

export interface BalanceMismatch {
  periodId: string;
  previousPeriodId: string;
  expected: number;
  actual: number;
  delta: number;
}

export interface RunningBalanceBreak {
  periodId: string;
  sequenceIndex: number;
  expected: number;
  actual: number;
  delta: number;
}

export interface DuplicateCandidate {
  first: TransactionRef;
  second: TransactionRef;
  withinOverlap: boolean;
  samePeriod: boolean;
}

export interface PeriodLink {
  fromPeriodId: string;
  toPeriodId: string;
  status: LinkStatus;
  /** false when the boundary could not be tied by balances */
  verified: boolean;
}

/** Frozen once the engine emits it. */
export interface ContinuityReport {
  readonly coveredPeriods: readonly PeriodSummary[];
  readonly gaps: readonly Gap[];
  readonly overlaps: readonly Overlap[];
  readonly balanceMismatches: readonly BalanceMismatch[];
  readonly runningBalanceBreaks: readonly RunningBalanceBreak[];
  readonly duplicateCandidates: readonly DuplicateCandidate[];
  readonly duplicateStatements: readonly (readonly string[])[];
  readonly links: readonly PeriodLink[];
  readonly unorderablePeriodIds: readonly string[];
  readonly extractorVersions: readonly string[];
  readonly mixedExtractorVersions: boolean;
  readonly uncheckedReasons: readonly UncheckedReason[];
  readonly overallStatus: ContinuityStatus;
}

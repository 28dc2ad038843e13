import { CanonicalTransaction } from '../../domain/entities/CanonicalTransaction.js';
import { ContinuityReport, ContinuityStatus, DateRange, PeriodSummary } from '../../domain/entities/ContinuityReport.js';
import { Ledger } from '../../domain/entities/Ledger.js';
import { LedgerIntegrityError } from '../../domain/errors/PipelineError.js';
import { buildPeriodStartIndex, compareLedgerOrder } from '../../domain/services/LedgerOrdering.js';
import { formatMoney } from '../../domain/services/Money.js';

export interface LedgerRow extends CanonicalTransaction {
  /** 1-based position in the final ledger */
  readonly position: number;
}

export interface AssembledLedger {
  accountId: string;
  institution: string;
  holderName: string | null;
  dateRange: DateRange | null;
  periods: readonly PeriodSummary[];
  rows: LedgerRow[];
  report: ContinuityReport;
  status: ContinuityStatus;
  succeeded: boolean;
  issues: string[];
}

const signed = (value: number): string => (value > 0 ? `+${formatMoney(value)}` : formatMoney(value));

/**
 * Final hand-off shape for presentation and export. Rows are echoed exactly as
 * the engine produced them; problems are surfaced through `issues`, never by
 * dropping or altering rows.
 */
export class LedgerAssembler {
  assemble(ledger: Ledger): AssembledLedger {
    this.verify(ledger);

    const rows = ledger.transactions.map((txn, index) => Object.freeze({ ...txn, position: index + 1 }));
    const { report } = ledger;

    return {
      accountId: ledger.accountId,
      institution: ledger.institution,
      holderName: ledger.holderName,
      dateRange: rows.length > 0 ? { from: rows[0].date, to: rows[rows.length - 1].date } : null,
      periods: report.coveredPeriods,
      rows,
      report,
      status: report.overallStatus,
      succeeded: report.overallStatus === 'continuous',
      issues: describeIssues(report),
    };
  }

  private verify(ledger: Ledger): void {
    const expectedRows = ledger.periods.reduce((total, period) => total + period.transactions.length, 0);
    if (expectedRows !== ledger.transactions.length) {
      throw new LedgerIntegrityError('Ledger row count differs from its periods', {
        accountId: ledger.accountId,
        expectedRows,
        actualRows: ledger.transactions.length,
      });
    }

    const periodStarts = buildPeriodStartIndex(ledger.periods);
    for (let index = 1; index < ledger.transactions.length; index += 1) {
      if (compareLedgerOrder(ledger.transactions[index - 1], ledger.transactions[index], periodStarts) > 0) {
        throw new LedgerIntegrityError('Ledger rows are not in ledger order', {
          accountId: ledger.accountId,
          position: index + 1,
        });
      }
    }
  }
}

export const describeIssues = (report: ContinuityReport): string[] => {
  const issues: string[] = [];

  for (const reason of report.uncheckedReasons) {
    switch (reason) {
      case 'balances_not_found':
        issues.push('Continuity not checked: statement balances not found');
        break;
      case 'unorderable_periods':
        issues.push(
          `Continuity not checked: no start date for ${report.unorderablePeriodIds.join(', ')}; these periods cannot be placed in sequence`,
        );
        break;
      case 'boundary_unverified':
        for (const link of report.links.filter((entry) => !entry.verified)) {
          const cause = link.status === 'overlap' ? 'overlapping statements do not reconcile' : 'balance missing';
          issues.push(`Continuity not verified between ${link.fromPeriodId} and ${link.toPeriodId}: ${cause}`);
        }
        break;
    }
  }

  for (const gap of report.gaps) {
    issues.push(`Missing statement coverage from ${gap.from} to ${gap.to} (between ${gap.afterPeriodId} and ${gap.beforePeriodId})`);
  }

  for (const mismatch of report.balanceMismatches) {
    issues.push(
      `Balance mismatch entering ${mismatch.periodId}: expected opening ${formatMoney(mismatch.expected)} (closing of ${mismatch.previousPeriodId}), found ${formatMoney(mismatch.actual)} (${signed(mismatch.delta)})`,
    );
  }

  for (const period of report.coveredPeriods) {
    const { totalsCheck } = period;
    if (totalsCheck.status === 'mismatch' && totalsCheck.expected !== null && totalsCheck.actual !== null && totalsCheck.delta !== null) {
      issues.push(
        `Statement totals do not reconcile for ${period.periodId}: opening plus transactions is ${formatMoney(totalsCheck.expected)}, closing is ${formatMoney(totalsCheck.actual)} (${signed(totalsCheck.delta)})`,
      );
    }
  }

  for (const row of report.runningBalanceBreaks) {
    issues.push(
      `Running balance break in ${row.periodId} at row ${row.sequenceIndex}: expected ${formatMoney(row.expected)}, statement shows ${formatMoney(row.actual)} (${signed(row.delta)})`,
    );
  }

  for (const overlap of report.overlaps) {
    issues.push(
      `Statements ${overlap.earlierPeriodId} and ${overlap.laterPeriodId} overlap from ${overlap.window.from} to ${overlap.window.to}`,
    );
  }

  for (const candidate of report.duplicateCandidates) {
    issues.push(
      `Possible duplicate: ${candidate.first.date} "${candidate.first.description}" ${formatMoney(candidate.first.amount)} in ${candidate.first.periodId} row ${candidate.first.sequenceIndex} and ${candidate.second.periodId} row ${candidate.second.sequenceIndex}`,
    );
  }

  for (const group of report.duplicateStatements) {
    issues.push(`Same statement supplied more than once: ${group.join(', ')}`);
  }

  if (report.mixedExtractorVersions) {
    issues.push(`Periods were extracted by different extractor versions: ${report.extractorVersions.join(', ')}`);
  }

  return issues;
};

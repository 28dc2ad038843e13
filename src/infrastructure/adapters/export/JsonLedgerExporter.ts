import { CategorizedTransactionDTO } from '../../../application/dto/CategorizedTransactionDTO.js';
import { ExportedLedgerDTO } from '../../../application/dto/ExportedLedgerDTO.js';
import { LedgerExporterPort } from '../../../application/ports/LedgerExporterPort.js';
import { AssembledLedger } from '../../../application/services/LedgerAssembler.js';

export const headlineFor = (ledger: AssembledLedger): string => {
  switch (ledger.status) {
    case 'continuous':
      return 'Continuity verified';
    case 'gaps_detected':
      return 'Continuity failed: statement coverage has gaps';
    case 'balance_mismatch':
      return 'Continuity failed: balances do not reconcile';
    case 'unchecked':
      return ledger.report.uncheckedReasons.includes('balances_not_found')
        ? 'Continuity not checked: balances not found'
        : 'Continuity not checked';
  }
};

/**
 * Builds the presentation view a spreadsheet writer renders: periods in
 * chronological order, the status headline and every issue line up front.
 */
export class JsonLedgerExporter implements LedgerExporterPort {
  export(ledger: AssembledLedger, categories: Record<number, CategorizedTransactionDTO>): ExportedLedgerDTO {
    return {
      accountId: ledger.accountId,
      institution: ledger.institution,
      holderName: ledger.holderName,
      status: ledger.status,
      succeeded: ledger.succeeded,
      headline: headlineFor(ledger),
      issues: ledger.issues,
      periods: ledger.periods.map((period) => ({
        periodId: period.periodId,
        documentId: period.sourceDocumentId,
        startDate: period.startDate,
        endDate: period.endDate,
        openingBalance: period.openingBalance,
        closingBalance: period.closingBalance,
        extractorVersion: period.extractorVersion,
        transactionCount: period.transactionCount,
        totalsStatus: period.totalsCheck.status,
      })),
      rows: ledger.rows.map((row) => {
        const category = categories[row.position];
        return {
          position: row.position,
          date: row.date,
          description: row.description,
          transactionType: row.transactionType,
          amount: row.amount,
          runningBalance: row.runningBalance,
          periodId: row.sourcePeriodId,
          sequenceIndex: row.sequenceIndex,
          category: category?.category ?? null,
          subCategory: category?.subCategory ?? null,
        };
      }),
      report: ledger.report,
    };
  }
}

import { CanonicalTransaction } from '../../domain/entities/CanonicalTransaction.js';
import { StatementPeriod } from '../../domain/entities/StatementPeriod.js';
import { MalformedPeriodError, MalformedRowError } from '../../domain/errors/PipelineError.js';
import { isBlankMoney, MoneyInput, parseMoney } from '../../domain/services/Money.js';
import { parseStatementDate } from '../../domain/services/StatementDate.js';
import { buildStatementFingerprint } from '../../domain/services/StatementFingerprint.js';
import { RawPeriodMetadataDTO, RawStatementRowDTO } from '../dto/RawExtractionDTO.js';

export interface NormalizationSource {
  documentId: string;
  institution: string;
}

export interface NormalizedStatement {
  transactions: CanonicalTransaction[];
  period: StatementPeriod;
}

export const periodIdForDocument = (documentId: string): string => `period:${documentId}`;

/**
 * Turns an extractor's raw output into canonical rows and one statement period.
 * All-or-nothing: the first invalid row or metadata field fails the whole
 * period. Rows keep the order the extractor produced them in.
 */
export class NormalizationService {
  normalize(
    rawRows: readonly RawStatementRowDTO[],
    periodMetadata: RawPeriodMetadataDTO,
    extractorVersion: string,
    source: NormalizationSource,
  ): NormalizedStatement {
    const { documentId } = source;

    const accountId = periodMetadata.accountIdentifier.trim();
    if (!accountId) {
      throw new MalformedPeriodError(documentId, 'accountIdentifier', 'account identifier is empty');
    }
    if (!extractorVersion.trim()) {
      throw new MalformedPeriodError(documentId, 'extractorVersion', 'extractor version is empty');
    }

    const startDate = this.optionalDate(periodMetadata.startDate, documentId, 'startDate');
    const endDate = this.optionalDate(periodMetadata.endDate, documentId, 'endDate');
    if (startDate && endDate && startDate > endDate) {
      throw new MalformedPeriodError(documentId, 'endDate', `period ends (${endDate}) before it starts (${startDate})`);
    }

    const openingBalance = this.optionalBalance(periodMetadata.openingBalance, documentId, 'openingBalance');
    const closingBalance = this.optionalBalance(periodMetadata.closingBalance, documentId, 'closingBalance');

    const periodId = periodIdForDocument(documentId);
    const transactions = rawRows.map((row, index) =>
      this.normalizeRow(row, index, { accountId, periodId, documentId }),
    );

    const holderName = periodMetadata.holderName?.trim() || null;

    const period: StatementPeriod = Object.freeze({
      periodId,
      accountId,
      institution: source.institution,
      sourceDocumentId: documentId,
      startDate,
      endDate,
      openingBalance,
      closingBalance,
      holderName,
      extractorVersion,
      fingerprint: buildStatementFingerprint(transactions),
      transactions: Object.freeze([...transactions]),
    });

    return { transactions, period };
  }

  private normalizeRow(
    row: RawStatementRowDTO,
    rowIndex: number,
    context: { accountId: string; periodId: string; documentId: string },
  ): CanonicalTransaction {
    const date = parseStatementDate(row.date);
    if (!date) {
      throw new MalformedRowError(context.documentId, rowIndex, 'date', `"${row.date}" is not a recognised date`);
    }

    if (!row.description.trim()) {
      throw new MalformedRowError(context.documentId, rowIndex, 'description', 'description is empty');
    }

    if (isBlankMoney(row.amount)) {
      throw new MalformedRowError(context.documentId, rowIndex, 'amount', 'amount is missing');
    }
    const amount = parseMoney(row.amount);
    if (amount === null) {
      throw new MalformedRowError(context.documentId, rowIndex, 'amount', `"${row.amount}" is not a monetary amount`);
    }

    let runningBalance: number | null = null;
    if (row.balance !== null && row.balance !== undefined && !isBlankMoney(row.balance)) {
      runningBalance = parseMoney(row.balance);
      if (runningBalance === null) {
        throw new MalformedRowError(
          context.documentId,
          rowIndex,
          'balance',
          `"${row.balance}" is not a monetary amount`,
        );
      }
    }

    return Object.freeze({
      accountId: context.accountId,
      date,
      description: row.description,
      transactionType: row.transactionType?.trim() || null,
      amount,
      runningBalance,
      sourcePeriodId: context.periodId,
      sequenceIndex: rowIndex,
    });
  }

  private optionalDate(value: string | null | undefined, documentId: string, field: string): string | null {
    if (value === null || value === undefined || !value.trim()) {
      return null;
    }

    const parsed = parseStatementDate(value);
    if (!parsed) {
      throw new MalformedPeriodError(documentId, field, `"${value}" is not a recognised date`);
    }
    return parsed;
  }

  private optionalBalance(value: MoneyInput, documentId: string, field: string): number | null {
    if (value === null || value === undefined || isBlankMoney(value)) {
      return null;
    }

    const parsed = parseMoney(value);
    if (parsed === null) {
      throw new MalformedPeriodError(documentId, field, `"${value}" is not a monetary amount`);
    }
    return parsed;
  }
}

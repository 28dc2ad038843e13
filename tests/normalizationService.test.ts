import { describe, expect, it } from 'vitest';
import { NormalizationService, periodIdForDocument } from '../src/application/services/NormalizationService.js';
import { MalformedPeriodError, MalformedRowError } from '../src/domain/errors/PipelineError.js';

const normalizer = new NormalizationService();
const source = { documentId: 'doc-1', institution: 'monzo' };

const metadata = {
  accountIdentifier: ' 12345678 ',
  startDate: '01/01/2024',
  endDate: '31/01/2024',
  openingBalance: '£100.00',
  closingBalance: '£86.50',
  holderName: '  Jane Doe ',
};

describe('NormalizationService', () => {
  it('produces canonical rows in extractor order with their source position', () => {
    const { transactions, period } = normalizer.normalize(
      [
        { date: '20/01/2024', description: 'Card payment to  TESCO', amount: '12.50 DR', balance: '87.50' },
        { date: '05/01/2024', description: 'Costa', amount: '-1.00', balance: null, transactionType: ' Card ' },
      ],
      metadata,
      'monzo/1.2.0',
      source,
    );

    expect(transactions).toEqual([
      {
        accountId: '12345678',
        date: '2024-01-20',
        description: 'Card payment to  TESCO',
        transactionType: null,
        amount: -12.5,
        runningBalance: 87.5,
        sourcePeriodId: 'period:doc-1',
        sequenceIndex: 0,
      },
      {
        accountId: '12345678',
        date: '2024-01-05',
        description: 'Costa',
        transactionType: 'Card',
        amount: -1,
        runningBalance: null,
        sourcePeriodId: 'period:doc-1',
        sequenceIndex: 1,
      },
    ]);
    expect(period).toMatchObject({
      periodId: periodIdForDocument('doc-1'),
      accountId: '12345678',
      institution: 'monzo',
      sourceDocumentId: 'doc-1',
      startDate: '2024-01-01',
      endDate: '2024-01-31',
      openingBalance: 100,
      closingBalance: 86.5,
      holderName: 'Jane Doe',
      extractorVersion: 'monzo/1.2.0',
    });
    expect(period.fingerprint).toMatch(/^[0-9a-f]{64}$/);
    expect(Object.isFrozen(period)).toBe(true);
    expect(Object.isFrozen(period.transactions[0])).toBe(true);
  });

  it('fails the whole period on the first row with an unreadable date', () => {
    const normalize = () =>
      normalizer.normalize(
        [
          { date: '02/01/2024', description: 'Tesco', amount: '-3.00' },
          { date: '31/02/2024', description: 'Tesco', amount: '-3.00' },
        ],
        metadata,
        'monzo/1.2.0',
        source,
      );

    expect(normalize).toThrow(MalformedRowError);
    expect(normalize).toThrow('Row 1 of document doc-1 has an invalid date: "31/02/2024" is not a recognised date');
  });

  it.each([
    [{ date: '02/01/2024', description: '   ', amount: '1.00' }, 'description', 'description is empty'],
    [{ date: '02/01/2024', description: 'Tesco', amount: '' }, 'amount', 'amount is missing'],
    [{ date: '02/01/2024', description: 'Tesco', amount: 'twelve' }, 'amount', '"twelve" is not a monetary amount'],
    [{ date: '02/01/2024', description: 'Tesco', amount: '1.00', balance: '1.234' }, 'balance', '"1.234" is not a monetary amount'],
  ])('names the offending field of %o', (row, field, reason) => {
    try {
      normalizer.normalize([row], metadata, 'monzo/1.2.0', source);
      expect.unreachable('normalize should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedRowError);
      expect(error).toMatchObject({ rowIndex: 0, field, reason, code: 'MALFORMED_ROW' });
    }
  });

  it('rejects unusable statement metadata', () => {
    expect(() => normalizer.normalize([], { ...metadata, accountIdentifier: ' ' }, 'monzo/1.2.0', source)).toThrow(
      MalformedPeriodError,
    );
    expect(() => normalizer.normalize([], metadata, '', source)).toThrow('extractor version is empty');
    expect(() =>
      normalizer.normalize([], { ...metadata, startDate: '01/02/2024', endDate: '31/01/2024' }, 'monzo/1.2.0', source),
    ).toThrow('period ends (2024-01-31) before it starts (2024-02-01)');
    expect(() => normalizer.normalize([], { ...metadata, openingBalance: 'n/a' }, 'monzo/1.2.0', source)).toThrow(
      'Statement metadata of document doc-1 has an invalid openingBalance: "n/a" is not a monetary amount',
    );
  });

  it('keeps absent dates and balances as null', () => {
    const { period } = normalizer.normalize(
      [],
      { accountIdentifier: '12345678', startDate: null, openingBalance: '', holderName: null },
      'monzo/1.2.0',
      source,
    );

    expect(period).toMatchObject({
      startDate: null,
      endDate: null,
      openingBalance: null,
      closingBalance: null,
      holderName: null,
      fingerprint: null,
      transactions: [],
    });
  });
});

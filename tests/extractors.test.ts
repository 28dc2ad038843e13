import { describe, expect, it } from 'vitest';
import { ExtractorRegistry } from '../src/application/services/ExtractorRegistry.js';
import { defaultExtractors } from '../src/infrastructure/bootstrap/AppContainer.js';
import {
  MONZO_EXTRACTOR_VERSION,
  MonzoStatementExtractor,
} from '../src/infrastructure/adapters/extractors/MonzoStatementExtractor.js';
import {
  NATIONWIDE_EXTRACTOR_VERSION,
  NationwideStatementExtractor,
} from '../src/infrastructure/adapters/extractors/NationwideStatementExtractor.js';
import { monzoJanuary, nationwideFebruary, unreadableDocument } from './helpers/statements.js';

describe('MonzoStatementExtractor', () => {
  const extractor = new MonzoStatementExtractor();

  it('claims Monzo statements only', () => {
    expect(extractor.applicable(monzoJanuary())).toBe(true);
    expect(extractor.applicable(nationwideFebruary())).toBe(false);
    expect(extractor.applicable(unreadableDocument())).toBe(false);
    expect(extractor.version()).toBe(MONZO_EXTRACTOR_VERSION);
  });

  it('reads the header and every row across pages, joining wrapped descriptions', () => {
    const { rows, period } = extractor.extract(monzoJanuary());

    expect(period).toEqual({
      accountIdentifier: '12345678',
      startDate: '01/01/2024',
      endDate: '31/01/2024',
      openingBalance: '£100.00',
      closingBalance: '£250.00',
      holderName: 'Jane Doe',
    });
    expect(rows).toEqual([
      { date: '03/01/2024', description: 'Costa Coffee', amount: '-3.50', balance: '96.50' },
      { date: '10/01/2024', description: 'Card payment to TESCO STORES London GB', amount: '-46.50', balance: '50.00' },
      { date: '15/01/2024', description: 'Salary ACME LTD', amount: '+200.00', balance: '250.00' },
    ]);
  });

  it('is deterministic', () => {
    expect(extractor.extract(monzoJanuary())).toEqual(extractor.extract(monzoJanuary()));
  });

  it('fails on a dated line it cannot read instead of skipping it', () => {
    const document = monzoJanuary();
    document.pages[0] = document.pages[0].replace('03/01/2024 Costa Coffee -3.50 96.50', '03/01/2024 Costa Coffee');

    expect(() => extractor.extract(document)).toThrow('unreadable transaction line: "03/01/2024 Costa Coffee"');
  });

  it('refuses a table that is not laid out as a Monzo statement', () => {
    expect(() => extractor.extract(nationwideFebruary())).toThrow('unexpected line before the first transaction');
  });

  it('fails when no transaction table is present', () => {
    expect(() =>
      extractor.extract({ documentId: 'summary', pages: ['Monzo\nAccount number: 12345678\nNothing to see'] }),
    ).toThrow('transaction table header not found');
  });
});

describe('NationwideStatementExtractor', () => {
  const extractor = new NationwideStatementExtractor();

  it('claims Nationwide statements only', () => {
    expect(extractor.applicable(nationwideFebruary())).toBe(true);
    expect(extractor.applicable(monzoJanuary())).toBe(false);
    expect(extractor.version()).toBe(NATIONWIDE_EXTRACTOR_VERSION);
  });

  it('reads paid out and paid in columns into signed amounts', () => {
    const { rows, period } = extractor.extract(nationwideFebruary());

    expect(period).toEqual({
      accountIdentifier: '87654321',
      startDate: '1 Feb 2024',
      endDate: '29 Feb 2024',
      openingBalance: '250.00',
      closingBalance: '330.00',
      holderName: 'John Smith',
    });
    expect(rows).toEqual([
      {
        date: '01 Feb 2024',
        description: 'Direct debit COUNCIL TAX',
        amount: '-120.00',
        balance: '130.00',
        transactionType: 'Direct debit',
      },
      {
        date: '15 Feb 2024',
        description: 'Bank credit ACME LTD',
        amount: '200.00',
        balance: '330.00',
        transactionType: 'Bank credit',
      },
    ]);
  });

  it('rejects a row with both columns filled', () => {
    const document = nationwideFebruary();
    document.pages[0] = document.pages[0].replace('120.00     -   ', '120.00     5.00');

    expect(() => extractor.extract(document)).toThrow('row must have exactly one of paid out / paid in');
  });

  it('carries the date onto rows printed without one', () => {
    const document = nationwideFebruary();
    document.pages[0] = document.pages[0].replace(
      '130.00\n',
      '130.00\n              Card payment TESCO             5.00       -          125.00\n',
    );

    const { rows } = extractor.extract(document);

    expect(rows).toHaveLength(3);
    expect(rows[1]).toEqual({
      date: '01 Feb 2024',
      description: 'Card payment TESCO',
      amount: '-5.00',
      balance: '125.00',
      transactionType: 'Card payment',
    });
  });

  it('joins wrapped description lines onto the row above', () => {
    const document = nationwideFebruary();
    document.pages[0] = document.pages[0].replace('330.00\nBalance carried', '330.00\n    REF 0042\nBalance carried');

    const { rows } = extractor.extract(document);

    expect(rows.map((row) => row.description)).toEqual(['Direct debit COUNCIL TAX', 'Bank credit ACME LTD REF 0042']);
  });

  it('fails on a table line it cannot read instead of dropping it', () => {
    const document = nationwideFebruary();
    document.pages[0] = document.pages[0].replace('330.00\nBalance carried', '330.00\nInterest  see overleaf\nBalance carried');

    expect(() => extractor.extract(document)).toThrow('unreadable transaction line: "Interest  see overleaf"');
  });
});

describe('extractor selection', () => {
  const registry = new ExtractorRegistry(defaultExtractors());

  it('ignores other banks named in transaction descriptions', () => {
    const document = nationwideFebruary();
    document.pages[0] = document.pages[0].replace('Bank credit ACME LTD', 'Transfer from MONZO J SMITH');

    expect(registry.select(document).id).toBe('nationwide');
    expect(registry.extract(document).extraction.rows[1]).toMatchObject({
      description: 'Transfer from MONZO J SMITH',
      amount: '200.00',
      transactionType: 'Transfer from',
    });
  });

  it('still recognises each bank from its own statement header', () => {
    expect(registry.select(monzoJanuary()).id).toBe('monzo');
    expect(registry.select(nationwideFebruary()).id).toBe('nationwide');
  });
});

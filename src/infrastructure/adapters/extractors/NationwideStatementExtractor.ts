import { RawExtractionDTO, RawStatementRowDTO } from '../../../application/dto/RawExtractionDTO.js';
import { StatementDocumentDTO } from '../../../application/dto/StatementDocumentDTO.js';
import { StatementExtractorPort } from '../../../application/ports/StatementExtractorPort.js';
import { findLabelled, firstPageText, linesAboveTable, splitLines } from './statementText.js';

export const NATIONWIDE_EXTRACTOR_VERSION = 'nationwide/1.0.0';

const PERIOD_RE = /statement period:?\s*(\d{1,2} [A-Za-z]{3,9} \d{4})\s+to\s+(\d{1,2} [A-Za-z]{3,9} \d{4})/i;
const TABLE_HEADER_RE = /^date\s{2,}description\s{2,}.*\bout\b.*\bin\b.*\bbalance\b/i;
const DATED_LINE_RE = /^\d{1,2} [A-Za-z]{3} \d{4}\b/;
const COLUMN_SPLIT_RE = /\s{2,}/;
const AMOUNT_CELL_RE = /^£?\d[\d,]*\.\d{2}$/;
const PAGE_FOOTER_RE = /^page \d+ of \d+$/i;

const TRANSACTION_TYPES: Array<[string, RegExp]> = [
  ['Contactless Payment', /^contactless\s+payment\b/i],
  ['Visa purchase', /^visa\s+purchase\b/i],
  ['Card payment', /^card\s+payment\b/i],
  ['Payment to', /^payment\s+to\b/i],
  ['Transfer to', /^transfer\s+to\b/i],
  ['Transfer from', /^transfer\s+from\b/i],
  ['Bank credit', /^bank\s+credit\b/i],
  ['Direct debit', /^direct\s+debit\b/i],
  ['ATM Withdrawal', /^atm\s+withdrawal\b/i],
];

const isEmptyCell = (cell: string | undefined): boolean => cell === undefined || cell === '' || cell === '-';

const isMoneyCell = (cell: string): boolean => isEmptyCell(cell) || AMOUNT_CELL_RE.test(cell);

/**
 * Nationwide FlexAccount statements: separate paid-out and paid-in columns,
 * balances brought and carried forward as table rows.
 */
export class NationwideStatementExtractor implements StatementExtractorPort {
  readonly id = 'nationwide';
  readonly institutionName = 'Nationwide Building Society';

  applicable(document: StatementDocumentDTO): boolean {
    const header = linesAboveTable(firstPageText(document), TABLE_HEADER_RE).join('\n');
    return /nationwide building society/i.test(header) && PERIOD_RE.test(header);
  }

  version(): string {
    return NATIONWIDE_EXTRACTOR_VERSION;
  }

  extract(document: StatementDocumentDTO): RawExtractionDTO {
    const headerLines = splitLines(firstPageText(document));

    const accountIdentifier = findLabelled(headerLines, /account number:?\s*(\d{6,10})\b/i);
    if (!accountIdentifier) {
      throw new Error('account number not found on the first page');
    }

    const period = headerLines.map((line) => line.match(PERIOD_RE)).find((match) => match !== null);

    let openingBalance: string | null = null;
    let closingBalance: string | null = null;
    const rows: RawStatementRowDTO[] = [];
    let sawHeader = false;
    // The date is printed on the first row of each day only.
    let currentDate: string | null = null;

    for (const page of document.pages) {
      let inTable = false;

      for (const line of splitLines(page)) {
        const trimmed = line.trim();

        if (TABLE_HEADER_RE.test(trimmed)) {
          inTable = true;
          sawHeader = true;
          continue;
        }
        if (!inTable || PAGE_FOOTER_RE.test(trimmed)) {
          continue;
        }

        const broughtForward = trimmed.match(/^balance brought forward\s{2,}(.+)$/i);
        if (broughtForward) {
          // Repeated at the top of every page; only the first one opens the statement.
          openingBalance = openingBalance ?? broughtForward[1].trim();
          continue;
        }
        const carriedForward = trimmed.match(/^balance carried forward\s{2,}(.+)$/i);
        if (carriedForward) {
          closingBalance = carriedForward[1].trim();
          continue;
        }

        const cells = trimmed.split(COLUMN_SPLIT_RE);
        if (DATED_LINE_RE.test(trimmed)) {
          const [date, ...rest] = cells;
          currentDate = date;
          rows.push(this.parseRow(date, rest, trimmed));
          continue;
        }

        const previous = rows[rows.length - 1];
        if (currentDate === null || previous === undefined) {
          throw new Error(`unexpected line before the first transaction: "${trimmed}"`);
        }
        if (cells.length === 4 && cells.slice(1).every(isMoneyCell)) {
          rows.push(this.parseRow(currentDate, cells, trimmed));
        } else if (cells.length === 1) {
          previous.description = `${previous.description} ${trimmed}`;
        } else {
          throw new Error(`unreadable transaction line: "${trimmed}"`);
        }
      }
    }

    if (!sawHeader) {
      throw new Error('transaction table header not found');
    }

    return {
      rows,
      period: {
        accountIdentifier,
        startDate: period?.[1] ?? null,
        endDate: period?.[2] ?? null,
        openingBalance,
        closingBalance,
        holderName: findLabelled(headerLines, /^account holder:\s*(.+)$/i),
      },
    };
  }

  /** `cells` are description, paid out, paid in and balance. */
  private parseRow(date: string, cells: readonly string[], line: string): RawStatementRowDTO {
    if (cells.length !== 4) {
      throw new Error(`expected 5 columns, found ${cells.length + 1}: "${line}"`);
    }

    const [description, paidOut, paidIn, balance] = cells;
    if (isEmptyCell(paidOut) === isEmptyCell(paidIn)) {
      throw new Error(`row must have exactly one of paid out / paid in: "${line}"`);
    }

    const transactionType = TRANSACTION_TYPES.find(([, pattern]) => pattern.test(description))?.[0];

    return {
      date,
      description,
      amount: isEmptyCell(paidIn) ? `-${paidOut}` : paidIn,
      balance: isEmptyCell(balance) ? null : balance,
      transactionType,
    };
  }
}

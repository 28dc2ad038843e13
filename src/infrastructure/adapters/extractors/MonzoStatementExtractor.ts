import { RawExtractionDTO, RawStatementRowDTO } from '../../../application/dto/RawExtractionDTO.js';
import { StatementDocumentDTO } from '../../../application/dto/StatementDocumentDTO.js';
import { StatementExtractorPort } from '../../../application/ports/StatementExtractorPort.js';
import { findLabelled, firstPageText, linesAboveTable, splitLines } from './statementText.js';

export const MONZO_EXTRACTOR_VERSION = 'monzo/1.2.0';

const RANGE_RE = /(\d{2}\/\d{2}\/\d{4})\s*-\s*(\d{2}\/\d{2}\/\d{4})/;
const TABLE_HEADER_RE = /^date\s+description\b.*\bbalance\b/i;
const DATED_LINE_RE = /^\d{2}\/\d{2}\/\d{4}\b/;
const ROW_RE = /^(\d{2}\/\d{2}\/\d{4})\s+(.+?)\s+([+-]?\d[\d,]*\.\d{2})\s+([+-]?\d[\d,]*\.\d{2})$/;
const FOOTER_RE = /^(monzo bank limited|page \d+ of \d+)/i;
const ISSUER_RE = /monzo bank limited|\b04-00-04\b|\bMONZGB2L\b/i;

/**
 * Monzo current account statements: one signed amount column followed by the
 * running balance, descriptions that may wrap onto following lines.
 */
export class MonzoStatementExtractor implements StatementExtractorPort {
  readonly id = 'monzo';
  readonly institutionName = 'Monzo';

  applicable(document: StatementDocumentDTO): boolean {
    // Only the header counts: transaction descriptions may name other banks.
    const header = linesAboveTable(firstPageText(document), TABLE_HEADER_RE).join('\n');
    return ISSUER_RE.test(header) && /account number/i.test(header);
  }

  version(): string {
    return MONZO_EXTRACTOR_VERSION;
  }

  extract(document: StatementDocumentDTO): RawExtractionDTO {
    const headerLines = splitLines(firstPageText(document));

    const accountIdentifier = findLabelled(headerLines, /account number:?\s*(\d{6,10})\b/i);
    if (!accountIdentifier) {
      throw new Error('account number not found on the first page');
    }

    const range = this.findRange(headerLines);

    const rows = this.extractRows(document);

    return {
      rows,
      period: {
        accountIdentifier,
        startDate: range?.start ?? null,
        endDate: range?.end ?? null,
        openingBalance: findLabelled(headerLines, /^opening balance\s+(.+)$/i),
        closingBalance: findLabelled(headerLines, /^closing balance\s+(.+)$/i),
        holderName: findLabelled(headerLines, /^account holder:\s*(.+)$/i),
      },
    };
  }

  private findRange(lines: readonly string[]): { start: string; end: string } | null {
    for (const line of lines) {
      const match = line.match(RANGE_RE);
      if (match) {
        return { start: match[1], end: match[2] };
      }
    }
    return null;
  }

  private extractRows(document: StatementDocumentDTO): RawStatementRowDTO[] {
    const rows: RawStatementRowDTO[] = [];
    let sawHeader = false;

    let current: RawStatementRowDTO | null = null;

    for (const page of document.pages) {
      let inTable = false;

      for (const line of splitLines(page)) {
        const trimmed = line.trim();

        if (TABLE_HEADER_RE.test(trimmed)) {
          inTable = true;
          sawHeader = true;
          continue;
        }
        if (!inTable || FOOTER_RE.test(trimmed)) {
          continue;
        }

        const match = trimmed.match(ROW_RE);
        if (match) {
          current = { date: match[1], description: match[2], amount: match[3], balance: match[4] };
          rows.push(current);
          continue;
        }

        if (DATED_LINE_RE.test(trimmed)) {
          throw new Error(`unreadable transaction line: "${trimmed}"`);
        }

        if (!current) {
          throw new Error(`unexpected line before the first transaction: "${trimmed}"`);
        }
        // Wrapped description of the row above, possibly continued from the previous page.
        current.description = `${current.description} ${trimmed}`;
      }
    }

    if (!sawHeader) {
      throw new Error('transaction table header not found');
    }

    return rows;
  }
}

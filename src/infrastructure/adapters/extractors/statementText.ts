import { StatementDocumentDTO } from '../../../application/dto/StatementDocumentDTO.js';

export const splitLines = (page: string): string[] =>
  page
    .split(/\r?\n/)
    .map((line) => line.replace(/\u00a0/g, ' ').trimEnd())
    .filter((line) => line.trim().length > 0);

export const firstPageText = (document: StatementDocumentDTO): string => document.pages[0] ?? '';

/** First capture group of the first line that matches, trimmed. */
export const findLabelled = (lines: readonly string[], pattern: RegExp): string | null => {
  for (const line of lines) {
    const match = line.match(pattern);
    if (match?.[1]) {
      return match[1].trim();
    }
  }
  return null;
};

/** Lines of a page above its transaction table; the whole page when no table header is found. */
export const linesAboveTable = (page: string, tableHeader: RegExp): string[] => {
  const lines = splitLines(page);
  const headerIndex = lines.findIndex((line) => tableHeader.test(line.trim()));
  return headerIndex === -1 ? lines : lines.slice(0, headerIndex);
};

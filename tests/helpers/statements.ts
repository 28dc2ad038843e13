import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { StatementDocumentDTO } from '../../src/application/dto/StatementDocumentDTO.js';

const fixturesDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../fixtures');

/** Loads a statement fixture; form feeds separate pages. */
export const loadStatement = (fileName: string, documentId: string): StatementDocumentDTO => ({
  documentId,
  fileName,
  pages: fs.readFileSync(path.join(fixturesDir, fileName), 'utf8').split('\f'),
});

export const monzoJanuary = () => loadStatement('monzo-2024-01.txt', 'monzo-jan');
export const monzoFebruary = () => loadStatement('monzo-2024-02.txt', 'monzo-feb');
export const nationwideFebruary = () => loadStatement('nationwide-2024-02.txt', 'nationwide-feb');

export const unreadableDocument = (documentId = 'letter'): StatementDocumentDTO => ({
  documentId,
  pages: ['Dear customer,\nyour new card is on its way.'],
});

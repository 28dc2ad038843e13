import { CategorizedTransactionDTO } from '../dto/CategorizedTransactionDTO.js';
import { ExportedLedgerDTO } from '../dto/ExportedLedgerDTO.js';
import { AssembledLedger } from '../services/LedgerAssembler.js';

export interface LedgerExporterPort {
  export(ledger: AssembledLedger, categories: Record<number, CategorizedTransactionDTO>): ExportedLedgerDTO;
}

import { CategorizedTransactionDTO } from '../dto/CategorizedTransactionDTO.js';

export interface CategorizerPort {
  categorize(
    transactions: ReadonlyArray<{ position: number; description: string; amount: number }>,
    context: { accountId: string; institution: string },
  ): Promise<Record<number, CategorizedTransactionDTO>>;
}

import { z } from 'zod';

export const CategorizedTransactionSchema = z.object({
  position: z.number().int().positive(),
  category: z.string(),
  subCategory: z.string().optional(),
  confidence: z.number().min(0).max(1),
});

export type CategorizedTransactionDTO = z.infer<typeof CategorizedTransactionSchema>;

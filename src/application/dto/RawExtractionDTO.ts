import { z } from 'zod';

const rawMoney = z.union([z.string(), z.number()]).nullable().optional();

export const RawStatementRowSchema = z.object({
  date: z.string(),
  description: z.string(),
  amount: z.union([z.string(), z.number()]),
  balance: rawMoney,
  transactionType: z.string().optional(),
});

export type RawStatementRowDTO = z.infer<typeof RawStatementRowSchema>;

export const RawPeriodMetadataSchema = z.object({
  accountIdentifier: z.string(),
  startDate: z.string().nullable().optional(),
  endDate: z.string().nullable().optional(),
  openingBalance: rawMoney,
  closingBalance: rawMoney,
  holderName: z.string().nullable().optional(),
});

export type RawPeriodMetadataDTO = z.infer<typeof RawPeriodMetadataSchema>;

export const RawExtractionSchema = z.object({
  rows: z.array(RawStatementRowSchema),
  period: RawPeriodMetadataSchema,
});

export type RawExtractionDTO = z.infer<typeof RawExtractionSchema>;

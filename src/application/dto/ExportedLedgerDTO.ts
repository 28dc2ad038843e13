import { z } from 'zod';
import { ContinuityReport } from '../../domain/entities/ContinuityReport.js';

export const ExportedPeriodSchema = z.object({
  periodId: z.string(),
  documentId: z.string(),
  startDate: z.string().nullable(),
  endDate: z.string().nullable(),
  openingBalance: z.number().nullable(),
  closingBalance: z.number().nullable(),
  extractorVersion: z.string(),
  transactionCount: z.number().int(),
  totalsStatus: z.enum(['ok', 'mismatch', 'balances_not_found']),
});

export const ExportedRowSchema = z.object({
  position: z.number().int().positive(),
  date: z.string(),
  description: z.string(),
  transactionType: z.string().nullable(),
  amount: z.number(),
  runningBalance: z.number().nullable(),
  periodId: z.string(),
  sequenceIndex: z.number().int(),
  category: z.string().nullable(),
  subCategory: z.string().nullable(),
});

export const ExportedLedgerSchema = z.object({
  accountId: z.string(),
  institution: z.string(),
  holderName: z.string().nullable(),
  status: z.enum(['continuous', 'gaps_detected', 'balance_mismatch', 'unchecked']),
  succeeded: z.boolean(),
  headline: z.string(),
  issues: z.array(z.string()),
  periods: z.array(ExportedPeriodSchema),
  rows: z.array(ExportedRowSchema),
  report: z.custom<ContinuityReport>((value) => typeof value === 'object' && value !== null),
});

export type ExportedPeriodDTO = z.infer<typeof ExportedPeriodSchema>;
export type ExportedRowDTO = z.infer<typeof ExportedRowSchema>;
export type ExportedLedgerDTO = z.infer<typeof ExportedLedgerSchema>;

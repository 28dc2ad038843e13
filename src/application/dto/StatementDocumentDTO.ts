import { z } from 'zod';

export const StatementDocumentSchema = z.object({
  documentId: z.string().min(1),
  fileName: z.string().optional(),
  pages: z.array(z.string()).min(1),
});

export type StatementDocumentDTO = z.infer<typeof StatementDocumentSchema>;

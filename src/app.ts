import cors from 'cors';
import express, { ErrorRequestHandler, Response } from 'express';
import { z } from 'zod';
import { StatementDocumentSchema } from './application/dto/StatementDocumentDTO.js';
import { isPipelineError } from './domain/errors/PipelineError.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { logger } from './infrastructure/logging/Logger.js';

const ReconcileRequestSchema = z.object({
  documents: z.array(StatementDocumentSchema).min(1),
  institutionHint: z.string().optional(),
});

const IngestRequestSchema = z.object({
  document: StatementDocumentSchema,
  institutionHint: z.string().optional(),
});

const sendPipelineError = (res: Response, error: unknown, fallbackMessage: string) => {
  if (isPipelineError(error)) {
    const status = error.code === 'UNSUPPORTED_DOCUMENT' ? 415 : 422;
    return res.status(status).json({ error: error.message, code: error.code, details: error.details });
  }

  logger.error(fallbackMessage, error);
  return res.status(500).json({ error: error instanceof Error ? error.message : fallbackMessage });
};

export const createApp = (container: AppContainer): express.Express => {
  const app = express();
  const { server, reconciliation } = container.config;

  app.use(cors({ origin: server.corsOrigin, credentials: false }));
  app.use(express.json({ limit: server.jsonBodyLimit }));

  app.get('/api/health', (req, res) => {
    res.json({
      name: 'Statement Ledger API',
      version: '0.1.0',
      extractors: container.registry.list().length,
      balanceToleranceMinorUnits: reconciliation.balanceToleranceMinorUnits,
    });
  });

  app.get('/api/extractors', (req, res) => {
    res.json({ extractors: container.registry.list() });
  });

  app.post('/api/reconcile', async (req, res) => {
    const parsed = ReconcileRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid reconcile request', issues: parsed.error.issues });
    }

    if (parsed.data.documents.length > reconciliation.maxDocumentsPerRequest) {
      return res.status(413).json({
        error: `At most ${reconciliation.maxDocumentsPerRequest} documents can be reconciled per request`,
      });
    }

    try {
      const result = await container.reconciliationService.reconcileDocuments(parsed.data.documents, {
        institutionHint: parsed.data.institutionHint,
      });
      return res.json(result);
    } catch (error) {
      return sendPipelineError(res, error, 'Unable to reconcile statements');
    }
  });

  app.post('/api/documents/ingest', async (req, res) => {
    const parsed = IngestRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid ingest request', issues: parsed.error.issues });
    }

    try {
      const period = await container.reconciliationService.ingestAndStore(
        parsed.data.document,
        parsed.data.institutionHint,
      );
      return res.status(201).json({ period });
    } catch (error) {
      return sendPipelineError(res, error, 'Unable to ingest statement');
    }
  });

  app.get('/api/accounts', async (req, res) => {
    try {
      res.json({ accounts: await container.storage.listAccounts() });
    } catch (error) {
      sendPipelineError(res, error, 'Unable to list accounts');
    }
  });

  app.get('/api/accounts/:institution/:accountId/ledger', async (req, res) => {
    try {
      const ledger = await container.reconciliationService.reconcileStoredAccount({
        institution: req.params.institution,
        accountId: req.params.accountId,
      });

      if (!ledger) {
        return res.status(404).json({ error: 'No statements stored for this account' });
      }
      return res.json(ledger);
    } catch (error) {
      return sendPipelineError(res, error, 'Unable to reconcile account');
    }
  });

  app.delete('/api/periods/:periodId', async (req, res) => {
    try {
      const removed = await container.storage.deletePeriod(req.params.periodId);
      if (!removed) {
        return res.status(404).json({ error: 'Statement period not found' });
      }
      return res.status(204).end();
    } catch (error) {
      return sendPipelineError(res, error, 'Unable to delete statement period');
    }
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'API endpoint not found' });
  });

  const handleError: ErrorRequestHandler = (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Request body is not valid JSON' });
      return;
    }
    logger.error('Unhandled request error', error, { path: req.path });
    res.status(500).json({ error: 'Internal server error' });
  };
  app.use(handleError);

  return app;
};

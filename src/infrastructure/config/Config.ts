import { z } from 'zod';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AppConfig {
  server: {
    port: number;
    corsOrigin: string;
    jsonBodyLimit: string;
  };
  reconciliation: {
    /** Allowed |delta| in minor units when chaining balances. 0 means exact equality. */
    balanceToleranceMinorUnits: number;
    maxDocumentsPerRequest: number;
  };
  logging: {
    level: LogLevel;
  };
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().default('*'),
  JSON_BODY_LIMIT: z.string().default('5mb'),
  BALANCE_TOLERANCE_MINOR_UNITS: z.coerce.number().int().min(0).default(0),
  MAX_DOCUMENTS_PER_REQUEST: z.coerce.number().int().positive().default(50),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  NODE_ENV: z.string().optional(),
});

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.parse(env);

  return {
    server: {
      port: parsed.PORT,
      corsOrigin: parsed.CORS_ORIGIN,
      jsonBodyLimit: parsed.JSON_BODY_LIMIT,
    },
    reconciliation: {
      balanceToleranceMinorUnits: parsed.BALANCE_TOLERANCE_MINOR_UNITS,
      maxDocumentsPerRequest: parsed.MAX_DOCUMENTS_PER_REQUEST,
    },
    logging: {
      level: parsed.LOG_LEVEL ?? (parsed.NODE_ENV === 'production' ? 'info' : 'debug'),
    },
  };
};

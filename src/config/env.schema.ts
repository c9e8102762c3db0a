import { z } from 'zod';

const booleanFlag = (fallback: 'true' | 'false') =>
  z.string().default(fallback).transform((v) => v === 'true' || v === '1');

const commaList = (fallback: string) =>
  z.string().default(fallback).transform((v) =>
    v.split(',').map((item) => item.trim()).filter((item) => item.length > 0),
  );

export const PeerDeploymentSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  token: z.string().min(1),
});

export type PeerDeployment = z.infer<typeof PeerDeploymentSchema>;

const peerDeployments = z.string().default('[]').transform((raw, ctx) => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a JSON array' });
    return z.NEVER;
  }
  const result = z.array(PeerDeploymentSchema).safeParse(parsed);
  if (!result.success) {
    for (const issue of result.error.issues) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `[${issue.path.join('.')}] ${issue.message}`,
      });
    }
    return z.NEVER;
  }
  return result.data;
});

export const envSchema = z.object({
  // Server
  PORT: z.coerce.number().int().min(1).max(65535).default(4000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_PATH: z.string().default('./logs'),
  CORS_ORIGINS: commaList('*'),

  // Auth
  JWT_SECRET: z.string().min(32),

  // Databases; per-handle connection details are read by config/database.ts
  DB_NAMES: commaList('asgs'),
  DB_AUTO_COMMIT: booleanFlag('false'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  DB_POOL_MAX: z.coerce.number().int().min(1).max(100).default(5),
  DB_CONNECT_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(5000),
  DB_CONNECT_BACKOFF_MULTIPLIER: z.coerce.number().min(1).max(10).default(1),
  DB_CONNECT_MAX_DELAY_MS: z.coerce.number().int().min(0).default(60000),
  // 0 keeps retrying until the database comes back
  DB_CONNECT_MAX_ATTEMPTS: z.coerce.number().int().min(0).default(0),
  DB_STATEMENT_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),

  // Image version freeze
  FREEZE_FILE_PATH: z.string().default('./freeze'),

  // Cross-deployment image version comparison
  DEPLOYMENT_NAME: z.string().min(1).default('local'),
  PEER_DEPLOYMENTS: peerDeployments,
  PEER_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(100).max(120000).default(10000),
  PEER_CONCURRENCY: z.coerce.number().int().min(1).max(20).default(4),

  // Deployment data
  JOB_ORDER_DEFAULTS_PATH: z.string().optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

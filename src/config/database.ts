import { z } from 'zod';
import type { EnvConfig } from './env.schema.js';

export interface DatabaseParams {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

const HandleEnvSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().min(1).max(65535),
  database: z.string().min(1),
  user: z.string().min(1),
  password: z.string().min(1),
});

function envPrefix(name: string): string {
  return `${name.toUpperCase().replace(/[^A-Z0-9]/g, '_')}_DB`;
}

/**
 * Resolves connection details for one named database handle.
 *
 * `asgs` reads `ASGS_DB_HOST`, `ASGS_DB_PORT`, `ASGS_DB_DATABASE`,
 * `ASGS_DB_USERNAME` and `ASGS_DB_PASSWORD`. Host and port fall back to the
 * shared `DB_HOST`/`DB_PORT`; the database name falls back to the handle name.
 */
export function getDatabaseParams(
  name: string,
  config: Pick<EnvConfig, 'DB_HOST' | 'DB_PORT'>,
  env: NodeJS.ProcessEnv = process.env,
): DatabaseParams {
  const prefix = envPrefix(name);
  const result = HandleEnvSchema.safeParse({
    host: env[`${prefix}_HOST`] ?? config.DB_HOST,
    port: env[`${prefix}_PORT`] ?? config.DB_PORT,
    database: env[`${prefix}_DATABASE`] ?? name,
    user: env[`${prefix}_USERNAME`],
    password: env[`${prefix}_PASSWORD`],
  });

  if (!result.success) {
    const keys: Record<string, string> = {
      host: 'HOST',
      port: 'PORT',
      database: 'DATABASE',
      user: 'USERNAME',
      password: 'PASSWORD',
    };
    const errors = result.error.issues
      .map((i) => `  ${prefix}_${keys[String(i.path[0])] ?? String(i.path[0])}: ${i.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }

  return result.data;
}

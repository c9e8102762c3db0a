import { envSchema, type EnvConfig, type PeerDeployment } from './env.schema.js';

let config: EnvConfig | null = null;

const WEAK_JWT_SECRETS = new Set([
  'changeme-changeme-changeme-changeme',
  'secret-secret-secret-secret-secret!',
  'replace-with-a-long-random-jwt-secret',
]);

function validateJwtSecret(secret: string): void {
  if (process.env.NODE_ENV === 'production' && WEAK_JWT_SECRETS.has(secret.toLowerCase())) {
    throw new Error('Invalid environment configuration:\n  JWT_SECRET: insecure JWT secret value is not allowed');
  }
}

function validatePeerNames(data: EnvConfig): void {
  const seen = new Set<string>([data.DEPLOYMENT_NAME]);
  for (const peer of data.PEER_DEPLOYMENTS) {
    if (seen.has(peer.name)) {
      throw new Error(
        `Invalid environment configuration:\n  PEER_DEPLOYMENTS: duplicate deployment name "${peer.name}"`,
      );
    }
    seen.add(peer.name);
  }
}

export function getConfig(): EnvConfig {
  if (!config) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      const errors = result.error.issues
        .map((i) => `  ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new Error(`Invalid environment configuration:\n${errors}`);
    }
    validateJwtSecret(result.data.JWT_SECRET);
    validatePeerNames(result.data);
    config = result.data;
  }
  return config;
}

export type { EnvConfig, PeerDeployment };

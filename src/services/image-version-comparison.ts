import { fetch as undiciFetch } from 'undici';
import pLimit from 'p-limit';
import { z } from 'zod';
import type { PeerDeployment } from '../config/index.js';
import { createChildLogger } from '../utils/logger.js';

const log = createChildLogger('image-version-comparison');

const PeerImageVersionsSchema = z.object({
  Response: z.record(z.string(), z.string()),
});

export interface JobImageComparison {
  /** Image per deployment; null where the deployment has no such job. */
  versions: Record<string, string | null>;
  matches: boolean;
}

export interface ImageVersionComparison {
  deployments: string[];
  jobs: Record<string, JobImageComparison>;
  /** Deployments that could not be reached, with the reason. */
  errors: Record<string, string>;
}

export interface ComparisonOptions {
  localName: string;
  peers: PeerDeployment[];
  timeoutMs: number;
  concurrency: number;
}

/** Fetches `/get_job_image_versions` from one peer deployment. */
export async function fetchPeerImageVersions(peer: PeerDeployment, timeoutMs: number): Promise<Record<string, string>> {
  const url = new URL('get_job_image_versions', peer.url.endsWith('/') ? peer.url : `${peer.url}/`);

  const res = await undiciFetch(url, {
    headers: {
      Authorization: `Bearer ${peer.token}`,
      Accept: 'application/json',
    },
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!res.ok) {
    throw new Error(`HTTP ${res.status}`);
  }

  const body = PeerImageVersionsSchema.safeParse(await res.json());
  if (!body.success) {
    throw new Error('Unexpected response shape');
  }
  return body.data.Response;
}

/**
 * Lines up the job image versions of this deployment with those of every peer.
 * A job matches when every reachable deployment runs the same image for it.
 */
export async function compareImageVersions(
  localVersions: Record<string, string>,
  options: ComparisonOptions,
): Promise<ImageVersionComparison> {
  const limit = pLimit(options.concurrency);
  const byDeployment: Record<string, Record<string, string>> = { [options.localName]: localVersions };
  const errors: Record<string, string> = {};

  await Promise.all(options.peers.map((peer) => limit(async () => {
    try {
      byDeployment[peer.name] = await fetchPeerImageVersions(peer, options.timeoutMs);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log.warn({ err, deployment: peer.name }, 'Peer image versions unavailable');
      errors[peer.name] = reason;
    }
  })));

  const deployments = [options.localName, ...options.peers.map((peer) => peer.name)]
    .filter((name) => name in byDeployment);

  const jobNames = new Set<string>();
  for (const versions of Object.values(byDeployment)) {
    for (const jobName of Object.keys(versions)) jobNames.add(jobName);
  }

  const jobs: Record<string, JobImageComparison> = {};
  for (const jobName of [...jobNames].sort()) {
    const versions: Record<string, string | null> = {};
    for (const deployment of deployments) {
      versions[deployment] = byDeployment[deployment]?.[jobName] ?? null;
    }
    const distinct = new Set(Object.values(versions));
    jobs[jobName] = { versions, matches: distinct.size === 1 && !distinct.has(null) };
  }

  return { deployments, jobs, errors };
}

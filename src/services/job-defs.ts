import { z } from 'zod';

/** Job definition columns that the procedure hands back as JSON-encoded strings. */
const JSON_ENCODED_FIELDS = ['COMMAND_LINE', 'COMMAND_MATRIX', 'PARALLEL'] as const;

const RawJobDefinitionSchema = z.record(z.string(), z.unknown());

/** `get_supervisor_job_defs_json()` returns a list of `{ <job name>: { ...definition } }`. */
const RawJobDefsSchema = z.array(z.record(z.string(), RawJobDefinitionSchema));

export type JobDefinition = Record<string, unknown>;
export type JobDefinitions = Record<string, JobDefinition>;

function decodeField(jobName: string, field: string, value: unknown): unknown {
  if (value === null || value === undefined) return null;
  if (typeof value !== 'string') return value;
  try {
    return JSON.parse(value);
  } catch (err) {
    throw new Error(`Job definition ${jobName} has malformed ${field}`, { cause: err });
  }
}

/**
 * Merges the per-job entries into one object keyed by job name and decodes the
 * array columns. A missing payload yields an empty object.
 */
export function normalizeJobDefs(payload: unknown): JobDefinitions {
  if (payload === null || payload === undefined) return {};

  const entries = RawJobDefsSchema.parse(payload);
  const defs: JobDefinitions = {};

  for (const entry of entries) {
    for (const [jobName, definition] of Object.entries(entry)) {
      const normalized: JobDefinition = { ...definition };
      for (const field of JSON_ENCODED_FIELDS) {
        normalized[field] = decodeField(jobName, field, definition[field]);
      }
      defs[jobName] = normalized;
    }
  }

  return defs;
}

/** `{ <job name>: <image> }` for every definition that names an image. */
export function extractImageVersions(defs: JobDefinitions): Record<string, string> {
  const versions: Record<string, string> = {};
  for (const [jobName, definition] of Object.entries(defs)) {
    if (typeof definition.IMAGE === 'string') {
      versions[jobName] = definition.IMAGE;
    }
  }
  return versions;
}

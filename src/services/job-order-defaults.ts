import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { WorkflowType } from '../models/workflow.js';

export const JobOrderLinkSchema = z.object({
  recordId: z.number().int().positive(),
  nextJobTypeId: z.number().int().positive(),
  step: z.string().optional(),
});

export type JobOrderLink = z.infer<typeof JobOrderLinkSchema>;

const JobOrderLinksSchema = z.array(JobOrderLinkSchema).min(1);

export const DefaultJobOrdersSchema = z.object({
  ASGS: JobOrderLinksSchema,
  ECFLOW: JobOrderLinksSchema,
  HECRAS: JobOrderLinksSchema,
});

export type DefaultJobOrders = Record<WorkflowType, JobOrderLink[]>;

export const DEFAULT_JOB_ORDER_FILE = fileURLToPath(new URL('../../data/default-job-order.json', import.meta.url));

/** Reads and validates the per-workflow default job order. */
export function loadDefaultJobOrders(filePath: string = DEFAULT_JOB_ORDER_FILE): DefaultJobOrders {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new Error(`Unable to read default job order file ${filePath}`, { cause: err });
  }

  const result = DefaultJobOrdersSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Invalid default job order file ${filePath}:\n${errors}`);
  }
  return result.data;
}

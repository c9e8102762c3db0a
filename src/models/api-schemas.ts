import { z } from 'zod';
import {
  ImageRepoSchema,
  JobTypeNameSchema,
  NextJobTypeNameSchema,
  RunStatusSchema,
  WorkflowTypeSchema,
} from './workflow.js';

// ─── Standard envelopes ─────────────────────────────────────────────
export const ErrorResponseSchema = z.object({
  error: z.string(),
});

export const MessageResponseSchema = z.object({
  Response: z.string(),
});

// Stored procedure payloads pass through as they come back
export const PayloadResponseSchema = z.object({
  Response: z.unknown(),
});

// ─── Health schemas ─────────────────────────────────────────────────
export const HealthResponseSchema = z.object({
  status: z.string(),
  timestamp: z.string(),
});

export const ReadinessResponseSchema = z.object({
  status: z.enum(['healthy', 'unhealthy']),
  checks: z.record(z.string(), z.object({ status: z.string() })),
  timestamp: z.string(),
});

// ─── Job order ──────────────────────────────────────────────────────
export const WorkflowTypeParamsSchema = z.object({
  workflow_type_name: WorkflowTypeSchema,
});

export const NextJobParamsSchema = z.object({
  job_type_name: JobTypeNameSchema,
  next_job_type_name: NextJobTypeNameSchema,
  workflow_type_name: WorkflowTypeSchema,
});

// ─── Image versions ─────────────────────────────────────────────────
export const ImageVersionParamsSchema = z.object({
  image_repo: ImageRepoSchema,
  job_type_name: JobTypeNameSchema,
  version: z.string().min(1),
});

export const ImageVersionsResponseSchema = z.object({
  Response: z.record(z.string(), z.string()),
});

export const FreezeStatusResponseSchema = z.object({
  Response: z.object({ frozen: z.boolean() }),
});

// ─── Runs ───────────────────────────────────────────────────────────
// Decimal digits only, within the safe integer range.
// Sign is checked in the handler so non-positive ids get a descriptive 400
export const InstanceIdSchema = z.string()
  .regex(/^-?\d+$/, 'Instance id must be a decimal integer')
  .transform(Number)
  .pipe(z.number().int().safe());

export const RunParamsSchema = z.object({
  instance_id: InstanceIdSchema,
  uid: z.string().min(1),
});

export const RunStatusParamsSchema = RunParamsSchema.extend({
  status: RunStatusSchema,
});

export const RunListEntrySchema = z.object({
  status: z.string().nullish(),
}).passthrough();

export const RunListResponseSchema = z.object({
  Response: z.array(RunListEntrySchema.extend({ final_status: z.enum(['Error', 'Success']) })),
});

export const RunStatusResponseSchema = z.object({
  Response: z.object({
    instance_id: z.number().int(),
    uid: z.string(),
    status: z.string().nullable(),
  }),
});

// ─── Logs ───────────────────────────────────────────────────────────
export const LogFileQuerySchema = z.object({
  log_file: z.string().min(1),
});

export const LogFileListResponseSchema = z.object({
  Response: z.record(z.string(), z.object({
    file_name: z.string(),
    url: z.string(),
    file_size: z.string(),
  })),
});

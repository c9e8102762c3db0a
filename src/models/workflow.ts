import { z } from 'zod';

export const WORKFLOW_TYPES = ['ASGS', 'ECFLOW', 'HECRAS'] as const;
export const WorkflowTypeSchema = z.enum(WORKFLOW_TYPES);
export type WorkflowType = z.infer<typeof WorkflowTypeSchema>;

export const JOB_TYPE_NAMES = [
  'adcirc2cog-tiff-job',
  'adcirctime-to-cog-job',
  'adcirc-to-kalpana-cog-job',
  'ast-run-harvester-job',
  'collab-data-sync-job',
  'final-staging-job',
  'geotiff2cog-job',
  'hazus',
  'load-geo-server-job',
  'load-geo-server-s3-job',
  'obs-mod-ast-job',
  'staging',
  'timeseriesdb-ingest-job',
] as const;
export const JobTypeNameSchema = z.enum(JOB_TYPE_NAMES);
export type JobTypeName = z.infer<typeof JobTypeNameSchema>;

/** Every job type, plus the terminal `complete` marker a job can hand off to. */
export const NextJobTypeNameSchema = z.enum([...JOB_TYPE_NAMES, 'complete'] as const);
export type NextJobTypeName = z.infer<typeof NextJobTypeNameSchema>;

export const RunStatusSchema = z.enum(['new', 'debug', 'do not rerun']);
export type RunStatus = z.infer<typeof RunStatusSchema>;

export const ImageRepoSchema = z.enum(['containers.renci.org', 'renciorg']);
export type ImageRepo = z.infer<typeof ImageRepoSchema>;

export const IMAGE_REPO_PREFIXES: Record<ImageRepo, string> = {
  'containers.renci.org': 'containers.renci.org/eds',
  renciorg: 'renciorg',
};

export const JOB_TYPE_IMAGE_NAMES: Record<JobTypeName, string> = {
  'adcirc2cog-tiff-job': '/adcirc2cog:',
  'adcirctime-to-cog-job': '/adcirctime2cogs:',
  'adcirc-to-kalpana-cog-job': '/adcirc-to-kalpana-cog-job:',
  'ast-run-harvester-job': '/ast_run_harvester:',
  'collab-data-sync-job': '/apsviz-collab-sync:',
  'final-staging-job': '/stagedata:',
  'geotiff2cog-job': '/adcirc2cog:',
  hazus: '/adras:',
  'load-geo-server-job': '/load_geoserver:',
  'load-geo-server-s3-job': '/load_geoserver:',
  'obs-mod-ast-job': '/ast_supp:',
  staging: '/stagedata:',
  'timeseriesdb-ingest-job': '/apsviz-timeseriesdb-ingest:',
};

/** Stable ids of the job type rows the next-job pointers refer to. */
export const JOB_TYPE_IDS: Record<NextJobTypeName, number> = {
  'adcirc2cog-tiff-job': 23,
  'adcirctime-to-cog-job': 26,
  'adcirc-to-kalpana-cog-job': 30,
  'ast-run-harvester-job': 27,
  'collab-data-sync-job': 29,
  complete: 21,
  'final-staging-job': 20,
  'geotiff2cog-job': 24,
  hazus: 12,
  'load-geo-server-job': 19,
  'load-geo-server-s3-job': 28,
  'obs-mod-ast-job': 25,
  staging: 11,
  'timeseriesdb-ingest-job': 31,
};

/** Version labels must carry a `v<int>.<int>.<int>` tag, e.g. `v1.2.3` or `v1.2.3-rc1`. */
export const IMAGE_VERSION_PATTERN = /v\d+\.\d+\.\d+/;

export function isValidImageVersion(version: string): boolean {
  return IMAGE_VERSION_PATTERN.test(version);
}

/** Job config rows are keyed by the k8s job name prefix, which ends in a hyphen. */
export function toJobName(jobType: JobTypeName): string {
  return `${jobType}-`;
}

export function buildImageName(repo: ImageRepo, jobType: JobTypeName, version: string): string {
  return `${IMAGE_REPO_PREFIXES[repo]}${JOB_TYPE_IMAGE_NAMES[jobType]}${version}`;
}

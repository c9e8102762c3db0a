import type { DbRegistry } from '../db/db-registry.js';
import { StatementFailedError } from '../db/errors.js';
import { firstValue, isFailed, sql, type SqlStatement } from '../db/sql-result.js';
import type { RunStatus, WorkflowType } from '../models/workflow.js';
import { createChildLogger } from '../utils/logger.js';
import type { DefaultJobOrders } from './job-order-defaults.js';
import { extractImageVersions, normalizeJobDefs, type JobDefinitions } from './job-defs.js';

const log = createChildLogger('settings-repository');

/** All workflow settings live in the ASGS database. */
export const SETTINGS_DB = 'asgs';

/**
 * Stored procedure calls behind the settings routes. Each method issues one
 * statement, except resetJobOrder which writes a whole default order as one batch.
 */
export class SettingsRepository {
  constructor(
    private readonly db: DbRegistry,
    private readonly defaultJobOrders: DefaultJobOrders,
  ) {}

  async getJobDefs(): Promise<JobDefinitions> {
    const payload = await this.read('get_supervisor_job_defs_json', sql('SELECT public.get_supervisor_job_defs_json()'));
    return normalizeJobDefs(payload);
  }

  async getJobImageVersions(): Promise<Record<string, string>> {
    return extractImageVersions(await this.getJobDefs());
  }

  async getJobOrder(workflowType: WorkflowType): Promise<unknown> {
    return this.read(
      'get_supervisor_job_order',
      sql('SELECT public.get_supervisor_job_order(?)', workflowType),
    );
  }

  /**
   * Rewrites every next-job pointer of a workflow to its default. Either all
   * updates are committed together or none is: the first failed update stops
   * the batch and the unit of work rolls the rest back.
   */
  async resetJobOrder(workflowType: WorkflowType): Promise<boolean> {
    const links = this.defaultJobOrders[workflowType];

    return this.db.unitOfWork(SETTINGS_DB, async () => {
      for (const link of links) {
        const result = await this.db.execute(
          SETTINGS_DB,
          sql(
            'SELECT public.update_next_job_for_job(?::integer, ?::integer, ?::text)',
            link.recordId,
            link.nextJobTypeId,
            workflowType,
          ),
        );

        if (result.status !== 'rows') {
          log.error({ workflowType, recordId: link.recordId, status: result.status }, 'Job order reset aborted');
          return false;
        }
      }

      await this.db.commit(SETTINGS_DB);
      return true;
    });
  }

  async updateNextJobForJob(jobName: string, nextJobTypeId: number, workflowType: WorkflowType): Promise<boolean> {
    return this.write(
      sql(
        'SELECT public.update_next_job_for_job(?::text, ?::integer, ?::text)',
        jobName,
        nextJobTypeId,
        workflowType,
      ),
    );
  }

  async updateJobImageVersion(jobName: string, image: string): Promise<boolean> {
    return this.write(sql('SELECT public.update_job_image(?, ?)', jobName, image));
  }

  async updateRunStatus(instanceId: number, uid: string, status: RunStatus): Promise<boolean> {
    return this.write(
      sql("SELECT public.set_config_item(?, ?, 'supervisor_job_status', ?)", instanceId, uid, status),
    );
  }

  async getRunList(): Promise<unknown> {
    return this.read('get_supervisor_run_list', sql('SELECT public.get_supervisor_run_list()'));
  }

  async getRunProps(instanceId: number, uid: string): Promise<unknown> {
    return this.read('get_run_prop_items_json', sql('SELECT public.get_run_prop_items_json(?, ?)', instanceId, uid));
  }

  private async read(procedure: string, statement: SqlStatement): Promise<unknown> {
    const result = await this.db.execute(SETTINGS_DB, statement);
    if (isFailed(result)) {
      throw new StatementFailedError(procedure, { cause: result.error });
    }
    return firstValue(result);
  }

  /** Runs one update and commits it unless it failed. */
  private async write(statement: SqlStatement): Promise<boolean> {
    return this.db.unitOfWork(SETTINGS_DB, async () => {
      const result = await this.db.execute(SETTINGS_DB, statement);
      if (isFailed(result)) {
        return false;
      }
      await this.db.commit(SETTINGS_DB);
      return true;
    });
  }
}

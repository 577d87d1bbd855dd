import { v4 as uuidv4 } from 'uuid';
import type { AlertPipelinePort, PipelineJob } from '@fleetwatch/domain';
import { getPool, type SqlExecutor } from './pool.js';

/** Outbox table polled by the triage pipeline. */
export class PgAlertPipelineQueue implements AlertPipelinePort {
  constructor(private readonly db: SqlExecutor = getPool()) {}

  async enqueue(job: PipelineJob): Promise<void> {
    await this.db.query(
      `INSERT INTO triage.alert_pipeline_jobs (id, kind, alert_id, company_id, context)
       VALUES ($1,$2,$3,$4,$5::jsonb)`,
      [uuidv4(), job.kind, job.alertId, job.companyId, JSON.stringify(job.context)],
    );
  }
}

// ---------------------------------------------------------------------------
// Hand-off to the triage pipeline. The pipeline reports back through
// AlertTriagePort; nothing here waits for it.
// ---------------------------------------------------------------------------

export type PipelineJobKind = 'triage' | 'revalidation';

export interface PipelineJob {
  kind: PipelineJobKind;
  alertId: string;
  companyId: string;
  context: Record<string, unknown>;
}

export interface AlertPipelinePort {
  enqueue(job: PipelineJob): Promise<void>;
}

import type {
  Alert,
  AlertTriagePort,
  CompanyConfig,
  CompletionInput,
  DecisionProposal,
  Incident,
  InvestigationResult,
  LockedAlert,
  NotificationDecision,
  RevalidationWindow,
  TriageOutcome,
  TriageResult,
} from '@fleetwatch/domain';
import {
  NotFoundError,
  addInvestigationRecord,
  applyMonitorMatrixOverride,
  decisionFromAiPayload,
  exhaustedAssessment,
  getMaxInvestigations,
  initializeAttention,
  markAsCompleted,
  markAsFailed,
  markAsInvestigating,
  markAsProcessing,
  nextCheckMinutesFor,
  recordRevalidationWindow,
} from '@fleetwatch/domain';
import type { EngineDeps } from '../engine-deps.js';
import { contactsForAlert } from './alert-contacts.js';
import type { IncidentService } from './incident.service.js';

function toCompletionInput(result: TriageResult): CompletionInput {
  return {
    assessment: result.assessment,
    humanMessage: result.humanMessage,
    alertContext: result.alertContext,
    execution: result.execution,
    notificationDecision: result.notificationDecision && { ...result.notificationDecision },
  };
}

/**
 * Completes a triaged alert inside an existing lock scope and starts its
 * attention clocks when warranted.
 */
export async function completeLocked(
  locked: LockedAlert,
  input: CompletionInput,
  config: CompanyConfig,
  now: Date,
  metadata: Record<string, unknown> = {},
): Promise<Alert> {
  const completed = markAsCompleted(locked.alert, input, now);
  const attended = initializeAttention(completed, config, now);
  const { id: alertId, companyId } = completed;

  await locked.recordActivity({
    alertId,
    companyId,
    action: 'ai_completed',
    metadata: { verdict: completed.verdict, riskEscalation: completed.riskEscalation, ...metadata },
    createdAt: now,
  });
  if (attended) {
    await locked.recordActivity({
      alertId,
      companyId,
      action: 'attention_initialized',
      metadata: { ackDueAt: attended.ackDueAt?.toISOString(), resolveDueAt: attended.resolveDueAt?.toISOString() },
      createdAt: now,
    });
  }
  return locked.save(attended ?? completed);
}

/** What the triage pipeline calls back into once it has looked at an alert. */
export class AlertTriageService implements AlertTriagePort {
  constructor(
    private readonly deps: EngineDeps,
    private readonly incidents: IncidentService,
  ) {}

  async startProcessing(alertId: string): Promise<Alert> {
    const now = this.deps.clock.now();
    return this.deps.alerts.withAlertLock(alertId, async (locked) => {
      const next = markAsProcessing(locked.alert, now);
      await locked.recordActivity({
        alertId,
        companyId: next.companyId,
        action: 'ai_processing_started',
        metadata: {},
        createdAt: now,
      });
      return locked.save(next);
    });
  }

  async complete(alertId: string, result: TriageResult): Promise<TriageOutcome> {
    const config = await this.configFor(alertId);
    const now = this.deps.clock.now();
    const alert = await this.deps.alerts.withAlertLock(alertId, (locked) =>
      completeLocked(locked, toCompletionInput(result), config, now),
    );
    console.log('[alert-triage] alert completed', { alertId, verdict: alert.verdict, severity: alert.severity });

    const decision = await this.recordDecision(alert, result, config);
    const incident = await this.correlate(alert);
    return { alert, decision, incident };
  }

  async investigate(alertId: string, result: InvestigationResult): Promise<TriageOutcome> {
    const config = await this.configFor(alertId);
    const maxInvestigations = getMaxInvestigations(config);
    const now = this.deps.clock.now();

    const alert = await this.deps.alerts.withAlertLock(alertId, async (locked) => {
      const count = locked.alert.ai?.investigationCount ?? 0;
      if (count >= maxInvestigations) {
        const exhausted = exhaustedAssessment(result.assessment, maxInvestigations);
        return completeLocked(locked, { ...toCompletionInput(result), ...exhausted }, config, now, {
          reason: 'max_investigations',
          maxInvestigations,
        });
      }

      const nextCheckMinutes = nextCheckMinutesFor(config, count, result.nextCheckMinutes);
      const investigating = markAsInvestigating(
        locked.alert,
        { ...toCompletionInput(result), nextCheckMinutes },
        now,
        { maxInvestigations },
      );
      const reason = result.reason ?? result.assessment.monitoringReason ?? 'Continued monitoring';
      const next = addInvestigationRecord(investigating, reason, now);
      await locked.recordActivity({
        alertId,
        companyId: next.companyId,
        action: 'ai_investigating',
        metadata: { investigationCount: next.ai?.investigationCount, nextCheckMinutes, reason },
        createdAt: now,
      });
      return locked.save(next);
    });

    if (alert.aiStatus === 'completed') {
      console.log('[alert-triage] investigation limit reached, completed for review', { alertId, maxInvestigations });
      const decision = await this.recordDecision(alert, result, config);
      const incident = await this.correlate(alert);
      return { alert, decision, incident };
    }

    console.log('[alert-triage] alert under investigation', {
      alertId,
      investigationCount: alert.ai?.investigationCount,
      nextCheckMinutes: alert.ai?.nextCheckMinutes,
    });
    const decision = await this.recordDecision(alert, result, config);
    return { alert, decision, incident: null };
  }

  async fail(alertId: string, error: string): Promise<Alert> {
    const now = this.deps.clock.now();
    const alert = await this.deps.alerts.withAlertLock(alertId, async (locked) => {
      const next = markAsFailed(locked.alert, error, now);
      await locked.recordActivity({
        alertId,
        companyId: next.companyId,
        action: 'ai_failed',
        metadata: { error },
        createdAt: now,
      });
      return locked.save(next);
    });
    console.warn('[alert-triage] alert failed', { alertId, error });
    return alert;
  }

  async recordRevalidationWindow(
    alertId: string,
    window: RevalidationWindow,
    findings: Record<string, number>,
  ): Promise<Alert> {
    const now = this.deps.clock.now();
    return this.deps.alerts.withAlertLock(alertId, async (locked) => {
      const next = recordRevalidationWindow(locked.alert, window, findings, now);
      await locked.recordActivity({
        alertId,
        companyId: next.companyId,
        action: 'ai_revalidated',
        metadata: { minutesCovered: window.minutesCovered, findings },
        createdAt: now,
      });
      return locked.save(next);
    });
  }

  private async configFor(alertId: string): Promise<CompanyConfig> {
    const alert = await this.deps.alerts.findById(alertId);
    if (!alert) throw new NotFoundError('Alert', alertId);
    return this.deps.companies.getConfig(alert.companyId);
  }

  /** Records the pipeline's decision when it notifies, or the monitor-level override. */
  private async recordDecision(
    alert: Alert,
    result: TriageResult,
    config: CompanyConfig,
  ): Promise<NotificationDecision | null> {
    const payload = result.notificationDecision;
    if (!payload) return null;

    let proposal: DecisionProposal | null;
    if (payload.shouldNotify) {
      proposal = decisionFromAiPayload(alert, payload);
    } else {
      const contacts = await contactsForAlert(this.deps, alert);
      proposal = applyMonitorMatrixOverride(payload, alert, config, contacts, result.humanMessage);
    }
    if (!proposal) return null;

    const decision = await this.deps.decisions.createWithRecipients(proposal.draft, proposal.recipients);
    console.log('[alert-triage] notification decision recorded', {
      alertId: alert.id,
      decisionId: decision.id,
      escalationLevel: decision.escalationLevel,
      recipients: decision.recipients.length,
    });
    return decision;
  }

  /** The completion is already committed; a failed correlation is logged, not rethrown. */
  private async correlate(alert: Alert): Promise<Incident | null> {
    try {
      return await this.incidents.createFromAlert(alert);
    } catch (err) {
      console.error('[alert-triage] incident correlation failed', { alertId: alert.id }, err);
      return null;
    }
  }
}

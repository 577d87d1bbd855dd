import type {
  Alert,
  AlertActivityAction,
  AlertOwner,
  AttentionCommandPort,
  CompanyConfig,
  LockedAlert,
} from '@fleetwatch/domain';
import {
  acknowledgeAttention,
  assignOwner,
  buildEscalationDecision,
  closeAttention,
  needsEscalation,
  planEscalation,
} from '@fleetwatch/domain';
import type { EngineDeps } from '../engine-deps.js';
import { contactsForAlert } from './alert-contacts.js';

export interface AttentionSweepResult {
  checked: number;
  escalated: number;
  exhausted: number;
  failed: number;
}

type EscalationOutcome = 'escalated' | 'exhausted' | 'skipped';

/** Escalates unacknowledged alerts and applies operator commands. */
export class AttentionService implements AttentionCommandPort {
  constructor(
    private readonly deps: EngineDeps,
    private readonly batchSize = 100,
  ) {}

  // ─── Sweep ──────────────────────────────────────────────────────────────────

  async sweep(): Promise<AttentionSweepResult> {
    const now = this.deps.clock.now();
    const due = await this.deps.alerts.listDueForEscalation(now, this.batchSize);
    const configs = new Map<string, CompanyConfig>();
    const result: AttentionSweepResult = { checked: 0, escalated: 0, exhausted: 0, failed: 0 };

    for (const candidate of due) {
      result.checked += 1;
      try {
        let config = configs.get(candidate.companyId);
        if (!config) {
          config = await this.deps.companies.getConfig(candidate.companyId);
          configs.set(candidate.companyId, config);
        }
        const outcome = await this.escalate(candidate.id, config, now);
        if (outcome === 'escalated') result.escalated += 1;
        if (outcome === 'exhausted') result.exhausted += 1;
      } catch (err) {
        result.failed += 1;
        console.error('[attention] escalation failed', { alertId: candidate.id }, err);
      }
    }

    if (result.checked > 0) console.log('[attention] sweep finished', result);
    return result;
  }

  private escalate(alertId: string, config: CompanyConfig, now: Date): Promise<EscalationOutcome> {
    return this.deps.alerts.withAlertLock(alertId, async (locked): Promise<EscalationOutcome> => {
      // acked or rescheduled since the candidate list was read
      if (!needsEscalation(locked.alert, now)) return 'skipped';

      const plan = planEscalation(locked.alert, config, now);
      if (plan.kind === 'exhausted') {
        await this.record(locked, 'attention_escalated', now, undefined, {
          exhausted: true,
          maxEscalations: plan.maxEscalations,
        });
        await locked.save(plan.alert);
        console.log('[attention] escalation limit reached', { alertId, maxEscalations: plan.maxEscalations });
        return 'exhausted';
      }

      const contacts = await contactsForAlert(this.deps, plan.alert);
      const proposal = buildEscalationDecision(plan.alert, plan, config, contacts);
      const decision = proposal
        ? await locked.recordDecision(proposal.draft, proposal.recipients)
        : null;
      if (!decision) {
        console.warn('[attention] no reachable contacts for escalation', { alertId, matrixKey: plan.matrixKey });
      }

      await this.record(locked, 'attention_escalated', now, undefined, {
        escalationLevel: plan.alert.escalationLevel,
        escalationCount: plan.newCount,
        matrixKey: plan.matrixKey,
        decisionId: decision?.id,
      });
      await locked.save(plan.alert);
      console.log('[attention] alert escalated', { alertId, level: plan.alert.escalationLevel, count: plan.newCount });
      return 'escalated';
    });
  }

  // ─── Commands ───────────────────────────────────────────────────────────────

  acknowledge(alertId: string, actorUserId: string): Promise<Alert> {
    return this.command(alertId, 'attention_acked', actorUserId, (alert, now) => acknowledgeAttention(alert, now));
  }

  assign(alertId: string, owner: AlertOwner | null, actorUserId: string): Promise<Alert> {
    return this.command(
      alertId,
      'attention_assigned',
      actorUserId,
      (alert, now) => assignOwner(alert, owner, now),
      owner ? { ...owner } : { kind: null },
    );
  }

  close(alertId: string, actorUserId: string): Promise<Alert> {
    return this.command(alertId, 'attention_closed', actorUserId, (alert, now) => closeAttention(alert, now));
  }

  /** Applies a pure transition; unchanged alerts are returned without a write. */
  private command(
    alertId: string,
    action: AlertActivityAction,
    actorUserId: string,
    apply: (alert: Alert, now: Date) => Alert,
    metadata: Record<string, unknown> = {},
  ): Promise<Alert> {
    const now = this.deps.clock.now();
    return this.deps.alerts.withAlertLock(alertId, async (locked) => {
      const next = apply(locked.alert, now);
      if (next === locked.alert) return locked.alert;
      await this.record(locked, action, now, actorUserId, metadata);
      return locked.save(next);
    });
  }

  private async record(
    locked: LockedAlert,
    action: AlertActivityAction,
    now: Date,
    userId: string | undefined,
    metadata: Record<string, unknown>,
  ): Promise<void> {
    await locked.recordActivity({
      alertId: locked.alert.id,
      companyId: locked.alert.companyId,
      userId,
      action,
      metadata,
      createdAt: now,
    });
  }
}

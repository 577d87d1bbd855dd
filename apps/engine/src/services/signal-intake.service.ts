import type {
  Alert,
  CompanyConfig,
  DetectionRule,
  NotificationDecision,
  Signal,
  SignalIngestOutcome,
  SignalIngestionPort,
} from '@fleetwatch/domain';
import {
  applyStreamEventUpdate,
  buildImmediateDecision,
  buildSignalFromStreamEvent,
  createPendingAlert,
  getNormalizedLabels,
  markAsCompletedByRule,
  matchRule,
  ruleTriggersImmediateNotify,
  ruleTriggersPipeline,
} from '@fleetwatch/domain';
import type { EngineDeps } from '../engine-deps.js';
import { streamEventSchema } from '../schemas/stream-event.schema.js';

/**
 * Entry point for the safety event stream. Stores every event as a signal and
 * raises an alert when a detection rule matches a newly seen one.
 */
export class SignalIntakeService implements SignalIngestionPort {
  constructor(private readonly deps: EngineDeps) {}

  async ingest(companyId: string, raw: unknown): Promise<SignalIngestOutcome> {
    const event = streamEventSchema.parse(raw);
    const { signals, companies, alerts } = this.deps;
    const now = this.deps.clock.now();

    const existing = await signals.findBySourceEventId(companyId, event.id);
    if (existing) {
      const signal = await signals.update(applyStreamEventUpdate(existing, event, now));
      console.log('[signal-intake] signal updated', { companyId, sourceEventId: event.id });
      return { kind: 'updated', signal };
    }

    const signal = await signals.create(buildSignalFromStreamEvent(companyId, event, now));
    const config = await companies.getConfig(companyId);
    const rule = matchRule(signal, config);
    if (!rule) {
      return { kind: 'stored', signal };
    }

    const duplicate = await alerts.findBySourceEventId(companyId, signal.sourceEventId);
    if (duplicate) {
      console.log('[signal-intake] alert already exists for event', {
        sourceEventId: signal.sourceEventId,
        alertId: duplicate.id,
      });
      return { kind: 'duplicate_alert', signal, alert: duplicate };
    }

    const created = await alerts.create(createPendingAlert(signal));
    console.log('[signal-intake] rule matched, alert created', {
      companyId,
      sourceEventId: signal.sourceEventId,
      ruleId: rule.id,
      action: rule.action,
      alertId: created.id,
    });

    let alert = created;
    let decision: NotificationDecision | null = null;
    if (ruleTriggersImmediateNotify(rule.action)) {
      ({ alert, decision } = await this.notifyImmediately(created, signal, rule, config));
    }

    let enqueued = false;
    if (ruleTriggersPipeline(rule.action)) {
      await this.deps.pipeline.enqueue({
        kind: 'triage',
        alertId: alert.id,
        companyId,
        context: {
          signalId: signal.id,
          sourceEventId: signal.sourceEventId,
          ruleId: rule.id,
          labels: getNormalizedLabels(signal, config.canonicalLabels),
        },
      });
      enqueued = true;
    }

    return { kind: 'alerted', signal, alert, rule, decision, enqueued };
  }

  /**
   * Records the rule's decision. A rule that skips triage also completes the
   * alert; with `both` it stays pending for the pipeline.
   */
  private async notifyImmediately(
    alert: Alert,
    signal: Signal,
    rule: DetectionRule,
    config: CompanyConfig,
  ): Promise<{ alert: Alert; decision: NotificationDecision }> {
    const contacts = await this.deps.contacts.listForSubject(alert.companyId, {
      vehicleId: signal.vehicleId,
      driverId: signal.driverId,
    });
    const proposal = buildImmediateDecision(alert, signal, rule, config, contacts);
    const decision = await this.deps.decisions.createWithRecipients(proposal.draft, proposal.recipients);
    if (decision.recipients.length === 0) {
      console.warn('[signal-intake] immediate decision has no reachable recipients', {
        alertId: alert.id,
        ruleId: rule.id,
      });
    }

    if (ruleTriggersPipeline(rule.action)) {
      return { alert, decision };
    }

    const now = this.deps.clock.now();
    const completed = await this.deps.alerts.withAlertLock(alert.id, async (locked) => {
      const next = markAsCompletedByRule(locked.alert, decision.messageText ?? '', now);
      await locked.recordActivity({
        alertId: next.id,
        companyId: next.companyId,
        action: 'ai_completed',
        metadata: { ruleId: rule.id, decisionId: decision.id },
        createdAt: now,
      });
      return locked.save(next);
    });
    return { alert: completed, decision };
  }
}

import type { Alert, EscalationLevel } from '../entities/alert.js';
import type { CompanyConfig, EscalationMatrixKey } from '../entities/company-config.js';
import { getEscalationMatrixKey, warrantsAttention } from './alert-attention.js';

function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * 60_000);
}

/**
 * Starts the ack/resolve SLA clocks. Returns null when the engine is disabled,
 * attention was already initialized, or the alert does not warrant it.
 */
export function initializeAttention(alert: Alert, config: CompanyConfig, now: Date): Alert | null {
  if (!config.attentionEngine.enabled) return null;
  if (alert.attentionState !== undefined) return null;
  if (!warrantsAttention(alert)) return null;

  const sla = config.slaPolicies[alert.severity];
  return {
    ...alert,
    attentionState: 'needs_attention',
    ackStatus: 'pending',
    ackDueAt: addMinutes(now, sla.ackMinutes),
    resolveDueAt: addMinutes(now, sla.resolveMinutes),
    nextEscalationAt: addMinutes(now, config.escalationPolicy.escalationIntervalMinutes),
    escalationLevel: 0,
    escalationCount: 0,
    updatedAt: now,
  };
}

/** Stops the escalation timer. Already-acked alerts are returned unchanged. */
export function acknowledgeAttention(alert: Alert, now: Date): Alert {
  if (alert.ackStatus === 'acked') return alert;
  return {
    ...alert,
    ackStatus: 'acked',
    ackedAt: now,
    attentionState: 'in_progress',
    nextEscalationAt: undefined,
    updatedAt: now,
  };
}

export function closeAttention(alert: Alert, now: Date): Alert {
  if (alert.attentionState === 'closed') return alert;
  return {
    ...alert,
    attentionState: 'closed',
    resolvedAt: now,
    nextEscalationAt: undefined,
    updatedAt: now,
  };
}

export function needsEscalation(alert: Alert, now: Date): boolean {
  return (
    alert.attentionState === 'needs_attention' &&
    alert.ackStatus === 'pending' &&
    alert.nextEscalationAt !== undefined &&
    alert.nextEscalationAt.getTime() <= now.getTime()
  );
}

export type EscalationPlan =
  | { kind: 'exhausted'; alert: Alert; maxEscalations: number }
  | {
      kind: 'escalate';
      alert: Alert;
      matrixKey: Exclude<EscalationMatrixKey, 'monitor'>;
      newCount: number;
      maxEscalations: number;
    };

function nextLevel(level: EscalationLevel): EscalationLevel {
  return level === 0 ? 1 : 2;
}

/**
 * One step up the escalation ladder, capped at level 2. Once the count
 * reaches `maxEscalations` the timer is cleared instead.
 */
export function planEscalation(alert: Alert, config: CompanyConfig, now: Date): EscalationPlan {
  const { maxEscalations, escalationIntervalMinutes } = config.escalationPolicy;
  if (alert.escalationCount >= maxEscalations) {
    return {
      kind: 'exhausted',
      alert: { ...alert, nextEscalationAt: undefined, updatedAt: now },
      maxEscalations,
    };
  }

  const escalationLevel = nextLevel(alert.escalationLevel);
  const newCount = alert.escalationCount + 1;
  return {
    kind: 'escalate',
    alert: {
      ...alert,
      escalationLevel,
      escalationCount: newCount,
      nextEscalationAt: addMinutes(now, escalationIntervalMinutes),
      updatedAt: now,
    },
    matrixKey: getEscalationMatrixKey(escalationLevel),
    newCount,
    maxEscalations,
  };
}

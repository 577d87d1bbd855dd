import type {
  AiStatus,
  Alert,
  EscalationLevel,
  HumanUrgencyLevel,
  RiskEscalation,
  Verdict,
} from '../entities/alert.js';
import type { EscalationMatrixKey } from '../entities/company-config.js';
import type { SignalSeverity } from '../entities/signal.js';

const ATTENTION_VERDICTS: readonly Verdict[] = [
  'real_panic',
  'confirmed_violation',
  'risk_detected',
  'needs_review',
];

const HIGH_RISK_VERDICTS: readonly Verdict[] = ['real_panic', 'confirmed_violation', 'risk_detected'];

export function requiresUrgentEscalation(alert: Pick<Alert, 'riskEscalation'>): boolean {
  return alert.riskEscalation === 'call' || alert.riskEscalation === 'emergency';
}

/**
 * Operational workflow flag. An explicit attention state wins; otherwise only
 * alerts still awaiting human review can need attention.
 */
export function needsAttention(alert: Alert): boolean {
  if (alert.attentionState === 'closed') return false;
  if (alert.attentionState === 'needs_attention') return true;
  if (alert.humanStatus !== 'pending') return false;
  return (
    alert.aiStatus === 'failed' ||
    alert.aiStatus === 'investigating' ||
    alert.severity === 'critical' ||
    requiresUrgentEscalation(alert)
  );
}

/** Communication priority; independent of `attentionState`. */
export function getHumanUrgencyLevel(alert: Alert): HumanUrgencyLevel {
  if (alert.humanStatus !== 'pending') return 'low';
  if (alert.aiStatus === 'failed' || alert.severity === 'critical') return 'high';
  if (requiresUrgentEscalation(alert)) return 'high';
  if (alert.aiStatus === 'investigating') return 'medium';
  return 'low';
}

export function warrantsAttention(alert: Alert): boolean {
  if (alert.severity === 'critical') return true;
  if (
    alert.riskEscalation === 'warn' ||
    alert.riskEscalation === 'call' ||
    alert.riskEscalation === 'emergency'
  ) {
    return true;
  }
  return alert.verdict !== undefined && ATTENTION_VERDICTS.includes(alert.verdict);
}

export function hasHighRiskVerdict(alert: Pick<Alert, 'verdict'>): boolean {
  return alert.verdict !== undefined && HIGH_RISK_VERDICTS.includes(alert.verdict);
}

export function isProcessed(alert: Alert): boolean {
  return alert.aiStatus === 'completed' || alert.aiStatus === 'failed';
}

export function hasOwner(alert: Alert): boolean {
  return alert.ownerUserId !== undefined || alert.ownerContactId !== undefined;
}

// ─── SLA clocks ───────────────────────────────────────────────────────────────

function secondsUntil(due: Date, now: Date): number {
  return Math.trunc((due.getTime() - now.getTime()) / 1000);
}

/** Signed seconds to the ack deadline (negative when overdue); null once acked. */
export function ackSlaRemainingSeconds(alert: Alert, now: Date): number | null {
  if (!alert.ackDueAt || alert.ackStatus === 'acked') return null;
  return secondsUntil(alert.ackDueAt, now);
}

export function isOverdueForAck(alert: Alert, now: Date): boolean {
  return (
    alert.ackStatus === 'pending' &&
    alert.ackDueAt !== undefined &&
    now.getTime() > alert.ackDueAt.getTime()
  );
}

export function resolveSlaRemainingSeconds(alert: Alert, now: Date): number | null {
  if (!alert.resolveDueAt || alert.attentionState === 'closed') return null;
  return secondsUntil(alert.resolveDueAt, now);
}

export function isOverdueForResolution(alert: Alert, now: Date): boolean {
  return (
    alert.attentionState !== 'closed' &&
    alert.resolveDueAt !== undefined &&
    now.getTime() > alert.resolveDueAt.getTime()
  );
}

export function getEscalationMatrixKey(level: EscalationLevel): Exclude<EscalationMatrixKey, 'monitor'> {
  if (level >= 2) return 'emergency';
  if (level >= 1) return 'call';
  return 'warn';
}

// ─── Ownership ────────────────────────────────────────────────────────────────

export type AlertOwner = { kind: 'user'; userId: string } | { kind: 'contact'; contactId: string };

/** An alert is owned by a user or a contact, never both. */
export function assignOwner(alert: Alert, owner: AlertOwner | null, now: Date): Alert {
  if (owner === null) {
    return { ...alert, ownerUserId: undefined, ownerContactId: undefined, updatedAt: now };
  }
  return owner.kind === 'user'
    ? { ...alert, ownerUserId: owner.userId, ownerContactId: undefined, updatedAt: now }
    : { ...alert, ownerUserId: undefined, ownerContactId: owner.contactId, updatedAt: now };
}

// ─── Ordering ─────────────────────────────────────────────────────────────────

const RISK_RANK: Record<RiskEscalation, number> = { emergency: 4, call: 3, warn: 2, monitor: 1 };
const SEVERITY_RANK: Record<SignalSeverity, number> = { critical: 3, warning: 2, info: 1 };
const AI_STATUS_RANK: Record<AiStatus, number> = {
  failed: 3,
  investigating: 2,
  processing: 1,
  pending: 0,
  completed: -1,
};

function timeOf(date: Date | undefined): number {
  return date ? date.getTime() : Number.NEGATIVE_INFINITY;
}

/**
 * Comparator for attention queues: risk, severity, pending human review,
 * AI status, then most recent first.
 */
export function compareAttentionPriority(a: Alert, b: Alert): number {
  const risk = (b.riskEscalation ? RISK_RANK[b.riskEscalation] : 0) - (a.riskEscalation ? RISK_RANK[a.riskEscalation] : 0);
  if (risk !== 0) return risk;
  const severity = SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity];
  if (severity !== 0) return severity;
  const human = Number(b.humanStatus === 'pending') - Number(a.humanStatus === 'pending');
  if (human !== 0) return human;
  const ai = AI_STATUS_RANK[b.aiStatus] - AI_STATUS_RANK[a.aiStatus];
  if (ai !== 0) return ai;
  const occurred = timeOf(b.occurredAt) - timeOf(a.occurredAt);
  if (occurred !== 0 && !Number.isNaN(occurred)) return occurred;
  return b.createdAt.getTime() - a.createdAt.getTime();
}

import type { SignalSeverity } from './signal.js';

export type AiStatus = 'pending' | 'processing' | 'investigating' | 'completed' | 'failed';

export type Verdict =
  | 'real_panic'
  | 'confirmed_violation'
  | 'needs_review'
  | 'uncertain'
  | 'likely_false_positive'
  | 'no_action_needed'
  | 'risk_detected';

export type Likelihood = 'high' | 'medium' | 'low';

export type RiskEscalation = 'monitor' | 'warn' | 'call' | 'emergency';

export type AlertKind = 'panic' | 'safety' | 'tampering' | 'connectivity' | 'unknown';

export type HumanStatus = 'pending' | 'reviewed' | 'flagged' | 'resolved' | 'false_positive';

export type AttentionState = 'needs_attention' | 'in_progress' | 'blocked' | 'closed';

export type AckStatus = 'pending' | 'acked';

/** 0 → warn, 1 → call, 2 → emergency (see getEscalationMatrixKey). */
export type EscalationLevel = 0 | 1 | 2;

export type HumanUrgencyLevel = 'high' | 'medium' | 'low';

export const AI_STATUSES: readonly AiStatus[] = [
  'pending',
  'processing',
  'investigating',
  'completed',
  'failed',
];

export const HUMAN_STATUSES: readonly HumanStatus[] = [
  'pending',
  'reviewed',
  'flagged',
  'resolved',
  'false_positive',
];

export const VERDICTS: readonly Verdict[] = [
  'real_panic',
  'confirmed_violation',
  'needs_review',
  'uncertain',
  'likely_false_positive',
  'no_action_needed',
  'risk_detected',
];

export const RISK_ESCALATIONS: readonly RiskEscalation[] = ['monitor', 'warn', 'call', 'emergency'];

export const ALERT_KINDS: readonly AlertKind[] = [
  'panic',
  'safety',
  'tampering',
  'connectivity',
  'unknown',
];

/**
 * Payload produced by the AI pipeline. Only the fields the lifecycle reads are
 * typed; everything else is kept verbatim in `AlertAi.aiAssessment`.
 */
export interface AiAssessment {
  readonly verdict?: Verdict;
  readonly likelihood?: Likelihood;
  readonly confidence?: number;
  readonly reasoning?: string;
  readonly riskEscalation?: RiskEscalation;
  readonly dedupeKey?: string;
  readonly monitoringReason?: string;
  readonly requiresMonitoring?: boolean;
  readonly nextCheckMinutes?: number;
  readonly supportingEvidence?: unknown;
  readonly recommendedActions?: string[];
  readonly summary?: string;
  readonly [extra: string]: unknown;
}

export interface AlertContext {
  readonly alertKind?: AlertKind;
  readonly proactiveFlag?: boolean;
  readonly triageNotes?: string;
  readonly investigationStrategy?: string;
  readonly [extra: string]: unknown;
}

export interface RevalidationWindow {
  readonly start?: string;
  readonly end?: string;
  readonly minutesCovered: number;
}

export interface InvestigationRecord {
  readonly investigationNumber: number;
  readonly timestamp: string;
  readonly reason: string;
  readonly aiReason?: string;
  readonly aiEvaluatedAt?: string;
  readonly timeWindow?: RevalidationWindow;
  readonly findings?: Record<string, number>;
}

/** 1:1 sub-record holding the AI investigation state of an alert. */
export interface AlertAi {
  readonly alertId: string;
  readonly aiAssessment?: AiAssessment;
  readonly alertContext?: AlertContext;
  readonly aiActions?: Record<string, unknown>;
  readonly monitoringReason?: string;
  readonly triageNotes?: string;
  readonly investigationStrategy?: string;
  readonly supportingEvidence?: unknown;
  readonly investigationCount: number;
  readonly lastInvestigationAt?: Date;
  readonly nextCheckMinutes?: number;
  readonly investigationHistory: InvestigationRecord[];
  readonly aiError?: string;
}

export interface Alert {
  readonly id: string;
  readonly companyId: string;
  readonly signalId?: string;
  readonly aiStatus: AiStatus;
  readonly severity: SignalSeverity;
  readonly verdict?: Verdict;
  readonly likelihood?: Likelihood;
  /** 0.0 – 1.0 */
  readonly confidence?: number;
  readonly reasoning?: string;
  readonly aiMessage?: string;
  readonly alertKind: AlertKind;
  readonly dedupeKey?: string;
  readonly riskEscalation?: RiskEscalation;
  /** Raised without a human-initiated trigger. */
  readonly proactiveFlag: boolean;
  readonly humanStatus: HumanStatus;
  readonly reviewedById?: string;
  readonly reviewedAt?: Date;
  readonly attentionState?: AttentionState;
  readonly ackStatus?: AckStatus;
  readonly ownerUserId?: string;
  readonly ownerContactId?: string;
  readonly ackDueAt?: Date;
  readonly ackedAt?: Date;
  readonly resolveDueAt?: Date;
  readonly resolvedAt?: Date;
  readonly nextEscalationAt?: Date;
  readonly escalationLevel: EscalationLevel;
  readonly escalationCount: number;
  readonly occurredAt?: Date;
  /** Lightweight cache of the last decision payload; the audit trail lives in NotificationDecision. */
  readonly notificationDecisionPayload?: Record<string, unknown>;
  readonly eventDescription?: string;
  readonly ai?: AlertAi;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

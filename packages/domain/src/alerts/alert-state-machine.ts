import type {
  AiAssessment,
  AiStatus,
  Alert,
  AlertAi,
  AlertContext,
  InvestigationRecord,
  RevalidationWindow,
} from '../entities/alert.js';
import type { CompanyConfig } from '../entities/company-config.js';
import type { Signal } from '../entities/signal.js';
import { AlertTransitionError, RevalidationLimitError, assertNever } from '../errors.js';

export const DEFAULT_MAX_INVESTIGATIONS = 3;

// ─── Transition table ─────────────────────────────────────────────────────────

/**
 * Legal `aiStatus` moves. `investigating → investigating` is the revalidation
 * loop; completed and failed are terminal.
 */
export function canTransition(from: AiStatus, to: AiStatus): boolean {
  switch (from) {
    case 'pending':
      return to === 'processing' || to === 'completed' || to === 'failed';
    case 'processing':
      return to === 'investigating' || to === 'completed' || to === 'failed';
    case 'investigating':
      return to === 'investigating' || to === 'completed' || to === 'failed';
    case 'completed':
    case 'failed':
      return false;
    default:
      return assertNever(from);
  }
}

export function isTerminalAiStatus(status: AiStatus): boolean {
  return status === 'completed' || status === 'failed';
}

function assertTransition(alert: Alert, to: AiStatus): void {
  if (!canTransition(alert.aiStatus, to)) {
    throw new AlertTransitionError(alert.id, alert.aiStatus, to);
  }
}

export function emptyAlertAi(alertId: string): AlertAi {
  return { alertId, investigationCount: 0, investigationHistory: [] };
}

export type AlertDraft = Omit<Alert, 'id' | 'createdAt' | 'updatedAt' | 'ai'>;

/** New `pending` alert raised proactively by a safety signal. */
export function createPendingAlert(signal: Signal): AlertDraft {
  return {
    companyId: signal.companyId,
    signalId: signal.id,
    aiStatus: 'pending',
    severity: signal.severity,
    alertKind: 'safety',
    proactiveFlag: true,
    humanStatus: 'pending',
    escalationLevel: 0,
    escalationCount: 0,
    occurredAt: signal.occurredAt,
    eventDescription: signal.primaryBehaviorLabel ?? 'Safety event',
  };
}

// ─── Inputs ───────────────────────────────────────────────────────────────────

export interface CompletionInput {
  assessment: AiAssessment;
  humanMessage: string;
  alertContext?: AlertContext;
  /** Actions the pipeline executed; stored as `aiActions`. */
  execution?: Record<string, unknown>;
  /** Cached verbatim, not validated against NotificationDecision. */
  notificationDecision?: Record<string, unknown>;
}

export interface InvestigationInput extends CompletionInput {
  nextCheckMinutes: number;
}

export interface InvestigationLimits {
  maxInvestigations?: number;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function applyAssessment(alert: Alert, input: CompletionInput): Alert {
  const { assessment, alertContext } = input;
  return {
    ...alert,
    aiMessage: input.humanMessage,
    verdict: assessment.verdict ?? alert.verdict,
    likelihood: assessment.likelihood ?? alert.likelihood,
    confidence: assessment.confidence ?? alert.confidence,
    reasoning: assessment.reasoning ?? alert.reasoning,
    dedupeKey: assessment.dedupeKey ?? alert.dedupeKey,
    riskEscalation: assessment.riskEscalation ?? alert.riskEscalation,
    proactiveFlag: alertContext ? alertContext.proactiveFlag ?? false : alert.proactiveFlag,
    alertKind: alertContext?.alertKind ?? alert.alertKind,
    notificationDecisionPayload: input.notificationDecision ?? alert.notificationDecisionPayload,
  };
}

function syncAiData(ai: AlertAi, input: CompletionInput): AlertAi {
  const { assessment, alertContext } = input;
  return {
    ...ai,
    aiAssessment: assessment,
    alertContext: alertContext ?? ai.alertContext,
    aiActions: input.execution ?? ai.aiActions,
    monitoringReason: assessment.monitoringReason ?? ai.monitoringReason,
    triageNotes: alertContext?.triageNotes ?? ai.triageNotes,
    investigationStrategy: alertContext?.investigationStrategy ?? ai.investigationStrategy,
    supportingEvidence: assessment.supportingEvidence ?? ai.supportingEvidence,
  };
}

// ─── Transitions ──────────────────────────────────────────────────────────────

export function markAsProcessing(alert: Alert, now: Date): Alert {
  assertTransition(alert, 'processing');
  return { ...alert, aiStatus: 'processing', updatedAt: now };
}

export function markAsCompleted(alert: Alert, input: CompletionInput, now: Date): Alert {
  assertTransition(alert, 'completed');
  return {
    ...applyAssessment(alert, input),
    aiStatus: 'completed',
    ai: syncAiData(alert.ai ?? emptyAlertAi(alert.id), input),
    updatedAt: now,
  };
}

/**
 * Enters (or stays in) `investigating` and counts one more investigation.
 * The count never exceeds `maxInvestigations`.
 */
export function markAsInvestigating(
  alert: Alert,
  input: InvestigationInput,
  now: Date,
  limits: InvestigationLimits = {},
): Alert {
  assertTransition(alert, 'investigating');
  const max = limits.maxInvestigations ?? DEFAULT_MAX_INVESTIGATIONS;
  const ai = alert.ai ?? emptyAlertAi(alert.id);
  const investigationCount = ai.investigationCount + 1;
  if (investigationCount > max) {
    throw new RevalidationLimitError(alert.id, max);
  }
  return {
    ...applyAssessment(alert, input),
    aiStatus: 'investigating',
    ai: syncAiData(
      {
        ...ai,
        investigationCount,
        lastInvestigationAt: now,
        nextCheckMinutes: input.nextCheckMinutes,
      },
      input,
    ),
    updatedAt: now,
  };
}

/** Completes an alert a detection rule handled without triage. */
export function markAsCompletedByRule(alert: Alert, humanMessage: string, now: Date): Alert {
  assertTransition(alert, 'completed');
  return { ...alert, aiStatus: 'completed', aiMessage: humanMessage, updatedAt: now };
}

/** Creates the AI sub-record if missing so that a failed alert always carries `aiError`. */
export function markAsFailed(alert: Alert, error: string, now: Date): Alert {
  assertTransition(alert, 'failed');
  return {
    ...alert,
    aiStatus: 'failed',
    ai: { ...(alert.ai ?? emptyAlertAi(alert.id)), aiError: error },
    updatedAt: now,
  };
}

// ─── Revalidation timer ───────────────────────────────────────────────────────

/** Pure time comparison; the caller polls it. */
export function shouldRevalidate(alert: Alert, now: Date): boolean {
  if (alert.aiStatus !== 'investigating') return false;
  const ai = alert.ai;
  if (!ai || !ai.lastInvestigationAt || !ai.nextCheckMinutes) return true;
  const elapsedMinutes = Math.floor((now.getTime() - ai.lastInvestigationAt.getTime()) / 60_000);
  return elapsedMinutes >= ai.nextCheckMinutes;
}

// ─── Investigation history ────────────────────────────────────────────────────

/**
 * Amends the latest entry when it belongs to the current investigation,
 * otherwise appends one. Without an AI sub-record nothing happens.
 */
export function addInvestigationRecord(alert: Alert, reason: string, now: Date): Alert {
  const ai = alert.ai;
  if (!ai) return alert;

  const history = ai.investigationHistory;
  const last = history[history.length - 1];
  const timestamp = now.toISOString();

  let next: InvestigationRecord[];
  if (last && last.investigationNumber === ai.investigationCount) {
    next = [...history.slice(0, -1), { ...last, aiReason: reason, aiEvaluatedAt: timestamp }];
  } else {
    next = [...history, { investigationNumber: ai.investigationCount, timestamp, reason }];
  }
  return { ...alert, ai: { ...ai, investigationHistory: next }, updatedAt: now };
}

/**
 * Records the window a revalidation is about to inspect. The entry is numbered
 * for the upcoming investigation so the next `addInvestigationRecord` amends it.
 */
export function recordRevalidationWindow(
  alert: Alert,
  window: RevalidationWindow,
  findings: Record<string, number>,
  now: Date,
): Alert {
  const ai = alert.ai;
  if (!ai) return alert;
  const investigationNumber = ai.investigationCount + 1;
  const entry: InvestigationRecord = {
    investigationNumber,
    timestamp: now.toISOString(),
    reason: `Revalidation #${investigationNumber}: ${window.minutesCovered} min of new data`,
    timeWindow: window,
    findings,
  };
  return {
    ...alert,
    ai: { ...ai, investigationHistory: [...ai.investigationHistory, entry] },
    updatedAt: now,
  };
}

export function getMaxInvestigations(config: CompanyConfig | null | undefined): number {
  return config?.usageLimits.maxRevalidationsPerEvent ?? DEFAULT_MAX_INVESTIGATIONS;
}

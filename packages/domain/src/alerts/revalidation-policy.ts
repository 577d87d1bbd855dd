import type { AiAssessment, Alert, InvestigationRecord } from '../entities/alert.js';
import type { CompanyConfig } from '../entities/company-config.js';
import { getMaxInvestigations, shouldRevalidate } from './alert-state-machine.js';

export type RevalidationPlan =
  | { kind: 'skip' }
  | { kind: 'waiting' }
  | { kind: 'exhausted'; maxInvestigations: number }
  | { kind: 'due'; investigationCount: number; maxInvestigations: number };

/**
 * Window already recorded for the next investigation that the pipeline has
 * not reported back on yet.
 */
export function pendingRevalidation(alert: Alert): InvestigationRecord | null {
  const ai = alert.ai;
  if (!ai) return null;
  const last = ai.investigationHistory[ai.investigationHistory.length - 1];
  return last && last.investigationNumber > ai.investigationCount ? last : null;
}

// A pending request is retried once a full check interval passes without an answer.
function retryDue(pending: InvestigationRecord, alert: Alert, now: Date): boolean {
  const requestedAt = new Date(pending.timestamp).getTime();
  if (Number.isNaN(requestedAt)) return true;
  const interval = alert.ai?.nextCheckMinutes || 30;
  return now.getTime() - requestedAt >= interval * 60_000;
}

/** Decides what a sweep should do with one alert right now. */
export function planRevalidation(alert: Alert, config: CompanyConfig, now: Date): RevalidationPlan {
  if (alert.aiStatus !== 'investigating') return { kind: 'skip' };
  const maxInvestigations = getMaxInvestigations(config);
  const investigationCount = alert.ai?.investigationCount ?? 0;
  if (!shouldRevalidate(alert, now)) return { kind: 'waiting' };
  if (investigationCount >= maxInvestigations) return { kind: 'exhausted', maxInvestigations };
  const pending = pendingRevalidation(alert);
  if (pending && !retryDue(pending, alert, now)) return { kind: 'waiting' };
  return { kind: 'due', investigationCount, maxInvestigations };
}

/**
 * Assessment used to close an alert that ran out of automatic analyses: it
 * goes to a human with a `warn` escalation.
 */
export function exhaustedAssessment(
  previous: AiAssessment | undefined,
  maxInvestigations: number,
): { assessment: AiAssessment; humanMessage: string } {
  return {
    assessment: {
      ...previous,
      verdict: 'needs_review',
      likelihood: 'medium',
      confidence: 0.5,
      reasoning: 'Maximum revalidations reached. Requires human review.',
      riskEscalation: 'warn',
      requiresMonitoring: false,
    },
    humanMessage: `This event requires manual review after ${maxInvestigations} automatic analyses.`,
  };
}

/**
 * Minutes until the next check. An explicit request wins; otherwise the
 * interval grows with the number of investigations already run.
 */
export function nextCheckMinutesFor(
  config: CompanyConfig,
  investigationCount: number,
  requested?: number,
): number {
  if (requested !== undefined && requested > 0) return requested;
  const intervals = config.monitoring.checkIntervals;
  if (intervals.length === 0) return 30;
  const index = Math.min(Math.max(investigationCount, 0), intervals.length - 1);
  return intervals[index] ?? 30;
}

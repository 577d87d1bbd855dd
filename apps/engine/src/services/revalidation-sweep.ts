import type { Alert, CompanyConfig, RevalidationPlan, RevalidationWindow } from '@fleetwatch/domain';
import { exhaustedAssessment, planRevalidation, recordRevalidationWindow } from '@fleetwatch/domain';
import type { EngineDeps } from '../engine-deps.js';
import { completeLocked } from './alert-triage.service.js';

export interface RevalidationSweepResult {
  checked: number;
  enqueued: number;
  exhausted: number;
  waiting: number;
  failed: number;
}

const MINUTE_MS = 60_000;

/**
 * Polls alerts under investigation whose check window has elapsed. Due ones get their revalidation window
 * recorded and a job queued; those out of automatic analyses go to a human.
 */
export class RevalidationSweep {
  constructor(
    private readonly deps: EngineDeps,
    private readonly batchSize = 100,
  ) {}

  async run(): Promise<RevalidationSweepResult> {
    const now = this.deps.clock.now();
    const candidates = await this.deps.alerts.listDueForRevalidation(now, this.batchSize);
    const configs = new Map<string, CompanyConfig>();
    const result: RevalidationSweepResult = { checked: 0, enqueued: 0, exhausted: 0, waiting: 0, failed: 0 };

    for (const candidate of candidates) {
      result.checked += 1;
      try {
        let config = configs.get(candidate.companyId);
        if (!config) {
          config = await this.deps.companies.getConfig(candidate.companyId);
          configs.set(candidate.companyId, config);
        }
        const plan = await this.revalidate(candidate.id, config, now);
        if (plan.kind === 'due') result.enqueued += 1;
        else if (plan.kind === 'exhausted') result.exhausted += 1;
        else if (plan.kind === 'waiting') result.waiting += 1;
      } catch (err) {
        result.failed += 1;
        console.error('[revalidation-sweep] failed to revalidate alert', { alertId: candidate.id }, err);
      }
    }

    if (result.enqueued + result.exhausted + result.failed > 0) {
      console.log('[revalidation-sweep] sweep finished', result);
    }
    return result;
  }

  private revalidate(alertId: string, config: CompanyConfig, now: Date): Promise<RevalidationPlan> {
    return this.deps.alerts.withAlertLock(alertId, async (locked) => {
      const plan = planRevalidation(locked.alert, config, now);

      if (plan.kind === 'exhausted') {
        const exhausted = exhaustedAssessment(locked.alert.ai?.aiAssessment, plan.maxInvestigations);
        await completeLocked(locked, exhausted, config, now, {
          reason: 'max_revalidations',
          maxInvestigations: plan.maxInvestigations,
        });
        console.log('[revalidation-sweep] revalidation limit reached, sent to human review', { alertId });
      }

      if (plan.kind === 'due') {
        const window = windowSince(locked.alert, now);
        const findings = await this.findingsFor(locked.alert, window, now);
        const next = recordRevalidationWindow(locked.alert, window, findings, now);
        await locked.recordActivity({
          alertId,
          companyId: next.companyId,
          action: 'ai_revalidated',
          metadata: { minutesCovered: window.minutesCovered, findings },
          createdAt: now,
        });
        await locked.save(next);
        await this.deps.pipeline.enqueue({
          kind: 'revalidation',
          alertId,
          companyId: next.companyId,
          context: {
            investigationNumber: plan.investigationCount + 1,
            maxInvestigations: plan.maxInvestigations,
            timeWindow: window,
            findings,
          },
        });
      }

      return plan;
    });
  }

  /** Signals of the same vehicle or driver since the window opened, by severity. */
  private async findingsFor(alert: Alert, window: RevalidationWindow, now: Date): Promise<Record<string, number>> {
    const findings: Record<string, number> = { newSignals: 0, critical: 0, warning: 0, info: 0 };
    const signal = alert.signalId ? await this.deps.signals.findById(alert.signalId) : null;
    if (!signal || !window.start) return findings;

    const recent = await this.deps.signals.listInWindow({
      companyId: alert.companyId,
      vehicleId: signal.vehicleId,
      driverId: signal.driverId,
      from: new Date(window.start),
      to: now,
    });
    for (const other of recent) {
      if (other.id === signal.id) continue;
      findings['newSignals'] = (findings['newSignals'] ?? 0) + 1;
      findings[other.severity] = (findings[other.severity] ?? 0) + 1;
    }
    return findings;
  }
}

function windowSince(alert: Alert, now: Date): RevalidationWindow {
  const start = alert.ai?.lastInvestigationAt ?? alert.occurredAt ?? alert.createdAt;
  return {
    start: start.toISOString(),
    end: now.toISOString(),
    minutesCovered: Math.max(0, Math.floor((now.getTime() - start.getTime()) / MINUTE_MS)),
  };
}

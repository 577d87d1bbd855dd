import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import type { Alert } from '@fleetwatch/domain';
import { RevalidationSweep } from '../services/revalidation-sweep.js';
import type { InMemoryDeps } from './in-memory.js';
import { T0, inMemoryDeps, makeAlert, makeSignal, minutesAfter } from './in-memory.js';

function investigating(count: number, overrides: Partial<Alert> = {}): Alert {
  return makeAlert({
    aiStatus: 'investigating',
    ai: {
      alertId: 'alert-seed',
      investigationCount: count,
      lastInvestigationAt: T0,
      nextCheckMinutes: 5,
      investigationHistory: [{ investigationNumber: count, timestamp: T0.toISOString(), reason: 'Needs another look' }],
    },
    ...overrides,
  });
}

describe('RevalidationSweep', () => {
  let deps: InMemoryDeps;

  beforeEach(() => {
    deps = inMemoryDeps(minutesAfter(T0, 6));
    deps.signals.seed(makeSignal());
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('records the window and queues a revalidation once the check interval has passed', async () => {
    deps.signals.seed(
      makeSignal({ id: 'sig-later', sourceEventId: 'evt-later', severity: 'critical', occurredAt: minutesAfter(T0, 2) }),
    );
    deps.alerts.seed(investigating(1));

    const result = await new RevalidationSweep(deps).run();

    expect(result).toEqual({ checked: 1, enqueued: 1, exhausted: 0, waiting: 0, failed: 0 });
    const timeWindow = { start: '2024-03-01T10:00:00.000Z', end: '2024-03-01T10:06:00.000Z', minutesCovered: 6 };
    const findings = { newSignals: 1, critical: 1, warning: 0, info: 0 };
    expect(deps.pipeline.jobs).toEqual([
      {
        kind: 'revalidation',
        alertId: 'alert-seed',
        companyId: 'co-1',
        context: { investigationNumber: 2, maxInvestigations: 3, timeWindow, findings },
      },
    ]);
    expect(deps.alerts.get('alert-seed').ai?.investigationHistory[1]).toEqual({
      investigationNumber: 2,
      timestamp: '2024-03-01T10:06:00.000Z',
      reason: 'Revalidation #2: 6 min of new data',
      timeWindow,
      findings,
    });
    expect(deps.alerts.actionsFor('alert-seed')).toEqual(['ai_revalidated']);
  });

  it('does not queue again while the pipeline has not answered', async () => {
    deps.alerts.seed(investigating(1));
    const sweep = new RevalidationSweep(deps);
    await sweep.run();

    const second = await sweep.run();

    expect(second).toEqual({ checked: 1, enqueued: 0, exhausted: 0, waiting: 1, failed: 0 });
    expect(deps.pipeline.jobs).toHaveLength(1);
  });

  it('retries an unanswered request after another interval', async () => {
    deps.alerts.seed(investigating(1));
    const sweep = new RevalidationSweep(deps);
    await sweep.run();
    deps.clock.advanceMinutes(5);

    const retry = await sweep.run();

    expect(retry.enqueued).toBe(1);
    expect(deps.pipeline.jobs).toHaveLength(2);
  });

  it('does not pick up an alert before its check interval has elapsed', async () => {
    deps = inMemoryDeps(minutesAfter(T0, 4));
    deps.alerts.seed(investigating(1));

    const result = await new RevalidationSweep(deps).run();

    expect(result).toEqual({ checked: 0, enqueued: 0, exhausted: 0, waiting: 0, failed: 0 });
    expect(deps.alerts.activities).toHaveLength(0);
  });

  it('sends an alert out of revalidations to human review', async () => {
    deps.alerts.seed(investigating(3));

    const result = await new RevalidationSweep(deps).run();

    expect(result.exhausted).toBe(1);
    expect(deps.pipeline.jobs).toHaveLength(0);
    expect(deps.alerts.get('alert-seed')).toMatchObject({
      aiStatus: 'completed',
      verdict: 'needs_review',
      riskEscalation: 'warn',
      attentionState: 'needs_attention',
    });
    const [completed] = await deps.activities.listForAlert('alert-seed');
    expect(completed?.metadata).toMatchObject({ reason: 'max_revalidations', maxInvestigations: 3 });
  });

  it('keeps an alert on its last investigation until the requested window has passed', async () => {
    deps = inMemoryDeps(minutesAfter(T0, 1));
    deps.alerts.seed(
      investigating(3, {
        ai: {
          alertId: 'alert-seed',
          investigationCount: 3,
          lastInvestigationAt: T0,
          nextCheckMinutes: 15,
          investigationHistory: [],
        },
      }),
    );
    const sweep = new RevalidationSweep(deps);

    const early = await sweep.run();
    expect(early).toEqual({ checked: 0, enqueued: 0, exhausted: 0, waiting: 0, failed: 0 });
    expect(deps.alerts.get('alert-seed').aiStatus).toBe('investigating');

    deps.clock.advanceMinutes(14);
    const late = await sweep.run();
    expect(late.exhausted).toBe(1);
    expect(deps.alerts.get('alert-seed').aiStatus).toBe('completed');
  });

  it('counts a failure and keeps sweeping the rest', async () => {
    deps.alerts.seed(investigating(1));
    deps.alerts.seed(investigating(1, { id: 'alert-other', companyId: 'co-2' }));
    jest.spyOn(deps.companies, 'getConfig').mockRejectedValueOnce(new Error('settings unavailable'));
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    const result = await new RevalidationSweep(deps).run();

    expect(result).toEqual({ checked: 2, enqueued: 1, exhausted: 0, waiting: 0, failed: 1 });
    expect(deps.pipeline.jobs.map((j) => j.alertId)).toEqual(['alert-other']);
  });
});

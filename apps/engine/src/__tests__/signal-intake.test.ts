import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { ZodError } from 'zod';
import { mergeCompanyConfig } from '@fleetwatch/domain';
import { SignalIntakeService } from '../services/signal-intake.service.js';
import type { InMemoryDeps } from './in-memory.js';
import { T0, inMemoryDeps, makeAlert, makeContact } from './in-memory.js';

function crashEvent(id: string, labels: unknown[] = ['Crash']) {
  return {
    id,
    asset: { id: 'veh-01', name: 'Truck 01' },
    driver: { id: 'drv-01', name: 'Test Driver' },
    behaviorLabels: labels,
    startMs: T0.getTime(),
  };
}

describe('SignalIntakeService', () => {
  let deps: InMemoryDeps;
  let service: SignalIntakeService;

  beforeEach(() => {
    deps = inMemoryDeps();
    deps.contacts.rows.push(makeContact());
    service = new SignalIntakeService(deps);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('stores a signal that no rule matches', async () => {
    const outcome = await service.ingest('co-1', crashEvent('evt-1', ['Braking']));

    expect(outcome.kind).toBe('stored');
    expect(outcome.signal).toMatchObject({
      id: 'sig-1',
      sourceEventId: 'evt-1',
      severity: 'warning',
      primaryBehaviorLabel: 'Braking',
      occurredAt: T0,
    });
    expect(deps.alerts.rows.size).toBe(0);
    expect(deps.pipeline.jobs).toHaveLength(0);
  });

  it('raises a pending alert and queues triage for a pipeline rule', async () => {
    const outcome = await service.ingest('co-1', crashEvent('evt-2'));

    expect(outcome.kind).toBe('alerted');
    if (outcome.kind !== 'alerted') return;
    expect(outcome.rule.id).toBe('migrated-crash');
    expect(outcome.decision).toBeNull();
    expect(outcome.enqueued).toBe(true);
    expect(outcome.alert).toMatchObject({
      id: 'alert-1',
      signalId: 'sig-1',
      aiStatus: 'pending',
      severity: 'critical',
      proactiveFlag: true,
      eventDescription: 'Crash',
    });
    expect(deps.pipeline.jobs).toEqual([
      {
        kind: 'triage',
        alertId: 'alert-1',
        companyId: 'co-1',
        context: { signalId: 'sig-1', sourceEventId: 'evt-2', ruleId: 'migrated-crash', labels: ['Crash'] },
      },
    ]);
  });

  it('updates a known event without re-running rules', async () => {
    await service.ingest('co-1', crashEvent('evt-3', ['Braking']));
    const outcome = await service.ingest('co-1', crashEvent('evt-3', ['Crash']));

    expect(outcome.kind).toBe('updated');
    expect(outcome.signal.severity).toBe('critical');
    expect(deps.signals.rows.size).toBe(1);
    expect(deps.alerts.rows.size).toBe(0);
  });

  it('does not raise a second alert for the same source event', async () => {
    const existing = makeAlert({ id: 'alert-existing' });
    jest.spyOn(deps.alerts, 'findBySourceEventId').mockResolvedValue(existing);

    const outcome = await service.ingest('co-1', crashEvent('evt-4'));

    expect(outcome.kind).toBe('duplicate_alert');
    if (outcome.kind !== 'duplicate_alert') return;
    expect(outcome.alert.id).toBe('alert-existing');
    expect(deps.alerts.rows.size).toBe(0);
    expect(deps.pipeline.jobs).toHaveLength(0);
  });

  it('notifies and completes the alert for an immediate rule', async () => {
    deps.companies.configs.set(
      'co-1',
      mergeCompanyConfig({
        safetyStreamNotify: { rules: [{ id: 'crash-now', conditions: ['crash'], action: 'immediate_notify' }] },
      }),
    );

    const outcome = await service.ingest('co-1', crashEvent('evt-5'));

    expect(outcome.kind).toBe('alerted');
    if (outcome.kind !== 'alerted') return;
    const message = 'Safety alert: Crash - Vehicle: Truck 01, Driver: Test Driver. 2024-03-01 10:00 UTC';
    expect(outcome.enqueued).toBe(false);
    expect(outcome.decision).toMatchObject({
      alertId: 'alert-1',
      shouldNotify: true,
      escalationLevel: 'high',
      channelsToUse: ['whatsapp', 'sms'],
      messageText: message,
      dedupeKey: 'immediate-evt-5',
      reason: 'Immediate alert from detection rule crash-now',
      isEscalation: false,
    });
    expect(outcome.decision?.recipients).toEqual([
      { recipientType: 'monitoring_team', name: 'Monitor One', phone: '+10000000001', whatsapp: undefined, priority: 1 },
    ]);
    expect(deps.alerts.get('alert-1')).toMatchObject({ aiStatus: 'completed', aiMessage: message });
    expect(deps.alerts.actionsFor('alert-1')).toEqual(['ai_completed']);
    expect(deps.pipeline.jobs).toHaveLength(0);
  });

  it('notifies and still queues triage for a rule that does both', async () => {
    deps.companies.configs.set(
      'co-1',
      mergeCompanyConfig({
        safetyStreamNotify: {
          rules: [{ id: 'crash-both', conditions: ['Crash'], action: 'both', channels: ['call'] }],
        },
      }),
    );

    const outcome = await service.ingest('co-1', crashEvent('evt-6'));

    expect(outcome.kind).toBe('alerted');
    if (outcome.kind !== 'alerted') return;
    expect(outcome.decision?.channelsToUse).toEqual(['call']);
    expect(outcome.enqueued).toBe(true);
    expect(deps.alerts.get('alert-1').aiStatus).toBe('pending');
    expect(deps.pipeline.jobs.map((j) => j.kind)).toEqual(['triage']);
  });

  it('stores only when notifications are disabled', async () => {
    deps.companies.configs.set('co-1', mergeCompanyConfig({ safetyStreamNotify: { enabled: false } }));

    const outcome = await service.ingest('co-1', crashEvent('evt-7'));

    expect(outcome.kind).toBe('stored');
    expect(deps.alerts.rows.size).toBe(0);
  });

  it('rejects a malformed event before writing anything', async () => {
    await expect(service.ingest('co-1', { behaviorLabels: ['Crash'] })).rejects.toThrow(ZodError);
    expect(deps.signals.rows.size).toBe(0);
  });
});

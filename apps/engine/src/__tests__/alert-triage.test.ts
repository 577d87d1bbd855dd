import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { AlertTransitionError, NotFoundError, mergeCompanyConfig } from '@fleetwatch/domain';
import { AlertTriageService } from '../services/alert-triage.service.js';
import { IncidentService } from '../services/incident.service.js';
import type { InMemoryDeps } from './in-memory.js';
import { T0, inMemoryDeps, makeAlert, makeContact, makeSignal, minutesAfter } from './in-memory.js';

describe('AlertTriageService', () => {
  let deps: InMemoryDeps;
  let service: AlertTriageService;

  beforeEach(() => {
    deps = inMemoryDeps();
    deps.signals.seed(makeSignal());
    deps.contacts.rows.push(makeContact());
    service = new AlertTriageService(deps, new IncidentService(deps));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('startProcessing()', () => {
    it('moves a pending alert to processing', async () => {
      deps.alerts.seed(makeAlert());

      const alert = await service.startProcessing('alert-seed');

      expect(alert.aiStatus).toBe('processing');
      expect(deps.alerts.actionsFor('alert-seed')).toEqual(['ai_processing_started']);
    });

    it('fails for an unknown alert', async () => {
      await expect(service.startProcessing('missing')).rejects.toThrow(NotFoundError);
    });
  });

  describe('complete()', () => {
    it('completes, starts attention, records the decision and opens an incident', async () => {
      deps.alerts.seed(makeAlert({ aiStatus: 'processing' }));
      deps.signals.seed(makeSignal({ id: 'sig-near', sourceEventId: 'evt-near', occurredAt: minutesAfter(T0, 3) }));

      const outcome = await service.complete('alert-seed', {
        assessment: { verdict: 'confirmed_violation', likelihood: 'high', confidence: 0.9, riskEscalation: 'warn' },
        humanMessage: 'Driver braked hard',
        notificationDecision: {
          shouldNotify: true,
          escalationLevel: ' HIGH ',
          channelsToUse: ['whatsapp'],
          messageText: 'Check on the driver',
          recipients: [
            { recipientType: 'supervisor', name: 'Sup One', phone: '+10000000002', priority: 2 },
            { recipientType: 'monitoring_team', name: 'Monitor One', phone: '+10000000001', priority: 1 },
          ],
        },
      });

      expect(outcome.alert).toMatchObject({
        aiStatus: 'completed',
        verdict: 'confirmed_violation',
        confidence: 0.9,
        aiMessage: 'Driver braked hard',
        attentionState: 'needs_attention',
        ackStatus: 'pending',
        ackDueAt: minutesAfter(T0, 15),
        resolveDueAt: minutesAfter(T0, 240),
        nextEscalationAt: minutesAfter(T0, 10),
      });
      expect(deps.alerts.actionsFor('alert-seed')).toEqual(['ai_completed', 'attention_initialized']);

      expect(outcome.decision?.escalationLevel).toBe('high');
      expect(outcome.decision?.recipients.map((r) => r.recipientType)).toEqual(['monitoring_team', 'supervisor']);

      expect(outcome.incident).toMatchObject({
        id: 'inc-1',
        incidentType: 'safety_violation',
        priority: 'P2',
        subjectType: 'driver',
        subjectId: 'drv-01',
        sourceEventId: 'evt-seed',
        dedupeKey: 'safety_violation:driver:drv-01:2024-03-01-10-00',
      });
      expect(deps.incidents.links).toEqual([
        { incidentId: 'inc-1', targetType: 'alert', targetId: 'alert-seed', role: 'primary', relevanceScore: 1 },
        { incidentId: 'inc-1', targetType: 'signal', targetId: 'sig-seed', role: 'primary', relevanceScore: 1 },
        { incidentId: 'inc-1', targetType: 'signal', targetId: 'sig-near', role: 'supporting', relevanceScore: 0.5 },
      ]);
    });

    it('turns a no-notify verdict into a monitor-level decision when the matrix asks for one', async () => {
      deps.companies.configs.set(
        'co-1',
        mergeCompanyConfig({ escalationMatrix: { monitor: { channels: ['whatsapp'], recipients: ['monitoring'] } } }),
      );
      deps.alerts.seed(makeAlert({ aiStatus: 'processing', severity: 'info' }));

      const outcome = await service.complete('alert-seed', {
        assessment: { verdict: 'no_action_needed', likelihood: 'low', riskEscalation: 'monitor' },
        humanMessage: 'Nothing to do',
        notificationDecision: { shouldNotify: false, escalationLevel: 'none' },
      });

      expect(outcome.decision).toMatchObject({
        shouldNotify: true,
        escalationLevel: 'low',
        channelsToUse: ['whatsapp'],
        messageText: 'Nothing to do',
        dedupeKey: 'monitor-alert-seed',
        reason: 'Monitor-level notification per escalation matrix',
      });
      expect(outcome.alert.attentionState).toBeUndefined();
      expect(outcome.incident).toBeNull();
    });

    it('keeps the completion when incident correlation fails', async () => {
      deps.alerts.seed(makeAlert({ aiStatus: 'processing', severity: 'critical' }));
      jest.spyOn(deps.incidents, 'createOrFind').mockRejectedValue(new Error('connection reset'));
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

      const outcome = await service.complete('alert-seed', {
        assessment: { verdict: 'real_panic' },
        humanMessage: 'Crash confirmed',
      });

      expect(outcome.incident).toBeNull();
      expect(outcome.decision).toBeNull();
      expect(deps.alerts.get('alert-seed').aiStatus).toBe('completed');
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('rejects completing an alert twice and writes nothing', async () => {
      deps.alerts.seed(makeAlert({ aiStatus: 'completed' }));

      await expect(
        service.complete('alert-seed', { assessment: {}, humanMessage: 'again' }),
      ).rejects.toThrow(AlertTransitionError);
      expect(deps.alerts.activities).toHaveLength(0);
    });
  });

  describe('investigate()', () => {
    it('keeps the alert under investigation with the first check interval', async () => {
      deps.alerts.seed(makeAlert({ aiStatus: 'processing' }));

      const outcome = await service.investigate('alert-seed', {
        assessment: { verdict: 'uncertain', monitoringReason: 'Waiting for more footage' },
        humanMessage: 'Still looking',
      });

      expect(outcome.incident).toBeNull();
      expect(outcome.alert.aiStatus).toBe('investigating');
      expect(outcome.alert.ai).toMatchObject({
        investigationCount: 1,
        lastInvestigationAt: T0,
        nextCheckMinutes: 5,
        investigationHistory: [
          { investigationNumber: 1, timestamp: '2024-03-01T10:00:00.000Z', reason: 'Waiting for more footage' },
        ],
      });
      const [activity] = await deps.activities.listForAlert('alert-seed');
      expect(activity?.metadata).toEqual({ investigationCount: 1, nextCheckMinutes: 5, reason: 'Waiting for more footage' });
    });

    it('honors an explicit next check', async () => {
      deps.alerts.seed(makeAlert({ aiStatus: 'processing' }));

      const outcome = await service.investigate('alert-seed', {
        assessment: {},
        humanMessage: 'Check again soon',
        nextCheckMinutes: 2,
        reason: 'Vehicle still moving',
      });

      expect(outcome.alert.ai?.nextCheckMinutes).toBe(2);
      expect(outcome.alert.ai?.investigationHistory[0]?.reason).toBe('Vehicle still moving');
    });

    it('completes for human review once the limit is reached', async () => {
      deps.alerts.seed(
        makeAlert({
          aiStatus: 'investigating',
          ai: { alertId: 'alert-seed', investigationCount: 3, investigationHistory: [] },
        }),
      );

      const outcome = await service.investigate('alert-seed', {
        assessment: { verdict: 'uncertain' },
        humanMessage: 'Still unsure',
      });

      expect(outcome.alert).toMatchObject({
        aiStatus: 'completed',
        verdict: 'needs_review',
        likelihood: 'medium',
        confidence: 0.5,
        riskEscalation: 'warn',
        aiMessage: 'This event requires manual review after 3 automatic analyses.',
        attentionState: 'needs_attention',
      });
      expect(outcome.incident?.priority).toBe('P3');
      const [completed] = await deps.activities.listForAlert('alert-seed');
      expect(completed?.metadata).toMatchObject({ reason: 'max_investigations', maxInvestigations: 3 });
    });
  });

  describe('fail()', () => {
    it('marks the alert failed and keeps the error', async () => {
      deps.alerts.seed(makeAlert({ aiStatus: 'processing' }));

      const alert = await service.fail('alert-seed', 'pipeline timeout');

      expect(alert.aiStatus).toBe('failed');
      expect(alert.ai?.aiError).toBe('pipeline timeout');
      expect(deps.alerts.actionsFor('alert-seed')).toEqual(['ai_failed']);
    });
  });

  describe('recordRevalidationWindow()', () => {
    it('numbers the entry for the upcoming investigation', async () => {
      deps.alerts.seed(
        makeAlert({
          aiStatus: 'investigating',
          ai: { alertId: 'alert-seed', investigationCount: 1, investigationHistory: [] },
        }),
      );

      const alert = await service.recordRevalidationWindow(
        'alert-seed',
        { start: '2024-03-01T09:50:00.000Z', end: '2024-03-01T10:00:00.000Z', minutesCovered: 10 },
        { newSignals: 2 },
      );

      expect(alert.ai?.investigationHistory).toEqual([
        {
          investigationNumber: 2,
          timestamp: '2024-03-01T10:00:00.000Z',
          reason: 'Revalidation #2: 10 min of new data',
          timeWindow: { start: '2024-03-01T09:50:00.000Z', end: '2024-03-01T10:00:00.000Z', minutesCovered: 10 },
          findings: { newSignals: 2 },
        },
      ]);
    });
  });
});

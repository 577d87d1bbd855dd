/**
 * Decision normalization, recipient resolution and the three decision
 * sources: automatic escalation, immediate rules and the triage pipeline.
 */

import { describe, it, expect } from '@jest/globals';

import type { DetectionRule } from '../entities/company-config.js';
import {
  applyMonitorMatrixOverride,
  buildEscalationDecision,
  buildImmediateDecision,
  callScriptFor,
  decisionFromAiPayload,
  decisionLevelForMatrixKey,
  normalizeEscalationLevel,
  prepareDecision,
  resolveRecipients,
  sortRecipientsByPriority,
} from '../notifications/notification-decision-builder.js';
import { makeAlert, makeConfig, makeContact, makeSignal } from './fixtures.js';

const monitor = makeContact({ id: 'c-mon', name: 'Monitor', role: 'monitoring_team', priority: 2 });
const monitorBackup = makeContact({ id: 'c-mon2', name: 'Monitor Backup', role: 'monitoring_team', priority: 5 });
const supervisor = makeContact({ id: 'c-sup', name: 'Supervisor', role: 'supervisor', phone: undefined, whatsapp: '+10000000002', priority: 1 });
const unreachable = makeContact({ id: 'c-op', name: 'Operator', role: 'operator', phone: undefined, priority: 1 });
const inactive = makeContact({ id: 'c-em', name: 'Emergency', role: 'emergency', isActive: false });
const contacts = [monitorBackup, monitor, supervisor, unreachable, inactive];

// ─── Normalization ────────────────────────────────────────────────────────────

describe('normalizeEscalationLevel', () => {
  it('keeps the five canonical levels regardless of case and whitespace', () => {
    expect(['emergency', ' CRITICAL ', 'High', 'low\n', 'NONE'].map(normalizeEscalationLevel)).toEqual([
      'emergency',
      'critical',
      'high',
      'low',
      'none',
    ]);
  });

  it('maps blank to none and anything else to critical', () => {
    expect(normalizeEscalationLevel(null)).toBe('none');
    expect(normalizeEscalationLevel(undefined)).toBe('none');
    expect(normalizeEscalationLevel('   ')).toBe('none');
    expect(normalizeEscalationLevel('medium')).toBe('critical');
    expect(normalizeEscalationLevel('urgent!')).toBe('critical');
  });
});

describe('sortRecipientsByPriority', () => {
  it('sorts ascending and keeps insertion order for ties', () => {
    const list = [
      { name: 'c', priority: 2 },
      { name: 'a', priority: 1 },
      { name: 'd', priority: 2 },
      { name: 'b', priority: 1 },
    ];
    expect(sortRecipientsByPriority(list).map((r) => r.name)).toEqual(['a', 'b', 'c', 'd']);
  });
});

describe('prepareDecision', () => {
  it('normalizes the level and fills defaults', () => {
    expect(
      prepareDecision({ alertId: 'alert-001', companyId: 'co-1', shouldNotify: true, escalationLevel: 'HIGH' }),
    ).toEqual({
      alertId: 'alert-001',
      companyId: 'co-1',
      shouldNotify: true,
      escalationLevel: 'high',
      messageText: undefined,
      callScript: undefined,
      reason: undefined,
      channelsToUse: [],
      dedupeKey: undefined,
      isEscalation: false,
    });
  });
});

describe('helpers', () => {
  it('maps matrix keys to decision levels', () => {
    expect(decisionLevelForMatrixKey('emergency')).toBe('critical');
    expect(decisionLevelForMatrixKey('call')).toBe('high');
    expect(decisionLevelForMatrixKey('warn')).toBe('low');
    expect(decisionLevelForMatrixKey('monitor')).toBe('none');
  });

  it('cuts call scripts at 200 characters', () => {
    expect(callScriptFor('x'.repeat(250))).toHaveLength(200);
    expect(callScriptFor('short')).toBe('short');
  });
});

// ─── Recipients ───────────────────────────────────────────────────────────────

describe('resolveRecipients', () => {
  it('picks the highest-priority reachable contact per role', () => {
    expect(resolveRecipients(['monitoring', 'supervisor'], contacts)).toEqual([
      { recipientType: 'monitoring_team', name: 'Monitor', phone: '+10000000001', whatsapp: undefined, priority: 2 },
      { recipientType: 'supervisor', name: 'Supervisor', phone: undefined, whatsapp: '+10000000002', priority: 1 },
    ]);
  });

  it('ignores unreachable and inactive contacts', () => {
    expect(resolveRecipients(['operator', 'emergency'], contacts)).toEqual([]);
  });

  it('falls back to every reachable role when asked', () => {
    const names = resolveRecipients(['operator'], contacts, { fallbackToAll: true }).map((r) => r.name);
    expect(names).toEqual(['Supervisor', 'Monitor']);
  });
});

// ─── Escalation decisions ─────────────────────────────────────────────────────

describe('buildEscalationDecision', () => {
  const config = makeConfig();

  it('uses the matrix entry for the step', () => {
    const proposal = buildEscalationDecision(
      makeAlert({ aiMessage: 'Harsh braking repeated' }),
      { matrixKey: 'call', newCount: 1, maxEscalations: 3 },
      config,
      contacts,
    );
    expect(proposal?.draft).toEqual({
      alertId: 'alert-001',
      companyId: 'co-1',
      shouldNotify: true,
      escalationLevel: 'high',
      channelsToUse: ['call', 'whatsapp'],
      messageText: 'Harsh braking repeated',
      callScript: 'Harsh braking repeated',
      dedupeKey: 'escalation-alert-001-1',
      reason: 'Automatic escalation (level 1/3): no ACK within SLA',
      isEscalation: true,
    });
    expect(proposal?.recipients.map((r) => r.recipientType)).toEqual(['monitoring_team', 'supervisor']);
  });

  it('returns null when nobody is reachable', () => {
    expect(
      buildEscalationDecision(makeAlert(), { matrixKey: 'emergency', newCount: 2, maxEscalations: 3 }, config, [unreachable]),
    ).toBeNull();
  });

  it('uses a generic message without an AI message', () => {
    const proposal = buildEscalationDecision(makeAlert(), { matrixKey: 'emergency', newCount: 2, maxEscalations: 3 }, config, contacts);
    expect(proposal?.draft.messageText).toBe('Alert requires attention: automatic escalation');
    expect(proposal?.draft.escalationLevel).toBe('critical');
  });
});

// ─── Immediate decisions ──────────────────────────────────────────────────────

describe('buildImmediateDecision', () => {
  const config = makeConfig();
  const signal = makeSignal();
  const alert = makeAlert({ id: 'alert-009', severity: 'critical', eventDescription: 'Crash' });

  it('falls back to the warn matrix entry', () => {
    const rule: DetectionRule = { id: 'crash-rule', conditions: ['Crash'], action: 'immediate_notify' };
    const { draft, recipients } = buildImmediateDecision(alert, signal, rule, config, contacts);
    expect(draft.escalationLevel).toBe('high');
    expect(draft.channelsToUse).toEqual(['whatsapp', 'sms']);
    expect(draft.dedupeKey).toBe('immediate-evt-001');
    expect(draft.reason).toBe('Immediate alert from detection rule crash-rule');
    expect(draft.messageText).toBe(
      'Safety alert: Crash - Vehicle: Truck 01, Driver: Test Driver. 2024-03-01 10:00 UTC',
    );
    expect(recipients.map((r) => r.name)).toEqual(['Monitor']);
  });

  it('prefers the rule overrides', () => {
    const rule: DetectionRule = {
      id: 'crash-call',
      conditions: ['Crash'],
      action: 'both',
      channels: ['call'],
      recipients: ['supervisor'],
    };
    const { draft, recipients } = buildImmediateDecision(alert, signal, rule, config, contacts);
    expect(draft.channelsToUse).toEqual(['call']);
    expect(recipients.map((r) => r.name)).toEqual(['Supervisor']);
  });
});

// ─── Pipeline decisions ───────────────────────────────────────────────────────

describe('decisionFromAiPayload', () => {
  it('passes the payload through with its recipients', () => {
    const { draft, recipients } = decisionFromAiPayload(makeAlert(), {
      shouldNotify: true,
      escalationLevel: 'Emergency',
      channelsToUse: ['call'],
      recipients: [{ recipientType: 'operator', priority: 1 }],
      messageText: 'Crash confirmed',
    });
    expect(draft.escalationLevel).toBe('Emergency');
    expect(prepareDecision(draft).escalationLevel).toBe('emergency');
    expect(recipients).toEqual([{ recipientType: 'operator', priority: 1 }]);
  });
});

describe('applyMonitorMatrixOverride', () => {
  const monitorConfig = makeConfig({
    escalationMatrix: { monitor: { channels: ['whatsapp'], recipients: ['monitoring'] } },
  });

  it('notifies per the monitor entry when the pipeline stayed silent', () => {
    const proposal = applyMonitorMatrixOverride(
      { shouldNotify: false, escalationLevel: 'none' },
      makeAlert(),
      monitorConfig,
      contacts,
      'Low risk, keep watching',
    );
    expect(proposal?.draft).toEqual({
      alertId: 'alert-001',
      companyId: 'co-1',
      shouldNotify: true,
      escalationLevel: 'low',
      channelsToUse: ['whatsapp'],
      messageText: 'Low risk, keep watching',
      callScript: 'Low risk, keep watching',
      dedupeKey: 'monitor-alert-001',
      reason: 'Monitor-level notification per escalation matrix',
    });
    expect(proposal?.recipients.map((r) => r.name)).toEqual(['Monitor']);
  });

  it('does nothing with the default empty monitor entry', () => {
    expect(
      applyMonitorMatrixOverride({ shouldNotify: false, escalationLevel: 'none' }, makeAlert(), makeConfig(), contacts, 'm'),
    ).toBeNull();
  });

  it('does nothing when the pipeline already notifies or chose another level', () => {
    expect(applyMonitorMatrixOverride({ shouldNotify: true, escalationLevel: 'none' }, makeAlert(), monitorConfig, contacts, 'm')).toBeNull();
    expect(applyMonitorMatrixOverride({ shouldNotify: false, escalationLevel: 'low' }, makeAlert(), monitorConfig, contacts, 'm')).toBeNull();
  });
});

import { describe, it, expect } from '@jest/globals';

import {
  determineSeverity,
  extractPrimaryLabel,
  labelValue,
  normalizeBehaviorLabel,
} from '../signals/behavior-labels.js';
import { applyStreamEventUpdate, buildSignalFromStreamEvent, formatAddress } from '../signals/stream-event.js';
import type { StreamEvent } from '../signals/stream-event.js';
import { T0, makeSignal, minutesAfter } from './fixtures.js';

describe('behavior labels', () => {
  it('normalizes case-insensitively against the canonical list', () => {
    expect(normalizeBehaviorLabel('noSeatbelt')).toBe('NoSeatbelt');
    expect(normalizeBehaviorLabel('SomethingNew')).toBe('SomethingNew');
    expect(normalizeBehaviorLabel('')).toBeNull();
    expect(normalizeBehaviorLabel(null)).toBeNull();
  });

  it('reads label then name from object entries', () => {
    expect(labelValue({ label: 'Crash', name: 'ignored' })).toBe('Crash');
    expect(labelValue({ name: 'Braking' })).toBe('Braking');
    expect(labelValue({})).toBeNull();
  });

  it('derives severity with critical winning over warning', () => {
    expect(determineSeverity(['Braking', { label: 'Crash' }])).toBe('critical');
    expect(determineSeverity(['Braking'])).toBe('warning');
    expect(determineSeverity(['Passenger'])).toBe('info');
    expect(determineSeverity([])).toBe('info');
  });

  it('takes the first label as primary', () => {
    expect(extractPrimaryLabel([{ name: 'Drowsy' }, 'Crash'])).toBe('Drowsy');
    expect(extractPrimaryLabel([])).toBeNull();
  });
});

describe('buildSignalFromStreamEvent', () => {
  const event: StreamEvent = {
    id: 'evt-100',
    asset: { id: 'veh-07', name: 'Van 07' },
    driver: { id: 'drv-03', name: 'Placeholder Driver' },
    location: { latitude: 10.5, longitude: -66.9, address: { street: '1 Main St', city: 'Springfield' } },
    behaviorLabels: [{ label: 'Braking', source: 'automated' }],
    eventState: 'needsReview',
    startMs: 1709287200000,
    updatedAtTime: '2024-03-01T10:05:00Z',
  };

  it('maps the event onto a signal draft', () => {
    const draft = buildSignalFromStreamEvent('co-1', event, T0);
    expect(draft.sourceEventId).toBe('evt-100');
    expect(draft.vehicleName).toBe('Van 07');
    expect(draft.address).toBe('1 Main St, Springfield');
    expect(draft.primaryBehaviorLabel).toBe('Braking');
    expect(draft.severity).toBe('warning');
    expect(draft.occurredAt).toEqual(new Date(1709287200000));
    expect(draft.sourceUpdatedAt).toEqual(new Date('2024-03-01T10:05:00Z'));
    expect(draft.contextLabels).toEqual([]);
  });

  it('accepts numeric strings and ISO dates for the start time', () => {
    expect(buildSignalFromStreamEvent('co-1', { id: 'e', startMs: '1709287200000' }, T0).occurredAt).toEqual(
      new Date(1709287200000),
    );
    expect(buildSignalFromStreamEvent('co-1', { id: 'e', startMs: '2024-03-01T09:00:00Z' }, T0).occurredAt).toEqual(
      new Date('2024-03-01T09:00:00Z'),
    );
    expect(buildSignalFromStreamEvent('co-1', { id: 'e', startMs: 'not a date' }, T0).occurredAt).toEqual(T0);
  });

  it('formats partial addresses', () => {
    expect(formatAddress({ city: 'Springfield', postalCode: '12345' })).toBe('Springfield, 12345');
    expect(formatAddress({})).toBeUndefined();
  });
});

describe('applyStreamEventUpdate', () => {
  it('keeps previous values for absent fields and re-derives severity', () => {
    const signal = makeSignal({ behaviorLabels: ['Braking'], primaryBehaviorLabel: 'Braking', severity: 'warning' });
    const now = minutesAfter(T0, 10);

    const escalated = applyStreamEventUpdate(signal, { id: 'evt-001', behaviorLabels: ['Crash'] }, now);
    expect(escalated.severity).toBe('critical');
    expect(escalated.primaryBehaviorLabel).toBe('Crash');
    expect(escalated.vehicleName).toBe('Truck 01');
    expect(escalated.sourceUpdatedAt).toEqual(now);

    const unchanged = applyStreamEventUpdate(signal, { id: 'evt-001', eventState: 'coached' }, now);
    expect(unchanged.behaviorLabels).toEqual(['Braking']);
    expect(unchanged.severity).toBe('warning');
    expect(unchanged.eventState).toBe('coached');
  });
});

import type { Alert } from '../entities/alert.js';
import type { CompanyConfig, CompanyConfigOverride } from '../entities/company-config.js';
import { mergeCompanyConfig } from '../entities/company-config.js';
import type { Contact } from '../entities/contact.js';
import type { Incident } from '../entities/incident.js';
import type { Signal } from '../entities/signal.js';

// ─── Shared factories ─────────────────────────────────────────────────────────

export const T0 = new Date('2024-03-01T10:00:00.000Z');

export function minutesAfter(base: Date, minutes: number): Date {
  return new Date(base.getTime() + minutes * 60_000);
}

export function makeSignal(overrides: Partial<Signal> = {}): Signal {
  return {
    id: 'sig-001',
    companyId: 'co-1',
    sourceEventId: 'evt-001',
    vehicleId: 'veh-01',
    vehicleName: 'Truck 01',
    driverId: 'drv-01',
    driverName: 'Test Driver',
    primaryBehaviorLabel: 'Crash',
    behaviorLabels: ['Crash'],
    contextLabels: [],
    severity: 'critical',
    occurredAt: T0,
    rawPayload: {},
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function makeAlert(overrides: Partial<Alert> = {}): Alert {
  return {
    id: 'alert-001',
    companyId: 'co-1',
    signalId: 'sig-001',
    aiStatus: 'pending',
    severity: 'warning',
    alertKind: 'safety',
    proactiveFlag: true,
    humanStatus: 'pending',
    escalationLevel: 0,
    escalationCount: 0,
    occurredAt: T0,
    eventDescription: 'Braking',
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function makeContact(overrides: Partial<Contact> = {}): Contact {
  return {
    id: 'contact-001',
    companyId: 'co-1',
    name: 'Monitor One',
    role: 'monitoring_team',
    phone: '+10000000001',
    priority: 1,
    isActive: true,
    ...overrides,
  };
}

export function makeIncident(overrides: Partial<Incident> = {}): Incident {
  return {
    id: 'inc-001',
    companyId: 'co-1',
    incidentType: 'collision',
    priority: 'P1',
    severity: 'critical',
    status: 'open',
    source: 'webhook',
    metadata: {},
    detectedAt: T0,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function makeConfig(override: CompanyConfigOverride = {}): CompanyConfig {
  return mergeCompanyConfig(override);
}

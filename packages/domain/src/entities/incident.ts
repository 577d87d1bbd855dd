import type { SignalSeverity } from './signal.js';

export type IncidentType =
  | 'collision'
  | 'emergency'
  | 'pattern'
  | 'safety_violation'
  | 'tampering'
  | 'unknown';

export type IncidentStatus =
  | 'open'
  | 'investigating'
  | 'pending_action'
  | 'resolved'
  | 'false_positive';

export type IncidentPriority = 'P1' | 'P2' | 'P3' | 'P4';

export type IncidentSubjectType = 'driver' | 'vehicle';

export type IncidentSource = 'webhook' | 'auto_pattern' | 'auto_aggregator' | 'manual';

export type IncidentLinkRole = 'primary' | 'supporting' | 'contradicting' | 'context';

export const INCIDENT_PRIORITY_LABELS: Readonly<Record<IncidentPriority, string>> = {
  P1: 'Critical',
  P2: 'High',
  P3: 'Medium',
  P4: 'Low',
};

export interface Incident {
  readonly id: string;
  readonly companyId: string;
  readonly incidentType: IncidentType;
  readonly priority: IncidentPriority;
  readonly severity: SignalSeverity;
  readonly status: IncidentStatus;
  readonly subjectType?: IncidentSubjectType;
  readonly subjectId?: string;
  readonly subjectName?: string;
  readonly source: IncidentSource;
  readonly sourceEventId?: string;
  readonly dedupeKey?: string;
  readonly aiSummary?: string;
  readonly aiAssessment?: Record<string, unknown>;
  readonly metadata: Record<string, unknown>;
  readonly detectedAt: Date;
  readonly resolvedAt?: Date;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface IncidentLink {
  readonly incidentId: string;
  readonly targetType: 'signal' | 'alert';
  readonly targetId: string;
  readonly role: IncidentLinkRole;
  /** 0.0 – 1.0 */
  readonly relevanceScore: number;
}

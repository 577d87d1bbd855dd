import type { Alert } from '../../entities/alert.js';
import type { Incident, IncidentPriority, IncidentStatus, IncidentType } from '../../entities/incident.js';
import type { SignalSeverity } from '../../entities/signal.js';
import type { IncidentSubject } from '../../incidents/incident-correlation.js';

export interface PatternIncidentCommand extends IncidentSubject {
  companyId: string;
  incidentType: IncidentType;
  priority: IncidentPriority;
  severity: SignalSeverity;
  summary?: string;
  signalIds: string[];
  detectedAt: Date;
  metadata?: Record<string, unknown>;
}

export interface IncidentCommandPort {
  /** Null when the alert does not warrant an incident. */
  createFromAlert(alert: Alert): Promise<Incident | null>;
  createFromPattern(command: PatternIncidentCommand): Promise<Incident>;
  transition(incidentId: string, to: IncidentStatus, summary?: string): Promise<Incident>;
  resolve(incidentId: string, summary?: string): Promise<Incident>;
  markAsFalsePositive(incidentId: string, reason?: string): Promise<Incident>;
  linkSignal(incidentId: string, signalId: string, role?: 'supporting' | 'contradicting' | 'context'): Promise<void>;
}

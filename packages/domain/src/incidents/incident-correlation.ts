import type { AiAssessment, Alert, AlertKind, Likelihood, RiskEscalation, Verdict } from '../entities/alert.js';
import type {
  Incident,
  IncidentPriority,
  IncidentSubjectType,
  IncidentType,
} from '../entities/incident.js';
import type { Signal, SignalSeverity } from '../entities/signal.js';
import { hasHighRiskVerdict } from '../alerts/alert-attention.js';

export const DEFAULT_DEDUPE_BUCKET_MINUTES = 30;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * `type:subjectType:subjectId:YYYY-MM-DD-HH-mm`, the timestamp floored (UTC) to
 * the bucket. Missing subject parts are left out, so subject-less incidents of
 * one type still collide within a bucket.
 */
export function generateDedupeKey(
  type: string,
  subjectType: string | null | undefined,
  subjectId: string | null | undefined,
  detectedAt: Date,
  bucketMinutes: number = DEFAULT_DEDUPE_BUCKET_MINUTES,
): string {
  const bucketMs = Math.max(1, Math.floor(bucketMinutes)) * 60_000;
  const floored = new Date(Math.floor(detectedAt.getTime() / bucketMs) * bucketMs);
  const windowStart = [
    floored.getUTCFullYear(),
    pad(floored.getUTCMonth() + 1),
    pad(floored.getUTCDate()),
    pad(floored.getUTCHours()),
    pad(floored.getUTCMinutes()),
  ].join('-');
  return [type, subjectType, subjectId, windowStart]
    .filter((part): part is string => typeof part === 'string' && part !== '')
    .join(':');
}

/** Triage fields an incident decision looks at; the alert fills in what the assessment lacks. */
export interface IncidentAssessment {
  verdict?: Verdict;
  likelihood?: Likelihood;
  riskEscalation?: RiskEscalation;
  alertKind?: AlertKind;
  summary?: string;
}

export function incidentAssessmentFrom(
  assessment: AiAssessment | undefined,
  alert: Alert,
): IncidentAssessment {
  return {
    verdict: assessment?.verdict ?? alert.verdict,
    likelihood: assessment?.likelihood ?? alert.likelihood,
    riskEscalation: assessment?.riskEscalation ?? alert.riskEscalation,
    alertKind: alert.alertKind,
    summary: assessment?.summary,
  };
}

export function determineIncidentPriority(
  severity: SignalSeverity,
  assessment: IncidentAssessment,
): IncidentPriority {
  if (severity === 'critical' || assessment.riskEscalation === 'emergency') return 'P1';
  if (assessment.riskEscalation === 'call' || assessment.likelihood === 'high') return 'P2';
  if (severity === 'warning' || assessment.riskEscalation === 'warn') return 'P3';
  return 'P4';
}

/** Keyword match over the event type and description, then the alert kind. */
export function determineIncidentType(
  eventType: string | undefined,
  description: string | undefined,
  alertKind: AlertKind | undefined,
): IncidentType {
  const type = (eventType ?? '').toLowerCase();
  const text = (description ?? '').toLowerCase();

  if (type.includes('collision') || text.includes('collision') || text.includes('crash')) {
    return 'collision';
  }
  if (text.includes('panic') || text.includes('emergency') || alertKind === 'panic') {
    return 'emergency';
  }
  if (text.includes('obstruction') || text.includes('tampering') || alertKind === 'tampering') {
    return 'tampering';
  }
  if (alertKind === 'safety' || text.includes('speeding') || text.includes('seatbelt')) {
    return 'safety_violation';
  }
  return 'unknown';
}

/**
 * Critical alerts, high-risk verdicts and call/emergency escalations always
 * open an incident; warnings need at least medium likelihood.
 */
export function shouldCreateIncident(alert: Alert, assessment: IncidentAssessment): boolean {
  if (alert.severity === 'critical') return true;
  if (hasHighRiskVerdict({ verdict: assessment.verdict })) return true;
  if (assessment.riskEscalation === 'call' || assessment.riskEscalation === 'emergency') return true;
  if (assessment.verdict === 'likely_false_positive') return false;
  if (alert.severity === 'info') return false;
  return assessment.likelihood === 'high' || assessment.likelihood === 'medium';
}

export function isHighPriority(incident: Pick<Incident, 'priority'>): boolean {
  return incident.priority === 'P1' || incident.priority === 'P2';
}

const PRIORITY_ORDER: Record<IncidentPriority, number> = { P1: 1, P2: 2, P3: 3, P4: 4 };

/** P1 first. */
export function compareIncidentPriority(a: Pick<Incident, 'priority'>, b: Pick<Incident, 'priority'>): number {
  return PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority];
}

export interface IncidentSubject {
  subjectType?: IncidentSubjectType;
  subjectId?: string;
  subjectName?: string;
}

/** Driver when known, otherwise the vehicle. */
export function incidentSubjectFor(signal: Signal | null | undefined): IncidentSubject {
  if (!signal) return {};
  if (signal.driverId) {
    return { subjectType: 'driver', subjectId: signal.driverId, subjectName: signal.driverName ?? signal.vehicleName };
  }
  if (signal.vehicleId) {
    return { subjectType: 'vehicle', subjectId: signal.vehicleId, subjectName: signal.vehicleName };
  }
  return {};
}

export type IncidentDraft = Omit<Incident, 'id' | 'createdAt' | 'updatedAt'>;

/** Open incident for a triaged alert and the signal that raised it. */
export function buildIncidentFromAlert(
  alert: Alert,
  signal: Signal | null,
  assessment: IncidentAssessment,
  now: Date,
  bucketMinutes: number = DEFAULT_DEDUPE_BUCKET_MINUTES,
): IncidentDraft {
  const incidentType = determineIncidentType(
    undefined,
    alert.eventDescription ?? signal?.primaryBehaviorLabel,
    assessment.alertKind,
  );
  const subject = incidentSubjectFor(signal);
  const detectedAt = alert.occurredAt ?? signal?.occurredAt ?? now;
  return {
    companyId: alert.companyId,
    incidentType,
    priority: determineIncidentPriority(alert.severity, assessment),
    severity: alert.severity,
    status: 'open',
    ...subject,
    source: 'webhook',
    sourceEventId: signal?.sourceEventId,
    dedupeKey: generateDedupeKey(incidentType, subject.subjectType, subject.subjectId, detectedAt, bucketMinutes),
    aiSummary: assessment.summary ?? alert.aiMessage,
    aiAssessment: { ...assessment },
    metadata: { alertId: alert.id, eventDescription: alert.eventDescription },
    detectedAt,
  };
}

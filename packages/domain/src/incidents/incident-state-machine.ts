import type { Incident, IncidentStatus } from '../entities/incident.js';
import { IncidentTransitionError, assertNever } from '../errors.js';

const LEGAL_TRANSITIONS: Readonly<Record<IncidentStatus, readonly IncidentStatus[]>> = {
  open: ['investigating', 'pending_action', 'resolved', 'false_positive'],
  investigating: ['pending_action', 'resolved', 'false_positive'],
  pending_action: ['investigating', 'resolved', 'false_positive'],
  resolved: [],
  false_positive: [],
};

export function canTransitionIncident(from: IncidentStatus, to: IncidentStatus): boolean {
  return LEGAL_TRANSITIONS[from].includes(to);
}

export function isResolved(incident: Pick<Incident, 'status'>): boolean {
  return incident.status === 'resolved' || incident.status === 'false_positive';
}

/** Moves to a non-terminal status. Use the dedicated helpers for terminal ones. */
export function transitionIncident(
  incident: Incident,
  to: Exclude<IncidentStatus, 'resolved' | 'false_positive'>,
  now: Date,
): Incident {
  if (!canTransitionIncident(incident.status, to)) {
    throw new IncidentTransitionError(incident.id, incident.status, to);
  }
  return { ...incident, status: to, updatedAt: now };
}

function close(
  incident: Incident,
  to: 'resolved' | 'false_positive',
  summary: string | null | undefined,
  now: Date,
): Incident {
  if (!canTransitionIncident(incident.status, to)) {
    throw new IncidentTransitionError(incident.id, incident.status, to);
  }
  return {
    ...incident,
    status: to,
    resolvedAt: now,
    aiSummary: summary ?? incident.aiSummary,
    updatedAt: now,
  };
}

/** A missing summary leaves the existing one in place. */
export function markAsResolved(
  incident: Incident,
  summary: string | null | undefined,
  now: Date,
): Incident {
  return close(incident, 'resolved', summary, now);
}

export function markAsFalsePositive(
  incident: Incident,
  reason: string | null | undefined,
  now: Date,
): Incident {
  return close(incident, 'false_positive', reason, now);
}

/** Dispatches to the matching helper for any target status. */
export function applyIncidentStatus(
  incident: Incident,
  to: IncidentStatus,
  summary: string | null | undefined,
  now: Date,
): Incident {
  switch (to) {
    case 'resolved':
      return markAsResolved(incident, summary, now);
    case 'false_positive':
      return markAsFalsePositive(incident, summary, now);
    case 'open':
      throw new IncidentTransitionError(incident.id, incident.status, to);
    case 'investigating':
    case 'pending_action':
      return transitionIncident(incident, to, now);
    default:
      return assertNever(to);
  }
}

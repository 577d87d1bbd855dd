import type { AiAssessment, Alert, AlertContext, RevalidationWindow } from '../../entities/alert.js';
import type { Incident } from '../../entities/incident.js';
import type { NotificationDecision } from '../../entities/notification-decision.js';
import type { AiNotificationDecision } from '../../notifications/notification-decision-builder.js';

// ---------------------------------------------------------------------------
// Results reported back by the triage pipeline
// ---------------------------------------------------------------------------

export interface TriageResult {
  assessment: AiAssessment;
  humanMessage: string;
  alertContext?: AlertContext;
  execution?: Record<string, unknown>;
  notificationDecision?: AiNotificationDecision;
}

export interface InvestigationResult extends TriageResult {
  /** Overrides the adaptive interval when positive. */
  nextCheckMinutes?: number;
  /** Why the pipeline wants another look; recorded in the investigation history. */
  reason?: string;
}

export interface TriageOutcome {
  alert: Alert;
  decision: NotificationDecision | null;
  incident: Incident | null;
}

export interface AlertTriagePort {
  startProcessing(alertId: string): Promise<Alert>;
  complete(alertId: string, result: TriageResult): Promise<TriageOutcome>;
  /**
   * Keeps the alert under investigation. Once the limit is reached the alert
   * is completed for human review instead.
   */
  investigate(alertId: string, result: InvestigationResult): Promise<TriageOutcome>;
  fail(alertId: string, error: string): Promise<Alert>;
  recordRevalidationWindow(
    alertId: string,
    window: RevalidationWindow,
    findings: Record<string, number>,
  ): Promise<Alert>;
}

import type { Alert } from '../../entities/alert.js';
import type {
  AlertActivity,
  AlertActivityDraft,
  AlertComment,
  AlertCommentDraft,
} from '../../entities/alert-activity.js';
import type { AlertDraft } from '../../alerts/alert-state-machine.js';
import type {
  NotificationDecision,
  NotificationDecisionDraft,
  NotificationRecipient,
} from '../../entities/notification-decision.js';

/**
 * Handle on an alert held under its per-alert lock. Every write made through
 * it commits together when the callback resolves.
 */
export interface LockedAlert {
  readonly alert: Alert;
  save(next: Alert): Promise<Alert>;
  recordActivity(activity: AlertActivityDraft): Promise<AlertActivity>;
  addComment(comment: AlertCommentDraft): Promise<AlertComment>;
  /** Same contract as `NotificationDecisionRepositoryPort.createWithRecipients`. */
  recordDecision(
    draft: NotificationDecisionDraft,
    recipients: readonly NotificationRecipient[],
  ): Promise<NotificationDecision>;
}

export interface AlertRepositoryPort {
  create(draft: AlertDraft): Promise<Alert>;
  findById(alertId: string): Promise<Alert | null>;
  findBySourceEventId(companyId: string, sourceEventId: string): Promise<Alert | null>;
  /** Investigating alerts whose check window has elapsed, longest overdue first. */
  listDueForRevalidation(now: Date, limit: number): Promise<Alert[]>;
  listDueForEscalation(now: Date, limit: number): Promise<Alert[]>;
  /**
   * Runs `fn` with exclusive access to one alert. Read-modify-write of
   * `aiStatus`, `investigationCount` and `investigationHistory` must go
   * through here. Throws NotFoundError for an unknown id.
   */
  withAlertLock<T>(alertId: string, fn: (locked: LockedAlert) => Promise<T>): Promise<T>;
}

/** Activity and comment reads, plus writes made outside an alert lock. */
export interface AlertActivityRepositoryPort {
  record(activity: AlertActivityDraft): Promise<AlertActivity>;
  listForAlert(alertId: string): Promise<AlertActivity[]>;
  listComments(alertId: string): Promise<AlertComment[]>;
}

import type {
  NotificationDecision,
  NotificationDecisionDraft,
  NotificationRecipient,
} from '../../entities/notification-decision.js';

/** Append-only: decisions are never updated or deleted. */
export interface NotificationDecisionRepositoryPort {
  /**
   * Writes the decision and all of its recipients as one unit. The level is
   * normalized and recipients are stored in priority order.
   */
  createWithRecipients(
    draft: NotificationDecisionDraft,
    recipients: readonly NotificationRecipient[],
  ): Promise<NotificationDecision>;
  listForAlert(alertId: string): Promise<NotificationDecision[]>;
}

import type { Alert, HumanStatus } from '../entities/alert.js';
import { HUMAN_STATUSES } from '../entities/alert.js';
import type { AlertActivityDraft, AlertCommentDraft } from '../entities/alert-activity.js';
import { InvalidArgumentError } from '../errors.js';

export function isHumanStatus(value: string): value is HumanStatus {
  return HUMAN_STATUSES.some((s) => s === value);
}

export interface HumanStatusChange {
  alert: Alert;
  activity: AlertActivityDraft;
}

/**
 * Any status is reachable from any other; only unknown values are rejected,
 * before anything changes.
 */
export function setHumanStatus(
  alert: Alert,
  status: string,
  actorUserId: string,
  now: Date,
): HumanStatusChange {
  if (!isHumanStatus(status)) {
    throw new InvalidArgumentError(`Invalid human status: ${status}`);
  }
  return {
    alert: {
      ...alert,
      humanStatus: status,
      reviewedById: actorUserId,
      reviewedAt: now,
      updatedAt: now,
    },
    activity: {
      alertId: alert.id,
      companyId: alert.companyId,
      userId: actorUserId,
      action: 'human_status_changed',
      metadata: { oldStatus: alert.humanStatus, newStatus: status },
      createdAt: now,
    },
  };
}

export function buildComment(
  alert: Alert,
  userId: string,
  content: string,
  now: Date,
): AlertCommentDraft {
  const trimmed = content.trim();
  if (trimmed === '') {
    throw new InvalidArgumentError('Comment content must not be empty');
  }
  return { alertId: alert.id, companyId: alert.companyId, userId, content: trimmed, createdAt: now };
}

export function commentAddedActivity(
  commentId: string,
  comment: AlertCommentDraft,
): AlertActivityDraft {
  return {
    alertId: comment.alertId,
    companyId: comment.companyId,
    userId: comment.userId,
    action: 'comment_added',
    metadata: { commentId },
    createdAt: comment.createdAt,
  };
}

export function isProbableFalsePositive(alert: Alert): boolean {
  return alert.verdict === 'likely_false_positive' || alert.humanStatus === 'false_positive';
}

export function isHumanReviewed(alert: Alert): boolean {
  return alert.humanStatus !== 'pending';
}

import type { Alert } from '../../entities/alert.js';
import type { AlertComment } from '../../entities/alert-activity.js';

export interface HumanReviewPort {
  setHumanStatus(alertId: string, status: string, actorUserId: string): Promise<Alert>;
  addComment(alertId: string, userId: string, content: string): Promise<AlertComment>;
}

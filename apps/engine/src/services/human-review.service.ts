import type { Alert, AlertComment, HumanReviewPort } from '@fleetwatch/domain';
import { buildComment, commentAddedActivity, setHumanStatus } from '@fleetwatch/domain';
import type { EngineDeps } from '../engine-deps.js';

export class HumanReviewService implements HumanReviewPort {
  constructor(private readonly deps: Pick<EngineDeps, 'alerts' | 'clock'>) {}

  async setHumanStatus(alertId: string, status: string, actorUserId: string): Promise<Alert> {
    const now = this.deps.clock.now();
    const alert = await this.deps.alerts.withAlertLock(alertId, async (locked) => {
      const change = setHumanStatus(locked.alert, status, actorUserId, now);
      await locked.recordActivity(change.activity);
      return locked.save(change.alert);
    });
    console.log('[human-review] status changed', { alertId, status, actorUserId });
    return alert;
  }

  async addComment(alertId: string, userId: string, content: string): Promise<AlertComment> {
    const now = this.deps.clock.now();
    return this.deps.alerts.withAlertLock(alertId, async (locked) => {
      const draft = buildComment(locked.alert, userId, content, now);
      const comment = await locked.addComment(draft);
      await locked.recordActivity(commentAddedActivity(comment.id, draft));
      return comment;
    });
  }
}

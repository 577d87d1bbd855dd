import type { Alert } from '../../entities/alert.js';
import type { AlertOwner } from '../../alerts/alert-attention.js';

export interface AttentionCommandPort {
  acknowledge(alertId: string, actorUserId: string): Promise<Alert>;
  assign(alertId: string, owner: AlertOwner | null, actorUserId: string): Promise<Alert>;
  close(alertId: string, actorUserId: string): Promise<Alert>;
}

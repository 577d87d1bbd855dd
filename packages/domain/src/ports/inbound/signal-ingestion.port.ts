import type { Alert } from '../../entities/alert.js';
import type { DetectionRule } from '../../entities/company-config.js';
import type { NotificationDecision } from '../../entities/notification-decision.js';
import type { Signal } from '../../entities/signal.js';

// ---------------------------------------------------------------------------
// Outcome of ingesting one safety stream event
// ---------------------------------------------------------------------------

export type SignalIngestOutcome =
  /** Existing signal refreshed; rules are never re-run on updates. */
  | { kind: 'updated'; signal: Signal }
  /** New signal that no rule matched. */
  | { kind: 'stored'; signal: Signal }
  /** A rule matched but an alert already exists for the source event. */
  | { kind: 'duplicate_alert'; signal: Signal; alert: Alert }
  | {
      kind: 'alerted';
      signal: Signal;
      alert: Alert;
      rule: DetectionRule;
      decision: NotificationDecision | null;
      enqueued: boolean;
    };

export interface SignalIngestionPort {
  /** `event` is validated before anything is written. */
  ingest(companyId: string, event: unknown): Promise<SignalIngestOutcome>;
}

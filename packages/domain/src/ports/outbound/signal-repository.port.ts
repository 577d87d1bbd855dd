import type { Signal } from '../../entities/signal.js';
import type { SignalDraft } from '../../signals/stream-event.js';

export interface SignalWindowQuery {
  companyId: string;
  vehicleId?: string;
  driverId?: string;
  from: Date;
  to: Date;
}

export interface SignalRepositoryPort {
  findById(signalId: string): Promise<Signal | null>;
  findBySourceEventId(companyId: string, sourceEventId: string): Promise<Signal | null>;
  create(draft: SignalDraft): Promise<Signal>;
  /** Writes the upstream-updatable fields; signals are never deleted. */
  update(signal: Signal): Promise<Signal>;
  listInWindow(query: SignalWindowQuery): Promise<Signal[]>;
}

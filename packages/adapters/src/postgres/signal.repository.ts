import { v4 as uuidv4 } from 'uuid';
import type { Signal, SignalDraft, SignalRepositoryPort, SignalWindowQuery } from '@fleetwatch/domain';
import { NotFoundError } from '@fleetwatch/domain';
import { signalRowSchema } from '../schemas/rows.schema.js';
import { getPool, type SqlExecutor } from './pool.js';

export class PgSignalRepository implements SignalRepositoryPort {
  constructor(private readonly db: SqlExecutor = getPool()) {}

  async findById(signalId: string): Promise<Signal | null> {
    const { rows } = await this.db.query(`SELECT * FROM triage.signals WHERE id = $1`, [signalId]);
    return rows[0] ? signalRowSchema.parse(rows[0]) : null;
  }

  async findBySourceEventId(companyId: string, sourceEventId: string): Promise<Signal | null> {
    const { rows } = await this.db.query(
      `SELECT * FROM triage.signals WHERE company_id = $1 AND source_event_id = $2`,
      [companyId, sourceEventId],
    );
    return rows[0] ? signalRowSchema.parse(rows[0]) : null;
  }

  async create(draft: SignalDraft): Promise<Signal> {
    const { rows } = await this.db.query(
      `INSERT INTO triage.signals
         (id, company_id, source_event_id, vehicle_id, vehicle_name, driver_id, driver_name,
          latitude, longitude, address, primary_behavior_label, behavior_labels, context_labels,
          severity, event_state, occurred_at, source_updated_at, raw_payload)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12::jsonb,$13::jsonb,$14,$15,$16,$17,$18::jsonb)
       RETURNING *`,
      [
        uuidv4(),
        draft.companyId,
        draft.sourceEventId,
        draft.vehicleId ?? null,
        draft.vehicleName ?? null,
        draft.driverId ?? null,
        draft.driverName ?? null,
        draft.latitude ?? null,
        draft.longitude ?? null,
        draft.address ?? null,
        draft.primaryBehaviorLabel ?? null,
        JSON.stringify(draft.behaviorLabels),
        JSON.stringify(draft.contextLabels),
        draft.severity,
        draft.eventState ?? null,
        draft.occurredAt,
        draft.sourceUpdatedAt ?? null,
        JSON.stringify(draft.rawPayload),
      ],
    );
    return signalRowSchema.parse(rows[0]);
  }

  async update(signal: Signal): Promise<Signal> {
    const { rows } = await this.db.query(
      `UPDATE triage.signals
       SET vehicle_id = $2, vehicle_name = $3, driver_id = $4, driver_name = $5,
           latitude = $6, longitude = $7, address = $8, primary_behavior_label = $9,
           behavior_labels = $10::jsonb, context_labels = $11::jsonb, severity = $12,
           event_state = $13, source_updated_at = $14, raw_payload = $15::jsonb,
           updated_at = $16
       WHERE id = $1
       RETURNING *`,
      [
        signal.id,
        signal.vehicleId ?? null,
        signal.vehicleName ?? null,
        signal.driverId ?? null,
        signal.driverName ?? null,
        signal.latitude ?? null,
        signal.longitude ?? null,
        signal.address ?? null,
        signal.primaryBehaviorLabel ?? null,
        JSON.stringify(signal.behaviorLabels),
        JSON.stringify(signal.contextLabels),
        signal.severity,
        signal.eventState ?? null,
        signal.sourceUpdatedAt ?? null,
        JSON.stringify(signal.rawPayload),
        signal.updatedAt,
      ],
    );
    if (!rows[0]) throw new NotFoundError('Signal', signal.id);
    return signalRowSchema.parse(rows[0]);
  }

  /** Signals of the vehicle or driver (either matches) inside the window, oldest first. */
  async listInWindow(query: SignalWindowQuery): Promise<Signal[]> {
    const subject: string[] = [];
    const params: unknown[] = [query.companyId, query.from, query.to];
    let idx = 4;

    if (query.vehicleId) {
      subject.push(`vehicle_id = $${idx++}`);
      params.push(query.vehicleId);
    }
    if (query.driverId) {
      subject.push(`driver_id = $${idx++}`);
      params.push(query.driverId);
    }
    if (subject.length === 0) return [];

    const { rows } = await this.db.query(
      `SELECT * FROM triage.signals
       WHERE company_id = $1 AND occurred_at BETWEEN $2 AND $3 AND (${subject.join(' OR ')})
       ORDER BY occurred_at ASC`,
      params,
    );
    return rows.map((row) => signalRowSchema.parse(row));
  }
}

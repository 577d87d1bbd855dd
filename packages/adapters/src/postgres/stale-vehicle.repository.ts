import { v4 as uuidv4 } from 'uuid';
import type {
  StaleVehicleAlert,
  StaleVehicleAlertDraft,
  StaleVehicleRepositoryPort,
  VehicleStat,
} from '@fleetwatch/domain';
import { staleVehicleAlertRowSchema, vehicleStatRowSchema } from '../schemas/rows.schema.js';
import { getPool, type SqlExecutor } from './pool.js';

export class PgStaleVehicleRepository implements StaleVehicleRepositoryPort {
  constructor(private readonly db: SqlExecutor = getPool()) {}

  async listStats(companyId: string): Promise<VehicleStat[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM triage.vehicle_stats WHERE company_id = $1 ORDER BY vehicle_id`,
      [companyId],
    );
    return rows.map((row) => vehicleStatRowSchema.parse(row));
  }

  async listOpenAlerts(companyId: string): Promise<StaleVehicleAlert[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM triage.stale_vehicle_alerts
       WHERE company_id = $1 AND resolved_at IS NULL
       ORDER BY alerted_at DESC`,
      [companyId],
    );
    return rows.map((row) => staleVehicleAlertRowSchema.parse(row));
  }

  async createAlert(draft: StaleVehicleAlertDraft): Promise<StaleVehicleAlert> {
    const { rows } = await this.db.query(
      `INSERT INTO triage.stale_vehicle_alerts
         (id, company_id, vehicle_id, vehicle_name, last_stat_at, alerted_at, channels_used,
          recipients_notified, recipients, message_text)
       VALUES ($1,$2,$3,$4,$5,$6,$7::jsonb,$8::jsonb,$9::jsonb,$10)
       RETURNING *`,
      [
        uuidv4(),
        draft.companyId,
        draft.vehicleId,
        draft.vehicleName ?? null,
        draft.lastStatAt ?? null,
        draft.alertedAt,
        JSON.stringify(draft.channelsUsed),
        JSON.stringify(draft.recipientsNotified),
        JSON.stringify(draft.recipients),
        draft.messageText,
      ],
    );
    return staleVehicleAlertRowSchema.parse(rows[0]);
  }

  async markResolved(alertId: string, resolvedAt: Date): Promise<void> {
    await this.db.query(
      `UPDATE triage.stale_vehicle_alerts SET resolved_at = $2 WHERE id = $1 AND resolved_at IS NULL`,
      [alertId, resolvedAt],
    );
  }
}

import type { Contact, ContactRepositoryPort, ContactSubject } from '@fleetwatch/domain';
import { contactRowSchema } from '../schemas/rows.schema.js';
import { getPool, type SqlExecutor } from './pool.js';

export class PgContactRepository implements ContactRepositoryPort {
  constructor(private readonly db: SqlExecutor = getPool()) {}

  /** Company-wide contacts plus those scoped to the vehicle or driver. */
  async listForSubject(companyId: string, subject: ContactSubject): Promise<Contact[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM triage.contacts
       WHERE company_id = $1 AND is_active
         AND ((vehicle_id IS NULL AND driver_id IS NULL) OR vehicle_id = $2 OR driver_id = $3)
       ORDER BY priority ASC, name ASC`,
      [companyId, subject.vehicleId ?? null, subject.driverId ?? null],
    );
    return rows.map((row) => contactRowSchema.parse(row));
  }
}

import type { CompanyConfig, CompanyConfigPort } from '@fleetwatch/domain';
import { DEFAULT_COMPANY_CONFIG, mergeCompanyConfig } from '@fleetwatch/domain';
import { companySettingsSchema } from '../schemas/company-settings.schema.js';
import { getPool, type SqlExecutor } from './pool.js';

export class PgCompanyConfigRepository implements CompanyConfigPort {
  constructor(private readonly db: SqlExecutor = getPool()) {}

  async getConfig(companyId: string): Promise<CompanyConfig> {
    const { rows } = await this.db.query(`SELECT settings FROM triage.companies WHERE id = $1`, [companyId]);
    const row = rows[0];
    if (!row) return DEFAULT_COMPANY_CONFIG;
    return mergeCompanyConfig(companySettingsSchema.parse(row['settings']), DEFAULT_COMPANY_CONFIG);
  }

  async listActiveCompanyIds(): Promise<string[]> {
    const { rows } = await this.db.query(`SELECT id FROM triage.companies WHERE is_active ORDER BY id`);
    return rows.flatMap((row) => (typeof row['id'] === 'string' ? [row['id']] : []));
  }
}

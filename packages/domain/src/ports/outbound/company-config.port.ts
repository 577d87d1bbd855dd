import type { CompanyConfig } from '../../entities/company-config.js';

export interface CompanyConfigPort {
  /** Stored settings merged over the defaults; unknown companies get the defaults. */
  getConfig(companyId: string): Promise<CompanyConfig>;
  listActiveCompanyIds(): Promise<string[]>;
}

import type { CompanyConfig, StaleVehicleAlert, VehicleStat } from '@fleetwatch/domain';
import {
  buildStaleVehicleMessage,
  findRecoveredAlerts,
  findStaleVehicles,
  resolveRecipients,
} from '@fleetwatch/domain';
import type { EngineDeps } from '../engine-deps.js';

export interface StaleVehicleSweepResult {
  companies: number;
  alerted: number;
  recovered: number;
  failed: number;
}

type StaleDeps = Pick<EngineDeps, 'companies' | 'contacts' | 'staleVehicles' | 'clock'>;

/** Flags vehicles that stopped reporting, per company with the monitor enabled. */
export class StaleVehicleSweep {
  constructor(private readonly deps: StaleDeps) {}

  async run(): Promise<StaleVehicleSweepResult> {
    const result: StaleVehicleSweepResult = { companies: 0, alerted: 0, recovered: 0, failed: 0 };
    const companyIds = await this.deps.companies.listActiveCompanyIds();

    for (const companyId of companyIds) {
      try {
        const config = await this.deps.companies.getConfig(companyId);
        if (!config.staleVehicleMonitor.enabled) continue;
        result.companies += 1;
        const { alerted, recovered } = await this.runForCompany(companyId, config);
        result.alerted += alerted;
        result.recovered += recovered;
      } catch (err) {
        result.failed += 1;
        console.error('[stale-vehicle] sweep failed for company', { companyId }, err);
      }
    }

    if (result.alerted + result.recovered + result.failed > 0) {
      console.log('[stale-vehicle] sweep finished', result);
    }
    return result;
  }

  async runForCompany(companyId: string, config: CompanyConfig): Promise<{ alerted: number; recovered: number }> {
    const { staleVehicles, clock } = this.deps;
    const now = clock.now();
    const [stats, openAlerts] = await Promise.all([
      staleVehicles.listStats(companyId),
      staleVehicles.listOpenAlerts(companyId),
    ]);

    const recovered = findRecoveredAlerts(openAlerts, stats, config, now);
    for (const alert of recovered) {
      await staleVehicles.markResolved(alert.id, now);
      console.log('[stale-vehicle] vehicle reporting again', { companyId, vehicleId: alert.vehicleId });
    }

    const stale = findStaleVehicles(stats, openAlerts, config, now);
    let alerted = 0;
    for (const stat of stale) {
      const created = await this.alertFor(companyId, stat, config, now);
      if (created) alerted += 1;
    }
    return { alerted, recovered: recovered.length };
  }

  private async alertFor(
    companyId: string,
    stat: VehicleStat,
    config: CompanyConfig,
    now: Date,
  ): Promise<StaleVehicleAlert | null> {
    const { channels, recipients: recipientTypes } = config.staleVehicleMonitor;
    if (channels.length === 0) {
      console.warn('[stale-vehicle] no channels configured', { companyId, vehicleId: stat.vehicleId });
      return null;
    }

    const contacts = await this.deps.contacts.listForSubject(companyId, { vehicleId: stat.vehicleId });
    const recipients = resolveRecipients(recipientTypes, contacts, { fallbackToAll: true });
    if (recipients.length === 0) {
      console.warn('[stale-vehicle] no reachable recipients', { companyId, vehicleId: stat.vehicleId });
      return null;
    }

    const alert = await this.deps.staleVehicles.createAlert({
      companyId,
      vehicleId: stat.vehicleId,
      vehicleName: stat.vehicleName,
      lastStatAt: stat.syncedAt,
      alertedAt: now,
      channelsUsed: channels,
      recipientsNotified: [...new Set(recipients.map((r) => r.recipientType))],
      recipients,
      messageText: buildStaleVehicleMessage(stat, now),
    });
    console.log('[stale-vehicle] vehicle flagged as stale', {
      companyId,
      vehicleId: stat.vehicleId,
      recipients: recipients.length,
    });
    return alert;
  }
}

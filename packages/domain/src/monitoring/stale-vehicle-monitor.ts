import type { CompanyConfig } from '../entities/company-config.js';
import type { StaleVehicleAlert, VehicleStat } from '../entities/vehicle.js';

const MINUTE_MS = 60_000;

function reportedWithin(stat: VehicleStat, minutes: number, now: Date): boolean {
  return stat.syncedAt !== undefined && stat.syncedAt.getTime() > now.getTime() - minutes * MINUTE_MS;
}

/**
 * Vehicles silent for longer than the threshold (or that never reported),
 * skipping those whose open alert is still inside the cooldown.
 */
export function findStaleVehicles(
  stats: readonly VehicleStat[],
  openAlerts: readonly StaleVehicleAlert[],
  config: CompanyConfig,
  now: Date,
): VehicleStat[] {
  const { thresholdMinutes, cooldownMinutes } = config.staleVehicleMonitor;
  const cooldownStart = now.getTime() - cooldownMinutes * MINUTE_MS;
  return stats.filter((stat) => {
    if (reportedWithin(stat, thresholdMinutes, now)) return false;
    const open = openAlerts.find((a) => a.vehicleId === stat.vehicleId && a.resolvedAt === undefined);
    return !open || open.alertedAt.getTime() < cooldownStart;
  });
}

/** Open alerts whose vehicle has reported again within the threshold. */
export function findRecoveredAlerts(
  openAlerts: readonly StaleVehicleAlert[],
  stats: readonly VehicleStat[],
  config: CompanyConfig,
  now: Date,
): StaleVehicleAlert[] {
  const { thresholdMinutes } = config.staleVehicleMonitor;
  return openAlerts.filter((alert) => {
    if (alert.resolvedAt !== undefined) return false;
    const stat = stats.find((s) => s.vehicleId === alert.vehicleId);
    return stat !== undefined && reportedWithin(stat, thresholdMinutes, now);
  });
}

export function formatSilenceDuration(minutes: number): string {
  if (minutes >= 60) return `${Math.floor(minutes / 60)}h ${minutes % 60}min`;
  return `${minutes} minutes`;
}

export function buildStaleVehicleMessage(stat: VehicleStat, now: Date): string {
  const vehicle = stat.vehicleName ?? 'Unknown vehicle';
  if (!stat.syncedAt) {
    return `Fleet alert: vehicle ${vehicle} has never reported (unknown duration without activity). Verification required.`;
  }
  const minutesAgo = Math.floor((now.getTime() - stat.syncedAt.getTime()) / MINUTE_MS);
  const since = `${stat.syncedAt.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
  return `Fleet alert: vehicle ${vehicle} has not reported since ${since} (${formatSilenceDuration(minutesAgo)} without activity). Verification required.`;
}

import type { StaleVehicleAlert, StaleVehicleAlertDraft, VehicleStat } from '../../entities/vehicle.js';

export interface StaleVehicleRepositoryPort {
  listStats(companyId: string): Promise<VehicleStat[]>;
  listOpenAlerts(companyId: string): Promise<StaleVehicleAlert[]>;
  createAlert(draft: StaleVehicleAlertDraft): Promise<StaleVehicleAlert>;
  markResolved(alertId: string, resolvedAt: Date): Promise<void>;
}

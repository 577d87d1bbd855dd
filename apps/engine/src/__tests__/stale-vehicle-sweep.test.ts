import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { mergeCompanyConfig } from '@fleetwatch/domain';
import { StaleVehicleSweep } from '../services/stale-vehicle-sweep.js';
import type { InMemoryDeps } from './in-memory.js';
import { T0, inMemoryDeps, makeContact, minutesAfter } from './in-memory.js';

describe('StaleVehicleSweep', () => {
  let deps: InMemoryDeps;

  beforeEach(() => {
    deps = inMemoryDeps();
    deps.companies.configs.set('co-1', mergeCompanyConfig({ staleVehicleMonitor: { enabled: true } }));
    deps.contacts.rows.push(makeContact());
    deps.staleVehicles.stats.push(
      { companyId: 'co-1', vehicleId: 'veh-01', vehicleName: 'Truck 01', syncedAt: minutesAfter(T0, -45) },
      { companyId: 'co-1', vehicleId: 'veh-02', vehicleName: 'Truck 02', syncedAt: minutesAfter(T0, -5) },
    );
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('flags a silent vehicle once per cooldown', async () => {
    const sweep = new StaleVehicleSweep(deps);

    const first = await sweep.run();
    const second = await sweep.run();

    expect(first).toEqual({ companies: 1, alerted: 1, recovered: 0, failed: 0 });
    expect(second.alerted).toBe(0);
    expect(deps.staleVehicles.alerts).toEqual([
      {
        id: 'stale-1',
        companyId: 'co-1',
        vehicleId: 'veh-01',
        vehicleName: 'Truck 01',
        lastStatAt: minutesAfter(T0, -45),
        alertedAt: T0,
        channelsUsed: ['whatsapp'],
        recipientsNotified: ['monitoring_team'],
        recipients: [
          { recipientType: 'monitoring_team', name: 'Monitor One', phone: '+10000000001', whatsapp: undefined, priority: 1 },
        ],
        messageText:
          'Fleet alert: vehicle Truck 01 has not reported since 2024-03-01 09:15 UTC (45 minutes without activity). Verification required.',
      },
    ]);
  });

  it('resolves the open alert of a vehicle that reports again', async () => {
    deps.staleVehicles.alerts.push({
      id: 'stale-open',
      companyId: 'co-1',
      vehicleId: 'veh-02',
      alertedAt: minutesAfter(T0, -90),
      channelsUsed: ['whatsapp'],
      recipientsNotified: ['monitoring_team'],
      recipients: [],
      messageText: 'Fleet alert',
    });

    const result = await new StaleVehicleSweep(deps).run();

    expect(result.recovered).toBe(1);
    expect(deps.staleVehicles.alerts[0]?.resolvedAt).toEqual(T0);
  });

  it('skips companies with the monitor disabled', async () => {
    deps.companies.configs.set('co-1', mergeCompanyConfig(null));

    const result = await new StaleVehicleSweep(deps).run();

    expect(result).toEqual({ companies: 0, alerted: 0, recovered: 0, failed: 0 });
    expect(deps.staleVehicles.alerts).toHaveLength(0);
  });

  it('does not record an alert nobody can receive', async () => {
    deps.contacts.rows.splice(0);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    const result = await new StaleVehicleSweep(deps).run();

    expect(result.alerted).toBe(0);
    expect(deps.staleVehicles.alerts).toHaveLength(0);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

import type { Alert, Contact } from '@fleetwatch/domain';
import type { EngineDeps } from '../engine-deps.js';

/** Contacts for the vehicle and driver of the signal behind an alert. */
export async function contactsForAlert(
  deps: Pick<EngineDeps, 'signals' | 'contacts'>,
  alert: Alert,
): Promise<Contact[]> {
  const signal = alert.signalId ? await deps.signals.findById(alert.signalId) : null;
  return deps.contacts.listForSubject(alert.companyId, {
    vehicleId: signal?.vehicleId,
    driverId: signal?.driverId,
  });
}

import type { Contact } from '../../entities/contact.js';

export interface ContactSubject {
  vehicleId?: string;
  driverId?: string;
}

export interface ContactRepositoryPort {
  /** Active contacts for the company, including those tied to the given vehicle or driver. */
  listForSubject(companyId: string, subject: ContactSubject): Promise<Contact[]>;
}

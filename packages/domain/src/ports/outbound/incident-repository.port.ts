import type { Incident, IncidentLink } from '../../entities/incident.js';
import type { IncidentDraft } from '../../incidents/incident-correlation.js';

export interface IncidentRepositoryPort {
  findById(incidentId: string): Promise<Incident | null>;
  findBySourceEventId(companyId: string, sourceEventId: string): Promise<Incident | null>;
  findByDedupeKey(companyId: string, dedupeKey: string): Promise<Incident | null>;
  /**
   * Inserts unless an incident with the same source event id or dedupe key
   * already exists for the company, in which case that one is returned.
   */
  createOrFind(draft: IncidentDraft): Promise<{ incident: Incident; created: boolean }>;
  save(incident: Incident): Promise<Incident>;
  /** Re-linking an existing target keeps the first link. */
  link(link: IncidentLink): Promise<void>;
  listLinks(incidentId: string): Promise<IncidentLink[]>;
}

import type {
  AlertActivityRepositoryPort,
  AlertPipelinePort,
  AlertRepositoryPort,
  ClockPort,
  CompanyConfigPort,
  ContactRepositoryPort,
  IncidentRepositoryPort,
  NotificationDecisionRepositoryPort,
  SignalRepositoryPort,
  StaleVehicleRepositoryPort,
} from '@fleetwatch/domain';

/** Outbound ports every engine service is built from. */
export interface EngineDeps {
  signals: SignalRepositoryPort;
  alerts: AlertRepositoryPort;
  activities: AlertActivityRepositoryPort;
  decisions: NotificationDecisionRepositoryPort;
  incidents: IncidentRepositoryPort;
  companies: CompanyConfigPort;
  contacts: ContactRepositoryPort;
  staleVehicles: StaleVehicleRepositoryPort;
  pipeline: AlertPipelinePort;
  clock: ClockPort;
}

import {
  PgAlertActivityRepository,
  PgAlertPipelineQueue,
  PgAlertRepository,
  PgCompanyConfigRepository,
  PgContactRepository,
  PgIncidentRepository,
  PgNotificationDecisionRepository,
  PgSignalRepository,
  PgStaleVehicleRepository,
  SystemClock,
  getPool,
} from '@fleetwatch/adapters';
import type { EngineDeps } from './engine-deps.js';
import { AlertTriageService } from './services/alert-triage.service.js';
import { AttentionService } from './services/attention.service.js';
import { HumanReviewService } from './services/human-review.service.js';
import { IncidentService } from './services/incident.service.js';
import { RevalidationSweep } from './services/revalidation-sweep.js';
import { SignalIntakeService } from './services/signal-intake.service.js';
import { StaleVehicleSweep } from './services/stale-vehicle-sweep.js';

export type { EngineDeps } from './engine-deps.js';

export interface EngineOptions {
  /** Alerts handled per sweep run. */
  batchSize?: number;
}

export interface Engine {
  signalIntake: SignalIntakeService;
  alertTriage: AlertTriageService;
  humanReview: HumanReviewService;
  attention: AttentionService;
  incidents: IncidentService;
  revalidationSweep: RevalidationSweep;
  staleVehicleSweep: StaleVehicleSweep;
}

export function buildEngine(deps: EngineDeps, options: EngineOptions = {}): Engine {
  const batchSize = options.batchSize ?? 100;
  const incidents = new IncidentService(deps);
  return {
    signalIntake: new SignalIntakeService(deps),
    alertTriage: new AlertTriageService(deps, incidents),
    humanReview: new HumanReviewService(deps),
    attention: new AttentionService(deps, batchSize),
    incidents,
    revalidationSweep: new RevalidationSweep(deps, batchSize),
    staleVehicleSweep: new StaleVehicleSweep(deps),
  };
}

/** Postgres-backed ports sharing the process pool. */
export function buildPgDeps(): EngineDeps {
  const pool = getPool();
  return {
    signals: new PgSignalRepository(pool),
    alerts: new PgAlertRepository(pool),
    activities: new PgAlertActivityRepository(pool),
    decisions: new PgNotificationDecisionRepository(pool),
    incidents: new PgIncidentRepository(pool),
    companies: new PgCompanyConfigRepository(pool),
    contacts: new PgContactRepository(pool),
    staleVehicles: new PgStaleVehicleRepository(pool),
    pipeline: new PgAlertPipelineQueue(pool),
    clock: new SystemClock(),
  };
}

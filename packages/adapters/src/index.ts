// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, closePool, withTransaction, isUniqueViolation } from './postgres/pool.js';
export type { SqlClient, SqlExecutor, SqlPool, SqlResult, SqlRow } from './postgres/pool.js';
export { PgSignalRepository } from './postgres/signal.repository.js';
export { PgAlertRepository, PgAlertActivityRepository } from './postgres/alert.repository.js';
export { PgNotificationDecisionRepository } from './postgres/notification-decision.repository.js';
export { PgIncidentRepository } from './postgres/incident.repository.js';
export { PgCompanyConfigRepository } from './postgres/company-config.repository.js';
export { PgContactRepository } from './postgres/contact.repository.js';
export { PgStaleVehicleRepository } from './postgres/stale-vehicle.repository.js';
export { PgAlertPipelineQueue } from './postgres/alert-pipeline.queue.js';

// ─── Row & Settings Schemas ───────────────────────────────────────────────────
export { companySettingsSchema, toCompanyConfigOverride } from './schemas/company-settings.schema.js';
export { aiAssessmentSchema, alertContextSchema } from './schemas/alert-row.schema.js';

// ─── Clock ────────────────────────────────────────────────────────────────────
export { DeterministicClock, SystemClock, wallClockNow } from './clock/deterministic-clock.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors.js';

// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/signal.js';
export * from './entities/alert.js';
export * from './entities/alert-activity.js';
export * from './entities/notification-decision.js';
export * from './entities/incident.js';
export * from './entities/contact.js';
export * from './entities/vehicle.js';
export * from './entities/company-config.js';

// ─── Signals & rules ──────────────────────────────────────────────────────────
export * from './signals/behavior-labels.js';
export * from './signals/stream-event.js';
export * from './rules/rule-matcher.js';

// ─── Alert lifecycle ──────────────────────────────────────────────────────────
export * from './alerts/alert-state-machine.js';
export * from './alerts/alert-attention.js';
export * from './alerts/attention-engine.js';
export * from './alerts/human-review.js';
export * from './alerts/revalidation-policy.js';

// ─── Notifications ────────────────────────────────────────────────────────────
export * from './notifications/notification-decision-builder.js';

// ─── Incidents ────────────────────────────────────────────────────────────────
export * from './incidents/incident-state-machine.js';
export * from './incidents/incident-correlation.js';

// ─── Monitoring ───────────────────────────────────────────────────────────────
export * from './monitoring/stale-vehicle-monitor.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/signal-ingestion.port.js';
export * from './ports/inbound/alert-triage.port.js';
export * from './ports/inbound/human-review.port.js';
export * from './ports/inbound/attention-command.port.js';
export * from './ports/inbound/incident-command.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/signal-repository.port.js';
export * from './ports/outbound/alert-repository.port.js';
export * from './ports/outbound/notification-decision-repository.port.js';
export * from './ports/outbound/incident-repository.port.js';
export * from './ports/outbound/company-config.port.js';
export * from './ports/outbound/contact-repository.port.js';
export * from './ports/outbound/stale-vehicle-repository.port.js';
export * from './ports/outbound/alert-pipeline.port.js';
export * from './ports/outbound/clock.port.js';

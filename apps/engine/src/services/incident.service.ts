import type {
  Alert,
  Incident,
  IncidentCommandPort,
  IncidentLinkRole,
  IncidentStatus,
  PatternIncidentCommand,
  Signal,
} from '@fleetwatch/domain';
import {
  NotFoundError,
  applyIncidentStatus,
  buildIncidentFromAlert,
  generateDedupeKey,
  incidentAssessmentFrom,
  markAsFalsePositive,
  markAsResolved,
  shouldCreateIncident,
} from '@fleetwatch/domain';
import type { EngineDeps } from '../engine-deps.js';

const MINUTE_MS = 60_000;
const DEFAULT_RELEVANCE = 0.5;

type IncidentDeps = Pick<EngineDeps, 'incidents' | 'signals' | 'companies' | 'clock'>;

/**
 * Opens, correlates and closes incidents. Creation is idempotent per source
 * event and per dedupe key.
 */
export class IncidentService implements IncidentCommandPort {
  constructor(private readonly deps: IncidentDeps) {}

  async createFromAlert(alert: Alert): Promise<Incident | null> {
    const assessment = incidentAssessmentFrom(alert.ai?.aiAssessment, alert);
    if (!shouldCreateIncident(alert, assessment)) return null;

    const { incidents, signals, companies, clock } = this.deps;
    const now = clock.now();
    const config = await companies.getConfig(alert.companyId);
    const signal = alert.signalId ? await signals.findById(alert.signalId) : null;
    const draft = buildIncidentFromAlert(
      alert,
      signal,
      assessment,
      now,
      config.incidentCorrelation.dedupeWindowMinutes,
    );
    const { incident, created } = await incidents.createOrFind(draft);

    await incidents.link({
      incidentId: incident.id,
      targetType: 'alert',
      targetId: alert.id,
      role: created ? 'primary' : 'supporting',
      relevanceScore: created ? 1 : DEFAULT_RELEVANCE,
    });

    if (signal) {
      await incidents.link({
        incidentId: incident.id,
        targetType: 'signal',
        targetId: signal.id,
        role: created ? 'primary' : 'supporting',
        relevanceScore: created ? 1 : DEFAULT_RELEVANCE,
      });
      if (created) {
        await this.linkNearbySignals(incident, signal, config.incidentCorrelation.signalSearchWindowMinutes);
      }
    }

    console.log(`[incident] ${created ? 'created' : 'reused'} incident from alert`, {
      incidentId: incident.id,
      alertId: alert.id,
      priority: incident.priority,
    });
    return incident;
  }

  async createFromPattern(command: PatternIncidentCommand): Promise<Incident> {
    const { incidents, clock } = this.deps;
    const now = clock.now();
    const config = await this.deps.companies.getConfig(command.companyId);
    const dedupeKey = generateDedupeKey(
      command.incidentType,
      command.subjectType,
      command.subjectId,
      command.detectedAt,
      config.incidentCorrelation.dedupeWindowMinutes,
    );

    const { incident, created } = await incidents.createOrFind({
      companyId: command.companyId,
      incidentType: command.incidentType,
      priority: command.priority,
      severity: command.severity,
      status: 'open',
      subjectType: command.subjectType,
      subjectId: command.subjectId,
      subjectName: command.subjectName,
      source: 'auto_pattern',
      dedupeKey,
      aiSummary: command.summary,
      metadata: { ...command.metadata, signalCount: command.signalIds.length, recordedAt: now.toISOString() },
      detectedAt: command.detectedAt,
    });

    for (const signalId of command.signalIds) {
      await incidents.link({
        incidentId: incident.id,
        targetType: 'signal',
        targetId: signalId,
        role: 'supporting',
        relevanceScore: DEFAULT_RELEVANCE,
      });
    }

    console.log(`[incident] ${created ? 'created' : 'reused'} pattern incident`, {
      incidentId: incident.id,
      dedupeKey,
      signals: command.signalIds.length,
    });
    return incident;
  }

  async transition(incidentId: string, to: IncidentStatus, summary?: string): Promise<Incident> {
    const incident = await this.load(incidentId);
    const next = applyIncidentStatus(incident, to, summary, this.deps.clock.now());
    const saved = await this.deps.incidents.save(next);
    console.log('[incident] status updated', { incidentId, from: incident.status, to });
    return saved;
  }

  async resolve(incidentId: string, summary?: string): Promise<Incident> {
    const incident = await this.load(incidentId);
    const saved = await this.deps.incidents.save(markAsResolved(incident, summary, this.deps.clock.now()));
    console.log('[incident] resolved', { incidentId, companyId: saved.companyId });
    return saved;
  }

  async markAsFalsePositive(incidentId: string, reason?: string): Promise<Incident> {
    const incident = await this.load(incidentId);
    const saved = await this.deps.incidents.save(markAsFalsePositive(incident, reason, this.deps.clock.now()));
    console.log('[incident] marked as false positive', { incidentId, companyId: saved.companyId });
    return saved;
  }

  async linkSignal(
    incidentId: string,
    signalId: string,
    role: Exclude<IncidentLinkRole, 'primary'> = 'supporting',
  ): Promise<void> {
    await this.load(incidentId);
    const signal = await this.deps.signals.findById(signalId);
    if (!signal) throw new NotFoundError('Signal', signalId);
    await this.deps.incidents.link({
      incidentId,
      targetType: 'signal',
      targetId: signalId,
      role,
      relevanceScore: DEFAULT_RELEVANCE,
    });
  }

  private async load(incidentId: string): Promise<Incident> {
    const incident = await this.deps.incidents.findById(incidentId);
    if (!incident) throw new NotFoundError('Incident', incidentId);
    return incident;
  }

  /** Other signals of the same vehicle or driver around the triggering one. */
  private async linkNearbySignals(incident: Incident, signal: Signal, windowMinutes: number): Promise<void> {
    const around = signal.occurredAt.getTime();
    const nearby = await this.deps.signals.listInWindow({
      companyId: signal.companyId,
      vehicleId: signal.vehicleId,
      driverId: signal.driverId,
      from: new Date(around - windowMinutes * MINUTE_MS),
      to: new Date(around + windowMinutes * MINUTE_MS),
    });
    const supporting = nearby.filter((s) => s.id !== signal.id);
    for (const other of supporting) {
      await this.deps.incidents.link({
        incidentId: incident.id,
        targetType: 'signal',
        targetId: other.id,
        role: 'supporting',
        relevanceScore: DEFAULT_RELEVANCE,
      });
    }
    if (supporting.length > 0) {
      console.log('[incident] linked nearby signals', { incidentId: incident.id, count: supporting.length });
    }
  }
}

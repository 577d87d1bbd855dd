import { v4 as uuidv4 } from 'uuid';
import type { Incident, IncidentDraft, IncidentLink, IncidentRepositoryPort } from '@fleetwatch/domain';
import { NotFoundError } from '@fleetwatch/domain';
import { incidentLinkRowSchema, incidentRowSchema } from '../schemas/rows.schema.js';
import { getPool, isUniqueViolation, type SqlExecutor } from './pool.js';

export class PgIncidentRepository implements IncidentRepositoryPort {
  constructor(private readonly db: SqlExecutor = getPool()) {}

  async findById(incidentId: string): Promise<Incident | null> {
    const { rows } = await this.db.query(`SELECT * FROM triage.incidents WHERE id = $1`, [incidentId]);
    return rows[0] ? incidentRowSchema.parse(rows[0]) : null;
  }

  async findBySourceEventId(companyId: string, sourceEventId: string): Promise<Incident | null> {
    const { rows } = await this.db.query(
      `SELECT * FROM triage.incidents WHERE company_id = $1 AND source_event_id = $2`,
      [companyId, sourceEventId],
    );
    return rows[0] ? incidentRowSchema.parse(rows[0]) : null;
  }

  async findByDedupeKey(companyId: string, dedupeKey: string): Promise<Incident | null> {
    const { rows } = await this.db.query(
      `SELECT * FROM triage.incidents WHERE company_id = $1 AND dedupe_key = $2`,
      [companyId, dedupeKey],
    );
    return rows[0] ? incidentRowSchema.parse(rows[0]) : null;
  }

  async createOrFind(draft: IncidentDraft): Promise<{ incident: Incident; created: boolean }> {
    const existing = await this.findExisting(draft);
    if (existing) return { incident: existing, created: false };

    try {
      const { rows } = await this.db.query(
        `INSERT INTO triage.incidents
           (id, company_id, incident_type, priority, severity, status, subject_type, subject_id,
            subject_name, source, source_event_id, dedupe_key, ai_summary, ai_assessment, metadata,
            detected_at, resolved_at)
         VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14::jsonb,$15::jsonb,$16,$17)
         RETURNING *`,
        [
          uuidv4(),
          draft.companyId,
          draft.incidentType,
          draft.priority,
          draft.severity,
          draft.status,
          draft.subjectType ?? null,
          draft.subjectId ?? null,
          draft.subjectName ?? null,
          draft.source,
          draft.sourceEventId ?? null,
          draft.dedupeKey ?? null,
          draft.aiSummary ?? null,
          draft.aiAssessment === undefined ? null : JSON.stringify(draft.aiAssessment),
          JSON.stringify(draft.metadata),
          draft.detectedAt,
          draft.resolvedAt ?? null,
        ],
      );
      return { incident: incidentRowSchema.parse(rows[0]), created: true };
    } catch (err) {
      // lost a race against a concurrent insert of the same event or dedupe key
      if (!isUniqueViolation(err)) throw err;
      const winner = await this.findExisting(draft);
      if (!winner) throw err;
      return { incident: winner, created: false };
    }
  }

  async save(incident: Incident): Promise<Incident> {
    const { rows } = await this.db.query(
      `UPDATE triage.incidents SET
         incident_type = $2, priority = $3, severity = $4, status = $5, ai_summary = $6,
         ai_assessment = $7::jsonb, metadata = $8::jsonb, resolved_at = $9, updated_at = $10
       WHERE id = $1
       RETURNING *`,
      [
        incident.id,
        incident.incidentType,
        incident.priority,
        incident.severity,
        incident.status,
        incident.aiSummary ?? null,
        incident.aiAssessment === undefined ? null : JSON.stringify(incident.aiAssessment),
        JSON.stringify(incident.metadata),
        incident.resolvedAt ?? null,
        incident.updatedAt,
      ],
    );
    if (!rows[0]) throw new NotFoundError('Incident', incident.id);
    return incidentRowSchema.parse(rows[0]);
  }

  async link(link: IncidentLink): Promise<void> {
    const table = link.targetType === 'signal' ? 'incident_signals' : 'incident_alerts';
    const column = link.targetType === 'signal' ? 'signal_id' : 'alert_id';
    await this.db.query(
      `INSERT INTO triage.${table} (incident_id, ${column}, role, relevance_score)
       VALUES ($1,$2,$3,$4)
       ON CONFLICT DO NOTHING`,
      [link.incidentId, link.targetId, link.role, link.relevanceScore],
    );
  }

  async listLinks(incidentId: string): Promise<IncidentLink[]> {
    const { rows } = await this.db.query(
      `SELECT incident_id, 'signal' AS target_type, signal_id AS target_id, role, relevance_score
         FROM triage.incident_signals WHERE incident_id = $1
       UNION ALL
       SELECT incident_id, 'alert' AS target_type, alert_id AS target_id, role, relevance_score
         FROM triage.incident_alerts WHERE incident_id = $1`,
      [incidentId],
    );
    return rows.map((row) => incidentLinkRowSchema.parse(row));
  }

  private async findExisting(draft: IncidentDraft): Promise<Incident | null> {
    if (draft.sourceEventId) {
      const bySource = await this.findBySourceEventId(draft.companyId, draft.sourceEventId);
      if (bySource) return bySource;
    }
    if (draft.dedupeKey) return this.findByDedupeKey(draft.companyId, draft.dedupeKey);
    return null;
  }
}

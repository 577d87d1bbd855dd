import { v4 as uuidv4 } from 'uuid';
import type {
  Alert,
  AlertActivity,
  AlertActivityDraft,
  AlertActivityRepositoryPort,
  AlertComment,
  AlertCommentDraft,
  AlertDraft,
  AlertRepositoryPort,
  LockedAlert,
} from '@fleetwatch/domain';
import { NotFoundError } from '@fleetwatch/domain';
import { activityRowSchema, alertRowSchema, commentRowSchema } from '../schemas/alert-row.schema.js';
import { insertDecision } from './notification-decision.repository.js';
import { getPool, withTransaction, type SqlExecutor, type SqlPool } from './pool.js';

const ALERT_SELECT = `
  SELECT a.*, CASE WHEN ai.alert_id IS NULL THEN NULL ELSE to_jsonb(ai) END AS ai
  FROM triage.alerts a
  LEFT JOIN triage.alert_ai ai ON ai.alert_id = a.id`;

function json(value: unknown): string | null {
  return value === undefined ? null : JSON.stringify(value);
}

// ─── Statements shared by the pool and the lock scope ─────────────────────────

async function selectAlert(db: SqlExecutor, where: string, params: unknown[], suffix = ''): Promise<Alert | null> {
  const { rows } = await db.query(`${ALERT_SELECT} WHERE ${where} ${suffix}`, params);
  return rows[0] ? alertRowSchema.parse(rows[0]) : null;
}

async function updateAlert(db: SqlExecutor, alert: Alert): Promise<Alert> {
  const { rowCount } = await db.query(
    `UPDATE triage.alerts SET
       ai_status = $2, severity = $3, verdict = $4, likelihood = $5, confidence = $6,
       reasoning = $7, ai_message = $8, alert_kind = $9, dedupe_key = $10, risk_escalation = $11,
       proactive_flag = $12, human_status = $13, reviewed_by_id = $14, reviewed_at = $15,
       attention_state = $16, ack_status = $17, owner_user_id = $18, owner_contact_id = $19,
       ack_due_at = $20, acked_at = $21, resolve_due_at = $22, resolved_at = $23,
       next_escalation_at = $24, escalation_level = $25, escalation_count = $26,
       notification_decision_payload = $27::jsonb, event_description = $28, updated_at = $29
     WHERE id = $1`,
    [
      alert.id,
      alert.aiStatus,
      alert.severity,
      alert.verdict ?? null,
      alert.likelihood ?? null,
      alert.confidence ?? null,
      alert.reasoning ?? null,
      alert.aiMessage ?? null,
      alert.alertKind,
      alert.dedupeKey ?? null,
      alert.riskEscalation ?? null,
      alert.proactiveFlag,
      alert.humanStatus,
      alert.reviewedById ?? null,
      alert.reviewedAt ?? null,
      alert.attentionState ?? null,
      alert.ackStatus ?? null,
      alert.ownerUserId ?? null,
      alert.ownerContactId ?? null,
      alert.ackDueAt ?? null,
      alert.ackedAt ?? null,
      alert.resolveDueAt ?? null,
      alert.resolvedAt ?? null,
      alert.nextEscalationAt ?? null,
      alert.escalationLevel,
      alert.escalationCount,
      json(alert.notificationDecisionPayload),
      alert.eventDescription ?? null,
      alert.updatedAt,
    ],
  );
  if (rowCount === 0) throw new NotFoundError('Alert', alert.id);

  const ai = alert.ai;
  if (ai) {
    await db.query(
      `INSERT INTO triage.alert_ai
         (alert_id, ai_assessment, alert_context, ai_actions, monitoring_reason, triage_notes,
          investigation_strategy, supporting_evidence, investigation_count, last_investigation_at,
          next_check_minutes, investigation_history, ai_error)
       VALUES ($1,$2::jsonb,$3::jsonb,$4::jsonb,$5,$6,$7,$8::jsonb,$9,$10,$11,$12::jsonb,$13)
       ON CONFLICT (alert_id) DO UPDATE SET
         ai_assessment = EXCLUDED.ai_assessment,
         alert_context = EXCLUDED.alert_context,
         ai_actions = EXCLUDED.ai_actions,
         monitoring_reason = EXCLUDED.monitoring_reason,
         triage_notes = EXCLUDED.triage_notes,
         investigation_strategy = EXCLUDED.investigation_strategy,
         supporting_evidence = EXCLUDED.supporting_evidence,
         investigation_count = EXCLUDED.investigation_count,
         last_investigation_at = EXCLUDED.last_investigation_at,
         next_check_minutes = EXCLUDED.next_check_minutes,
         investigation_history = EXCLUDED.investigation_history,
         ai_error = EXCLUDED.ai_error`,
      [
        alert.id,
        json(ai.aiAssessment),
        json(ai.alertContext),
        json(ai.aiActions),
        ai.monitoringReason ?? null,
        ai.triageNotes ?? null,
        ai.investigationStrategy ?? null,
        json(ai.supportingEvidence),
        ai.investigationCount,
        ai.lastInvestigationAt ?? null,
        ai.nextCheckMinutes ?? null,
        JSON.stringify(ai.investigationHistory),
        ai.aiError ?? null,
      ],
    );
  }
  return alert;
}

async function insertActivity(db: SqlExecutor, draft: AlertActivityDraft): Promise<AlertActivity> {
  const { rows } = await db.query(
    `INSERT INTO triage.alert_activities (id, alert_id, company_id, user_id, action, metadata, created_at)
     VALUES ($1,$2,$3,$4,$5,$6::jsonb,$7)
     RETURNING *`,
    [uuidv4(), draft.alertId, draft.companyId, draft.userId ?? null, draft.action, JSON.stringify(draft.metadata), draft.createdAt],
  );
  return activityRowSchema.parse(rows[0]);
}

async function insertComment(db: SqlExecutor, draft: AlertCommentDraft): Promise<AlertComment> {
  const { rows } = await db.query(
    `INSERT INTO triage.alert_comments (id, alert_id, company_id, user_id, content, created_at)
     VALUES ($1,$2,$3,$4,$5,$6)
     RETURNING *`,
    [uuidv4(), draft.alertId, draft.companyId, draft.userId, draft.content, draft.createdAt],
  );
  return commentRowSchema.parse(rows[0]);
}

// ─── Repositories ─────────────────────────────────────────────────────────────

export class PgAlertRepository implements AlertRepositoryPort {
  constructor(private readonly pool: SqlPool = getPool()) {}

  async create(draft: AlertDraft): Promise<Alert> {
    const { rows } = await this.pool.query(
      `INSERT INTO triage.alerts
         (id, company_id, signal_id, ai_status, severity, alert_kind, proactive_flag, human_status,
          escalation_level, escalation_count, occurred_at, event_description)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12)
       RETURNING *`,
      [
        uuidv4(),
        draft.companyId,
        draft.signalId ?? null,
        draft.aiStatus,
        draft.severity,
        draft.alertKind,
        draft.proactiveFlag,
        draft.humanStatus,
        draft.escalationLevel,
        draft.escalationCount,
        draft.occurredAt ?? null,
        draft.eventDescription ?? null,
      ],
    );
    return alertRowSchema.parse(rows[0]);
  }

  async findById(alertId: string): Promise<Alert | null> {
    return selectAlert(this.pool, 'a.id = $1', [alertId]);
  }

  async findBySourceEventId(companyId: string, sourceEventId: string): Promise<Alert | null> {
    return selectAlert(
      this.pool,
      `a.signal_id IN (SELECT id FROM triage.signals WHERE company_id = $1 AND source_event_id = $2)`,
      [companyId, sourceEventId],
    );
  }

  // An alert whose revalidation is already queued was touched when it was
  // queued, so it sorts behind alerts that have not been looked at yet.
  async listDueForRevalidation(now: Date, limit: number): Promise<Alert[]> {
    const { rows } = await this.pool.query(
      `${ALERT_SELECT}
       WHERE a.ai_status = 'investigating'
         AND (ai.last_investigation_at IS NULL OR COALESCE(ai.next_check_minutes, 0) <= 0
              OR ai.last_investigation_at + ai.next_check_minutes * INTERVAL '1 minute' <= $1)
       ORDER BY GREATEST(
         COALESCE(ai.last_investigation_at + ai.next_check_minutes * INTERVAL '1 minute', a.updated_at),
         a.updated_at
       ) ASC
       LIMIT $2`,
      [now, limit],
    );
    return rows.map((row) => alertRowSchema.parse(row));
  }

  async listDueForEscalation(now: Date, limit: number): Promise<Alert[]> {
    const { rows } = await this.pool.query(
      `${ALERT_SELECT}
       WHERE a.attention_state = 'needs_attention' AND a.ack_status = 'pending'
         AND a.next_escalation_at <= $1
       ORDER BY a.next_escalation_at ASC LIMIT $2`,
      [now, limit],
    );
    return rows.map((row) => alertRowSchema.parse(row));
  }

  /** Row lock held for the whole callback; every write commits or rolls back together. */
  async withAlertLock<T>(alertId: string, fn: (locked: LockedAlert) => Promise<T>): Promise<T> {
    return withTransaction(async (client) => {
      const alert = await selectAlert(client, 'a.id = $1', [alertId], 'FOR UPDATE OF a');
      if (!alert) throw new NotFoundError('Alert', alertId);
      return fn({
        alert,
        save: (next) => updateAlert(client, next),
        recordActivity: (draft) => insertActivity(client, draft),
        addComment: (draft) => insertComment(client, draft),
        recordDecision: (draft, recipients) => insertDecision(client, draft, recipients),
      });
    }, this.pool);
  }
}

export class PgAlertActivityRepository implements AlertActivityRepositoryPort {
  constructor(private readonly db: SqlExecutor = getPool()) {}

  async record(activity: AlertActivityDraft): Promise<AlertActivity> {
    return insertActivity(this.db, activity);
  }

  async listForAlert(alertId: string): Promise<AlertActivity[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM triage.alert_activities WHERE alert_id = $1 ORDER BY created_at ASC`,
      [alertId],
    );
    return rows.map((row) => activityRowSchema.parse(row));
  }

  async listComments(alertId: string): Promise<AlertComment[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM triage.alert_comments WHERE alert_id = $1 ORDER BY created_at ASC`,
      [alertId],
    );
    return rows.map((row) => commentRowSchema.parse(row));
  }
}

import { v4 as uuidv4 } from 'uuid';
import type {
  NotificationDecision,
  NotificationDecisionDraft,
  NotificationDecisionRepositoryPort,
  NotificationRecipient,
} from '@fleetwatch/domain';
import { prepareDecision, sortRecipientsByPriority } from '@fleetwatch/domain';
import { decisionRowSchema } from '../schemas/rows.schema.js';
import { getPool, withTransaction, type SqlExecutor, type SqlPool } from './pool.js';

const RECIPIENTS_AGG = `
  COALESCE((
    SELECT json_agg(r ORDER BY r.position)
    FROM triage.notification_recipients r
    WHERE r.decision_id = d.id
  ), '[]'::json) AS recipients`;

/** Inserts a decision and its recipients on `db`; the caller owns the transaction. */
export async function insertDecision(
  db: SqlExecutor,
  draft: NotificationDecisionDraft,
  recipients: readonly NotificationRecipient[],
): Promise<NotificationDecision> {
  const decision = prepareDecision(draft);
  const ordered = sortRecipientsByPriority(recipients);
  const id = uuidv4();

  const { rows } = await db.query(
    `INSERT INTO triage.notification_decisions
       (id, alert_id, company_id, should_notify, escalation_level, message_text, call_script,
        reason, channels_to_use, dedupe_key, is_escalation)
     VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9::jsonb,$10,$11)
     RETURNING created_at`,
    [
      id,
      decision.alertId,
      decision.companyId,
      decision.shouldNotify,
      decision.escalationLevel,
      decision.messageText ?? null,
      decision.callScript ?? null,
      decision.reason ?? null,
      JSON.stringify(decision.channelsToUse),
      decision.dedupeKey ?? null,
      decision.isEscalation,
    ],
  );

  for (const [position, recipient] of ordered.entries()) {
    await db.query(
      `INSERT INTO triage.notification_recipients
         (id, decision_id, recipient_type, name, phone, whatsapp, priority, position)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8)`,
      [
        uuidv4(),
        id,
        recipient.recipientType,
        recipient.name ?? null,
        recipient.phone ?? null,
        recipient.whatsapp ?? null,
        recipient.priority,
        position,
      ],
    );
  }

  const createdAt = rows[0]?.['created_at'];
  return {
    ...decision,
    id,
    recipients: ordered,
    createdAt: createdAt instanceof Date ? createdAt : new Date(),
  };
}

export class PgNotificationDecisionRepository implements NotificationDecisionRepositoryPort {
  constructor(private readonly pool: SqlPool = getPool()) {}

  async createWithRecipients(
    draft: NotificationDecisionDraft,
    recipients: readonly NotificationRecipient[],
  ): Promise<NotificationDecision> {
    return withTransaction((client) => insertDecision(client, draft, recipients), this.pool);
  }

  async listForAlert(alertId: string): Promise<NotificationDecision[]> {
    const { rows } = await this.pool.query(
      `SELECT d.*, ${RECIPIENTS_AGG}
       FROM triage.notification_decisions d
       WHERE d.alert_id = $1
       ORDER BY d.created_at ASC`,
      [alertId],
    );
    return rows.map((row) => decisionRowSchema.parse(row));
  }
}

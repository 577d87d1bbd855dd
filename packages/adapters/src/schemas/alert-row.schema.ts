import { z } from 'zod';
import type {
  AiAssessment,
  Alert,
  AlertActivity,
  AlertAi,
  AlertComment,
  AlertContext,
  EscalationLevel,
  InvestigationRecord,
} from '@fleetwatch/domain';
import {
  ackStatusSchema,
  activityActionSchema,
  aiStatusSchema,
  alertKindSchema,
  attentionStateSchema,
  humanStatusSchema,
  likelihoodSchema,
  riskEscalationSchema,
  severitySchema,
  verdictSchema,
} from './enums.js';
import { filteredArray, jsonRecord, lenient, nullable, timestamp } from './zod-helpers.js';

// ─── JSON documents ───────────────────────────────────────────────────────────

export const aiAssessmentSchema = z
  .object({
    verdict: lenient(verdictSchema),
    likelihood: lenient(likelihoodSchema),
    confidence: lenient(z.number().min(0).max(1)),
    reasoning: lenient(z.string()),
    riskEscalation: lenient(riskEscalationSchema),
    dedupeKey: lenient(z.string()),
    monitoringReason: lenient(z.string()),
    requiresMonitoring: lenient(z.boolean()),
    nextCheckMinutes: lenient(z.number()),
    supportingEvidence: z.unknown(),
    recommendedActions: lenient(z.array(z.string())),
    summary: lenient(z.string()),
  })
  .passthrough()
  .transform((value): AiAssessment => value);

export const alertContextSchema = z
  .object({
    alertKind: lenient(alertKindSchema),
    proactiveFlag: lenient(z.boolean()),
    triageNotes: lenient(z.string()),
    investigationStrategy: lenient(z.string()),
  })
  .passthrough()
  .transform((value): AlertContext => value);

const investigationRecordSchema = z
  .object({
    investigationNumber: z.number().int(),
    timestamp: z.string(),
    reason: z.string(),
    aiReason: nullable(z.string()),
    aiEvaluatedAt: nullable(z.string()),
    timeWindow: nullable(
      z.object({
        start: nullable(z.string()),
        end: nullable(z.string()),
        minutesCovered: z.number(),
      }),
    ),
    findings: nullable(z.record(z.number())),
  })
  .transform((value): InvestigationRecord => value);

// ─── alert_ai (read as to_jsonb, so timestamps arrive as strings) ─────────────

const alertAiRowSchema = z
  .object({
    alert_id: z.string(),
    ai_assessment: nullable(aiAssessmentSchema),
    alert_context: nullable(alertContextSchema),
    ai_actions: nullable(jsonRecord),
    monitoring_reason: nullable(z.string()),
    triage_notes: nullable(z.string()),
    investigation_strategy: nullable(z.string()),
    supporting_evidence: z.unknown(),
    investigation_count: z.coerce.number().int(),
    last_investigation_at: nullable(timestamp),
    next_check_minutes: nullable(z.coerce.number().int()),
    investigation_history: filteredArray(investigationRecordSchema),
    ai_error: nullable(z.string()),
  })
  .transform(
    (row): AlertAi => ({
      alertId: row.alert_id,
      aiAssessment: row.ai_assessment,
      alertContext: row.alert_context,
      aiActions: row.ai_actions,
      monitoringReason: row.monitoring_reason,
      triageNotes: row.triage_notes,
      investigationStrategy: row.investigation_strategy,
      supportingEvidence: row.supporting_evidence ?? undefined,
      investigationCount: row.investigation_count,
      lastInvestigationAt: row.last_investigation_at,
      nextCheckMinutes: row.next_check_minutes,
      investigationHistory: row.investigation_history,
      aiError: row.ai_error,
    }),
  );

// ─── alerts ───────────────────────────────────────────────────────────────────

function toEscalationLevel(value: number): EscalationLevel {
  if (value >= 2) return 2;
  if (value >= 1) return 1;
  return 0;
}

export const alertRowSchema = z
  .object({
    id: z.string(),
    company_id: z.string(),
    signal_id: nullable(z.string()),
    ai_status: aiStatusSchema,
    severity: severitySchema,
    verdict: nullable(verdictSchema),
    likelihood: nullable(likelihoodSchema),
    confidence: nullable(z.coerce.number()),
    reasoning: nullable(z.string()),
    ai_message: nullable(z.string()),
    alert_kind: alertKindSchema,
    dedupe_key: nullable(z.string()),
    risk_escalation: nullable(riskEscalationSchema),
    proactive_flag: z.boolean(),
    human_status: humanStatusSchema,
    reviewed_by_id: nullable(z.string()),
    reviewed_at: nullable(timestamp),
    attention_state: nullable(attentionStateSchema),
    ack_status: nullable(ackStatusSchema),
    owner_user_id: nullable(z.string()),
    owner_contact_id: nullable(z.string()),
    ack_due_at: nullable(timestamp),
    acked_at: nullable(timestamp),
    resolve_due_at: nullable(timestamp),
    resolved_at: nullable(timestamp),
    next_escalation_at: nullable(timestamp),
    escalation_level: z.coerce.number().int().transform(toEscalationLevel),
    escalation_count: z.coerce.number().int(),
    occurred_at: nullable(timestamp),
    notification_decision_payload: nullable(jsonRecord),
    event_description: nullable(z.string()),
    ai: nullable(alertAiRowSchema),
    created_at: timestamp,
    updated_at: timestamp,
  })
  .transform(
    (row): Alert => ({
      id: row.id,
      companyId: row.company_id,
      signalId: row.signal_id,
      aiStatus: row.ai_status,
      severity: row.severity,
      verdict: row.verdict,
      likelihood: row.likelihood,
      confidence: row.confidence,
      reasoning: row.reasoning,
      aiMessage: row.ai_message,
      alertKind: row.alert_kind,
      dedupeKey: row.dedupe_key,
      riskEscalation: row.risk_escalation,
      proactiveFlag: row.proactive_flag,
      humanStatus: row.human_status,
      reviewedById: row.reviewed_by_id,
      reviewedAt: row.reviewed_at,
      attentionState: row.attention_state,
      ackStatus: row.ack_status,
      ownerUserId: row.owner_user_id,
      ownerContactId: row.owner_contact_id,
      ackDueAt: row.ack_due_at,
      ackedAt: row.acked_at,
      resolveDueAt: row.resolve_due_at,
      resolvedAt: row.resolved_at,
      nextEscalationAt: row.next_escalation_at,
      escalationLevel: row.escalation_level,
      escalationCount: row.escalation_count,
      occurredAt: row.occurred_at,
      notificationDecisionPayload: row.notification_decision_payload,
      eventDescription: row.event_description,
      ai: row.ai,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    }),
  );

// ─── Activity log ─────────────────────────────────────────────────────────────

export const activityRowSchema = z
  .object({
    id: z.string(),
    alert_id: z.string(),
    company_id: z.string(),
    user_id: nullable(z.string()),
    action: activityActionSchema,
    metadata: jsonRecord,
    created_at: timestamp,
  })
  .transform(
    (row): AlertActivity => ({
      id: row.id,
      alertId: row.alert_id,
      companyId: row.company_id,
      userId: row.user_id,
      action: row.action,
      metadata: row.metadata,
      createdAt: row.created_at,
    }),
  );

export const commentRowSchema = z
  .object({
    id: z.string(),
    alert_id: z.string(),
    company_id: z.string(),
    user_id: z.string(),
    content: z.string(),
    created_at: timestamp,
  })
  .transform(
    (row): AlertComment => ({
      id: row.id,
      alertId: row.alert_id,
      companyId: row.company_id,
      userId: row.user_id,
      content: row.content,
      createdAt: row.created_at,
    }),
  );

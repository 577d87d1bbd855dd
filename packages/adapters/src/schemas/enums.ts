import { z } from 'zod';

// Closed value sets as stored in text columns. Each parses to the matching
// domain union.

export const severitySchema = z.enum(['critical', 'warning', 'info']);
export const eventStateSchema = z.enum(['needsReview', 'needsCoaching', 'dismissed', 'coached']);

export const aiStatusSchema = z.enum(['pending', 'processing', 'investigating', 'completed', 'failed']);
export const verdictSchema = z.enum([
  'real_panic',
  'confirmed_violation',
  'needs_review',
  'uncertain',
  'likely_false_positive',
  'no_action_needed',
  'risk_detected',
]);
export const likelihoodSchema = z.enum(['high', 'medium', 'low']);
export const riskEscalationSchema = z.enum(['monitor', 'warn', 'call', 'emergency']);
export const alertKindSchema = z.enum(['panic', 'safety', 'tampering', 'connectivity', 'unknown']);
export const humanStatusSchema = z.enum(['pending', 'reviewed', 'flagged', 'resolved', 'false_positive']);
export const attentionStateSchema = z.enum(['needs_attention', 'in_progress', 'blocked', 'closed']);
export const ackStatusSchema = z.enum(['pending', 'acked']);

export const activityActionSchema = z.enum([
  'ai_processing_started',
  'ai_completed',
  'ai_failed',
  'ai_investigating',
  'ai_revalidated',
  'human_status_changed',
  'comment_added',
  'attention_initialized',
  'attention_acked',
  'attention_assigned',
  'attention_escalated',
  'attention_closed',
]);

export const decisionLevelSchema = z.enum(['emergency', 'critical', 'high', 'low', 'none']);
export const recipientTypeSchema = z.enum([
  'operator',
  'monitoring_team',
  'supervisor',
  'emergency',
  'dispatch',
  'other',
]);
export const matrixRecipientSchema = z.union([recipientTypeSchema, z.literal('monitoring')]);
export const channelSchema = z.enum(['call', 'whatsapp', 'sms']);

export const incidentTypeSchema = z.enum([
  'collision',
  'emergency',
  'pattern',
  'safety_violation',
  'tampering',
  'unknown',
]);
export const incidentStatusSchema = z.enum([
  'open',
  'investigating',
  'pending_action',
  'resolved',
  'false_positive',
]);
export const incidentPrioritySchema = z.enum(['P1', 'P2', 'P3', 'P4']);
export const incidentSubjectTypeSchema = z.enum(['driver', 'vehicle']);
export const incidentSourceSchema = z.enum(['webhook', 'auto_pattern', 'auto_aggregator', 'manual']);
export const incidentLinkRoleSchema = z.enum(['primary', 'supporting', 'contradicting', 'context']);

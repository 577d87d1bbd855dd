import { z } from 'zod';
import type {
  BehaviorLabelEntry,
  Contact,
  Incident,
  IncidentLink,
  NotificationDecision,
  NotificationRecipient,
  Signal,
  StaleVehicleAlert,
  VehicleStat,
} from '@fleetwatch/domain';
import {
  channelSchema,
  decisionLevelSchema,
  eventStateSchema,
  incidentLinkRoleSchema,
  incidentPrioritySchema,
  incidentSourceSchema,
  incidentStatusSchema,
  incidentSubjectTypeSchema,
  incidentTypeSchema,
  recipientTypeSchema,
  severitySchema,
} from './enums.js';
import { filteredArray, jsonRecord, nullable, timestamp } from './zod-helpers.js';

// ─── Signals ──────────────────────────────────────────────────────────────────

export const behaviorLabelSchema = z.union([
  z.string(),
  z
    .object({
      label: nullable(z.string()),
      name: nullable(z.string()),
      source: nullable(z.string()),
    })
    .transform((value): BehaviorLabelEntry => value),
]);

export const signalRowSchema = z
  .object({
    id: z.string(),
    company_id: z.string(),
    source_event_id: z.string(),
    vehicle_id: nullable(z.string()),
    vehicle_name: nullable(z.string()),
    driver_id: nullable(z.string()),
    driver_name: nullable(z.string()),
    latitude: nullable(z.coerce.number()),
    longitude: nullable(z.coerce.number()),
    address: nullable(z.string()),
    primary_behavior_label: nullable(z.string()),
    behavior_labels: filteredArray(behaviorLabelSchema),
    context_labels: filteredArray(behaviorLabelSchema),
    severity: severitySchema,
    event_state: nullable(eventStateSchema),
    occurred_at: timestamp,
    source_updated_at: nullable(timestamp),
    raw_payload: jsonRecord,
    created_at: timestamp,
    updated_at: timestamp,
  })
  .transform(
    (row): Signal => ({
      id: row.id,
      companyId: row.company_id,
      sourceEventId: row.source_event_id,
      vehicleId: row.vehicle_id,
      vehicleName: row.vehicle_name,
      driverId: row.driver_id,
      driverName: row.driver_name,
      latitude: row.latitude,
      longitude: row.longitude,
      address: row.address,
      primaryBehaviorLabel: row.primary_behavior_label,
      behaviorLabels: row.behavior_labels,
      contextLabels: row.context_labels,
      severity: row.severity,
      eventState: row.event_state,
      occurredAt: row.occurred_at,
      sourceUpdatedAt: row.source_updated_at,
      rawPayload: row.raw_payload,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    }),
  );

// ─── Contacts ─────────────────────────────────────────────────────────────────

export const contactRowSchema = z
  .object({
    id: z.string(),
    company_id: z.string(),
    name: z.string(),
    role: recipientTypeSchema,
    phone: nullable(z.string()),
    whatsapp: nullable(z.string()),
    priority: z.coerce.number().int(),
    is_active: z.boolean(),
  })
  .transform(
    (row): Contact => ({
      id: row.id,
      companyId: row.company_id,
      name: row.name,
      role: row.role,
      phone: row.phone,
      whatsapp: row.whatsapp,
      priority: row.priority,
      isActive: row.is_active,
    }),
  );

// ─── Notification decisions ───────────────────────────────────────────────────

/** Recipients are aggregated with json_agg, so keys stay snake_case. */
export const recipientRowSchema = z
  .object({
    recipient_type: recipientTypeSchema,
    name: nullable(z.string()),
    phone: nullable(z.string()),
    whatsapp: nullable(z.string()),
    priority: z.coerce.number().int(),
  })
  .transform(
    (row): NotificationRecipient => ({
      recipientType: row.recipient_type,
      name: row.name,
      phone: row.phone,
      whatsapp: row.whatsapp,
      priority: row.priority,
    }),
  );

export const decisionRowSchema = z
  .object({
    id: z.string(),
    alert_id: z.string(),
    company_id: z.string(),
    should_notify: z.boolean(),
    escalation_level: decisionLevelSchema,
    message_text: nullable(z.string()),
    call_script: nullable(z.string()),
    reason: nullable(z.string()),
    channels_to_use: filteredArray(channelSchema),
    dedupe_key: nullable(z.string()),
    is_escalation: z.boolean(),
    recipients: z.array(recipientRowSchema).default([]),
    created_at: timestamp,
  })
  .transform(
    (row): NotificationDecision => ({
      id: row.id,
      alertId: row.alert_id,
      companyId: row.company_id,
      shouldNotify: row.should_notify,
      escalationLevel: row.escalation_level,
      messageText: row.message_text,
      callScript: row.call_script,
      reason: row.reason,
      channelsToUse: row.channels_to_use,
      dedupeKey: row.dedupe_key,
      isEscalation: row.is_escalation,
      recipients: row.recipients,
      createdAt: row.created_at,
    }),
  );

// ─── Incidents ────────────────────────────────────────────────────────────────

export const incidentRowSchema = z
  .object({
    id: z.string(),
    company_id: z.string(),
    incident_type: incidentTypeSchema,
    priority: incidentPrioritySchema,
    severity: severitySchema,
    status: incidentStatusSchema,
    subject_type: nullable(incidentSubjectTypeSchema),
    subject_id: nullable(z.string()),
    subject_name: nullable(z.string()),
    source: incidentSourceSchema,
    source_event_id: nullable(z.string()),
    dedupe_key: nullable(z.string()),
    ai_summary: nullable(z.string()),
    ai_assessment: nullable(jsonRecord),
    metadata: jsonRecord,
    detected_at: timestamp,
    resolved_at: nullable(timestamp),
    created_at: timestamp,
    updated_at: timestamp,
  })
  .transform(
    (row): Incident => ({
      id: row.id,
      companyId: row.company_id,
      incidentType: row.incident_type,
      priority: row.priority,
      severity: row.severity,
      status: row.status,
      subjectType: row.subject_type,
      subjectId: row.subject_id,
      subjectName: row.subject_name,
      source: row.source,
      sourceEventId: row.source_event_id,
      dedupeKey: row.dedupe_key,
      aiSummary: row.ai_summary,
      aiAssessment: row.ai_assessment,
      metadata: row.metadata,
      detectedAt: row.detected_at,
      resolvedAt: row.resolved_at,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    }),
  );

export const incidentLinkRowSchema = z
  .object({
    incident_id: z.string(),
    target_type: z.enum(['signal', 'alert']),
    target_id: z.string(),
    role: incidentLinkRoleSchema,
    relevance_score: z.coerce.number(),
  })
  .transform(
    (row): IncidentLink => ({
      incidentId: row.incident_id,
      targetType: row.target_type,
      targetId: row.target_id,
      role: row.role,
      relevanceScore: row.relevance_score,
    }),
  );

// ─── Vehicle connectivity ─────────────────────────────────────────────────────

export const vehicleStatRowSchema = z
  .object({
    company_id: z.string(),
    vehicle_id: z.string(),
    vehicle_name: nullable(z.string()),
    synced_at: nullable(timestamp),
  })
  .transform(
    (row): VehicleStat => ({
      companyId: row.company_id,
      vehicleId: row.vehicle_id,
      vehicleName: row.vehicle_name,
      syncedAt: row.synced_at,
    }),
  );

/** `recipients` is stored as a camelCase JSON document. */
const storedRecipientSchema = z
  .object({
    recipientType: recipientTypeSchema,
    name: nullable(z.string()),
    phone: nullable(z.string()),
    whatsapp: nullable(z.string()),
    priority: z.number().int(),
  })
  .transform((value): NotificationRecipient => value);

export const staleVehicleAlertRowSchema = z
  .object({
    id: z.string(),
    company_id: z.string(),
    vehicle_id: z.string(),
    vehicle_name: nullable(z.string()),
    last_stat_at: nullable(timestamp),
    alerted_at: timestamp,
    resolved_at: nullable(timestamp),
    channels_used: filteredArray(channelSchema),
    recipients_notified: filteredArray(recipientTypeSchema),
    recipients: filteredArray(storedRecipientSchema),
    message_text: z.string(),
  })
  .transform(
    (row): StaleVehicleAlert => ({
      id: row.id,
      companyId: row.company_id,
      vehicleId: row.vehicle_id,
      vehicleName: row.vehicle_name,
      lastStatAt: row.last_stat_at,
      alertedAt: row.alerted_at,
      resolvedAt: row.resolved_at,
      channelsUsed: row.channels_used,
      recipientsNotified: row.recipients_notified,
      recipients: row.recipients,
      messageText: row.message_text,
    }),
  );

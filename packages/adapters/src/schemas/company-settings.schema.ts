import { z } from 'zod';
import type { CompanyConfigOverride, DetectionRule } from '@fleetwatch/domain';
import { migrateLegacyNotifyLabels, parseRuleAction } from '@fleetwatch/domain';
import { channelSchema, matrixRecipientSchema } from './enums.js';
import { filteredArray, lenient } from './zod-helpers.js';

// Stored company settings live under `settings.ai_config` in snake_case.
// Every field is optional; a missing, null or malformed value falls back to
// the default instead of failing the whole document.

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const matrixEntrySchema = z.object({
  channels: lenient(z.array(channelSchema)),
  recipients: lenient(z.array(matrixRecipientSchema)),
});

const slaSchema = z.object({
  ack_minutes: lenient(positiveInt),
  resolve_minutes: lenient(positiveInt),
});

const ruleSchema = z
  .object({
    id: z.string().min(1),
    conditions: z.array(z.string().min(1)).min(1),
    action: lenient(z.string()),
    channels: lenient(z.array(channelSchema)),
    recipients: lenient(z.array(matrixRecipientSchema)),
  })
  .transform(
    (rule): DetectionRule => ({
      id: rule.id,
      conditions: rule.conditions,
      action: parseRuleAction(rule.action),
      channels: rule.channels,
      recipients: rule.recipients,
    }),
  );

const aiConfigSchema = z.object({
  investigation_windows: lenient(
    z.object({
      correlation_window_minutes: lenient(positiveInt),
      media_window_seconds: lenient(positiveInt),
      safety_events_before_minutes: lenient(positiveInt),
      safety_events_after_minutes: lenient(positiveInt),
      vehicle_stats_before_minutes: lenient(positiveInt),
      vehicle_stats_after_minutes: lenient(positiveInt),
      camera_media_window_minutes: lenient(positiveInt),
    }),
  ),
  monitoring: lenient(
    z.object({
      confidence_threshold: lenient(z.coerce.number().min(0).max(1)),
      check_intervals: lenient(z.array(positiveInt)),
      max_revalidations: lenient(nonNegativeInt),
    }),
  ),
  escalation_matrix: lenient(
    z.object({
      emergency: lenient(matrixEntrySchema),
      call: lenient(matrixEntrySchema),
      warn: lenient(matrixEntrySchema),
      monitor: lenient(matrixEntrySchema),
    }),
  ),
  safety_stream_notify: lenient(
    z.object({
      enabled: lenient(z.boolean()),
      rules: lenient(filteredArray(ruleSchema)),
      /** Deprecated flat list; only read when `rules` is absent. */
      labels: lenient(z.array(z.string().min(1))),
    }),
  ),
  stale_vehicle_monitor: lenient(
    z.object({
      enabled: lenient(z.boolean()),
      threshold_minutes: lenient(positiveInt),
      cooldown_minutes: lenient(nonNegativeInt),
      channels: lenient(z.array(channelSchema)),
      recipients: lenient(z.array(matrixRecipientSchema)),
    }),
  ),
  usage_limits: lenient(
    z.object({
      max_revalidations_per_event: lenient(nonNegativeInt),
    }),
  ),
  sla_policies: lenient(
    z.object({
      critical: lenient(slaSchema),
      warning: lenient(slaSchema),
      info: lenient(slaSchema),
    }),
  ),
  escalation_policy: lenient(
    z.object({
      escalation_interval_minutes: lenient(positiveInt),
      max_escalations: lenient(nonNegativeInt),
    }),
  ),
  attention_engine: lenient(z.object({ enabled: lenient(z.boolean()) })),
  incident_correlation: lenient(
    z.object({
      dedupe_window_minutes: lenient(positiveInt),
      signal_search_window_minutes: lenient(positiveInt),
    }),
  ),
  canonical_labels: lenient(z.array(z.string().min(1))),
});

export type StoredAiConfig = z.output<typeof aiConfigSchema>;
type StoredMatrixEntry = z.output<typeof matrixEntrySchema>;
type StoredSla = z.output<typeof slaSchema>;

function matrixEntry(entry: StoredMatrixEntry | undefined) {
  return entry && { channels: entry.channels, recipients: entry.recipients };
}

function sla(policy: StoredSla | undefined) {
  return policy && { ackMinutes: policy.ack_minutes, resolveMinutes: policy.resolve_minutes };
}

function notifyRules(notify: NonNullable<StoredAiConfig['safety_stream_notify']>): DetectionRule[] | undefined {
  if (notify.rules) return notify.rules;
  if (notify.labels) return migrateLegacyNotifyLabels(notify.labels);
  return undefined;
}

export function toCompanyConfigOverride(stored: StoredAiConfig): CompanyConfigOverride {
  const {
    investigation_windows: windows,
    monitoring,
    escalation_matrix: matrix,
    safety_stream_notify: notify,
    stale_vehicle_monitor: stale,
    sla_policies: slaPolicies,
    escalation_policy: escalation,
    incident_correlation: correlation,
  } = stored;

  return {
    investigationWindows: windows && {
      correlationWindowMinutes: windows.correlation_window_minutes,
      mediaWindowSeconds: windows.media_window_seconds,
      safetyEventsBeforeMinutes: windows.safety_events_before_minutes,
      safetyEventsAfterMinutes: windows.safety_events_after_minutes,
      vehicleStatsBeforeMinutes: windows.vehicle_stats_before_minutes,
      vehicleStatsAfterMinutes: windows.vehicle_stats_after_minutes,
      cameraMediaWindowMinutes: windows.camera_media_window_minutes,
    },
    monitoring: monitoring && {
      confidenceThreshold: monitoring.confidence_threshold,
      checkIntervals: monitoring.check_intervals,
      maxRevalidations: monitoring.max_revalidations,
    },
    escalationMatrix: matrix && {
      emergency: matrixEntry(matrix.emergency),
      call: matrixEntry(matrix.call),
      warn: matrixEntry(matrix.warn),
      monitor: matrixEntry(matrix.monitor),
    },
    safetyStreamNotify: notify && { enabled: notify.enabled, rules: notifyRules(notify) },
    staleVehicleMonitor: stale && {
      enabled: stale.enabled,
      thresholdMinutes: stale.threshold_minutes,
      cooldownMinutes: stale.cooldown_minutes,
      channels: stale.channels,
      recipients: stale.recipients,
    },
    usageLimits: stored.usage_limits && {
      maxRevalidationsPerEvent: stored.usage_limits.max_revalidations_per_event,
    },
    slaPolicies: slaPolicies && {
      critical: sla(slaPolicies.critical),
      warning: sla(slaPolicies.warning),
      info: sla(slaPolicies.info),
    },
    escalationPolicy: escalation && {
      escalationIntervalMinutes: escalation.escalation_interval_minutes,
      maxEscalations: escalation.max_escalations,
    },
    attentionEngine: stored.attention_engine && { enabled: stored.attention_engine.enabled },
    incidentCorrelation: correlation && {
      dedupeWindowMinutes: correlation.dedupe_window_minutes,
      signalSearchWindowMinutes: correlation.signal_search_window_minutes,
    },
    canonicalLabels: stored.canonical_labels,
  };
}

/** `companies.settings` column: only `ai_config` feeds the company config. */
export const companySettingsSchema = z
  .object({ ai_config: lenient(aiConfigSchema) })
  .catch({ ai_config: undefined })
  .transform((settings): CompanyConfigOverride => toCompanyConfigOverride(settings.ai_config ?? {}));

import type { SignalSeverity } from './signal.js';
import type { NotificationChannel, RecipientType } from './notification-decision.js';
import behaviorLabels from '../signals/behavior-labels.json';
import { migrateLegacyNotifyLabels } from '../rules/rule-matcher.js';

export type EscalationMatrixKey = 'emergency' | 'call' | 'warn' | 'monitor';

/** `monitoring` is the stored alias of the `monitoring_team` recipient type. */
export type MatrixRecipient = RecipientType | 'monitoring';

export type RuleAction = 'ai_pipeline' | 'immediate_notify' | 'both';

export interface DetectionRule {
  readonly id: string;
  /** Labels that must all be present on the signal. */
  readonly conditions: string[];
  readonly action: RuleAction;
  readonly channels?: NotificationChannel[];
  readonly recipients?: MatrixRecipient[];
}

export interface EscalationMatrixEntry {
  readonly channels: NotificationChannel[];
  readonly recipients: MatrixRecipient[];
}

export type EscalationMatrix = Readonly<Record<EscalationMatrixKey, EscalationMatrixEntry>>;

export interface InvestigationWindows {
  readonly correlationWindowMinutes: number;
  readonly mediaWindowSeconds: number;
  readonly safetyEventsBeforeMinutes: number;
  readonly safetyEventsAfterMinutes: number;
  readonly vehicleStatsBeforeMinutes: number;
  readonly vehicleStatsAfterMinutes: number;
  readonly cameraMediaWindowMinutes: number;
}

export interface MonitoringConfig {
  readonly confidenceThreshold: number;
  /** Minutes between revalidations, indexed by investigation count. */
  readonly checkIntervals: number[];
  readonly maxRevalidations: number;
}

export interface SafetyStreamNotifyConfig {
  readonly enabled: boolean;
  readonly rules: DetectionRule[];
}

export interface StaleVehicleMonitorConfig {
  readonly enabled: boolean;
  readonly thresholdMinutes: number;
  readonly cooldownMinutes: number;
  readonly channels: NotificationChannel[];
  readonly recipients: MatrixRecipient[];
}

export interface UsageLimits {
  readonly maxRevalidationsPerEvent: number;
}

export interface SlaPolicy {
  readonly ackMinutes: number;
  readonly resolveMinutes: number;
}

export interface EscalationPolicy {
  readonly escalationIntervalMinutes: number;
  readonly maxEscalations: number;
}

export interface IncidentCorrelationConfig {
  readonly dedupeWindowMinutes: number;
  readonly signalSearchWindowMinutes: number;
}

export interface CompanyConfig {
  readonly investigationWindows: InvestigationWindows;
  readonly monitoring: MonitoringConfig;
  readonly escalationMatrix: EscalationMatrix;
  readonly safetyStreamNotify: SafetyStreamNotifyConfig;
  readonly staleVehicleMonitor: StaleVehicleMonitorConfig;
  readonly usageLimits: UsageLimits;
  readonly slaPolicies: Readonly<Record<SignalSeverity, SlaPolicy>>;
  readonly escalationPolicy: EscalationPolicy;
  readonly attentionEngine: { readonly enabled: boolean };
  readonly incidentCorrelation: IncidentCorrelationConfig;
  readonly canonicalLabels: string[];
}

/**
 * Partial company settings. Objects merge per field; arrays replace the
 * default wholesale.
 */
export interface CompanyConfigOverride {
  readonly investigationWindows?: Partial<InvestigationWindows>;
  readonly monitoring?: Partial<MonitoringConfig>;
  readonly escalationMatrix?: Partial<Record<EscalationMatrixKey, Partial<EscalationMatrixEntry>>>;
  readonly safetyStreamNotify?: Partial<SafetyStreamNotifyConfig>;
  readonly staleVehicleMonitor?: Partial<StaleVehicleMonitorConfig>;
  readonly usageLimits?: Partial<UsageLimits>;
  readonly slaPolicies?: Partial<Record<SignalSeverity, Partial<SlaPolicy>>>;
  readonly escalationPolicy?: Partial<EscalationPolicy>;
  readonly attentionEngine?: { readonly enabled?: boolean };
  readonly incidentCorrelation?: Partial<IncidentCorrelationConfig>;
  readonly canonicalLabels?: string[];
}

export const DEFAULT_NOTIFY_LABELS: readonly string[] = behaviorLabels.defaultNotify;

export const DEFAULT_COMPANY_CONFIG: CompanyConfig = {
  investigationWindows: {
    correlationWindowMinutes: 20,
    mediaWindowSeconds: 120,
    safetyEventsBeforeMinutes: 30,
    safetyEventsAfterMinutes: 10,
    vehicleStatsBeforeMinutes: 5,
    vehicleStatsAfterMinutes: 2,
    cameraMediaWindowMinutes: 2,
  },
  monitoring: {
    confidenceThreshold: 0.8,
    checkIntervals: [5, 15, 30, 60],
    maxRevalidations: 3,
  },
  escalationMatrix: {
    emergency: {
      channels: ['call', 'whatsapp', 'sms'],
      recipients: ['operator', 'monitoring', 'supervisor', 'emergency'],
    },
    call: {
      channels: ['call', 'whatsapp'],
      recipients: ['monitoring', 'supervisor'],
    },
    warn: {
      channels: ['whatsapp', 'sms'],
      recipients: ['monitoring'],
    },
    monitor: {
      channels: [],
      recipients: [],
    },
  },
  safetyStreamNotify: {
    enabled: true,
    rules: migrateLegacyNotifyLabels(DEFAULT_NOTIFY_LABELS),
  },
  staleVehicleMonitor: {
    enabled: false,
    thresholdMinutes: 30,
    cooldownMinutes: 60,
    channels: ['whatsapp'],
    recipients: ['monitoring'],
  },
  usageLimits: {
    maxRevalidationsPerEvent: 3,
  },
  slaPolicies: {
    critical: { ackMinutes: 5, resolveMinutes: 60 },
    warning: { ackMinutes: 15, resolveMinutes: 240 },
    info: { ackMinutes: 60, resolveMinutes: 1440 },
  },
  escalationPolicy: {
    escalationIntervalMinutes: 10,
    maxEscalations: 3,
  },
  attentionEngine: { enabled: true },
  incidentCorrelation: {
    dedupeWindowMinutes: 30,
    signalSearchWindowMinutes: 5,
  },
  canonicalLabels: behaviorLabels.canonical,
};

// ─── Merge ────────────────────────────────────────────────────────────────────

/** Drops keys whose value is `undefined` so they never shadow a default. */
function definedOnly<T extends object>(partial: T | undefined): Partial<T> {
  const out: Partial<T> = {};
  if (!partial) return out;
  for (const [key, value] of Object.entries(partial)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}

function mergeMatrix(
  base: EscalationMatrix,
  override: CompanyConfigOverride['escalationMatrix'],
): EscalationMatrix {
  if (!override) return base;
  const entry = (key: EscalationMatrixKey): EscalationMatrixEntry => ({
    ...base[key],
    ...definedOnly(override[key]),
  });
  return {
    emergency: entry('emergency'),
    call: entry('call'),
    warn: entry('warn'),
    monitor: entry('monitor'),
  };
}

function mergeSla(
  base: CompanyConfig['slaPolicies'],
  override: CompanyConfigOverride['slaPolicies'],
): CompanyConfig['slaPolicies'] {
  if (!override) return base;
  return {
    critical: { ...base.critical, ...definedOnly(override.critical) },
    warning: { ...base.warning, ...definedOnly(override.warning) },
    info: { ...base.info, ...definedOnly(override.info) },
  };
}

/**
 * Layers a company override on top of a base config. Absent keys keep the
 * base value; arrays are replaced, never concatenated.
 */
export function mergeCompanyConfig(
  override: CompanyConfigOverride | null | undefined,
  base: CompanyConfig = DEFAULT_COMPANY_CONFIG,
): CompanyConfig {
  if (!override) return base;
  return {
    investigationWindows: { ...base.investigationWindows, ...definedOnly(override.investigationWindows) },
    monitoring: { ...base.monitoring, ...definedOnly(override.monitoring) },
    escalationMatrix: mergeMatrix(base.escalationMatrix, override.escalationMatrix),
    safetyStreamNotify: { ...base.safetyStreamNotify, ...definedOnly(override.safetyStreamNotify) },
    staleVehicleMonitor: { ...base.staleVehicleMonitor, ...definedOnly(override.staleVehicleMonitor) },
    usageLimits: { ...base.usageLimits, ...definedOnly(override.usageLimits) },
    slaPolicies: mergeSla(base.slaPolicies, override.slaPolicies),
    escalationPolicy: { ...base.escalationPolicy, ...definedOnly(override.escalationPolicy) },
    attentionEngine: { ...base.attentionEngine, ...definedOnly(override.attentionEngine) },
    incidentCorrelation: { ...base.incidentCorrelation, ...definedOnly(override.incidentCorrelation) },
    canonicalLabels: override.canonicalLabels ?? base.canonicalLabels,
  };
}

import type { Alert } from '../entities/alert.js';
import type { Contact } from '../entities/contact.js';
import type {
  CompanyConfig,
  DetectionRule,
  EscalationMatrixKey,
  MatrixRecipient,
} from '../entities/company-config.js';
import type {
  DecisionEscalationLevel,
  NotificationChannel,
  NotificationDecision,
  NotificationDecisionDraft,
  NotificationRecipient,
  RecipientType,
} from '../entities/notification-decision.js';
import { DECISION_ESCALATION_LEVELS } from '../entities/notification-decision.js';
import type { Signal } from '../entities/signal.js';
import { assertNever } from '../errors.js';

const CALL_SCRIPT_MAX = 200;
const DISPATCHABLE_CHANNELS: readonly NotificationChannel[] = ['call', 'whatsapp', 'sms'];

// ─── Normalization ────────────────────────────────────────────────────────────

function isDecisionLevel(value: string): value is DecisionEscalationLevel {
  return DECISION_ESCALATION_LEVELS.some((l) => l === value);
}

/** Blank maps to `none`; anything unrecognized escalates to `critical`. */
export function normalizeEscalationLevel(raw: string | null | undefined): DecisionEscalationLevel {
  const value = (raw ?? '').trim().toLowerCase();
  if (value === '') return 'none';
  return isDecisionLevel(value) ? value : 'critical';
}

/** Ascending priority; equal priorities keep insertion order. */
export function sortRecipientsByPriority<T extends { priority: number }>(list: readonly T[]): T[] {
  return list
    .map((item, index) => ({ item, index }))
    .sort((a, b) => a.item.priority - b.item.priority || a.index - b.index)
    .map(({ item }) => item);
}

export type PreparedDecision = Omit<NotificationDecision, 'id' | 'createdAt' | 'recipients'>;

/** Normalizes a draft into the exact attributes a decision row is written with. */
export function prepareDecision(draft: NotificationDecisionDraft): PreparedDecision {
  return {
    alertId: draft.alertId,
    companyId: draft.companyId,
    shouldNotify: draft.shouldNotify,
    escalationLevel: normalizeEscalationLevel(draft.escalationLevel),
    messageText: draft.messageText,
    callScript: draft.callScript,
    reason: draft.reason,
    channelsToUse: draft.channelsToUse ?? [],
    dedupeKey: draft.dedupeKey,
    isEscalation: draft.isEscalation ?? false,
  };
}

export function decisionLevelForMatrixKey(key: EscalationMatrixKey): DecisionEscalationLevel {
  switch (key) {
    case 'emergency':
      return 'critical';
    case 'call':
      return 'high';
    case 'warn':
      return 'low';
    case 'monitor':
      return 'none';
    default:
      return assertNever(key);
  }
}

export function callScriptFor(messageText: string): string {
  return Array.from(messageText).slice(0, CALL_SCRIPT_MAX).join('');
}

// ─── Recipients ───────────────────────────────────────────────────────────────

export function toRecipientType(recipient: MatrixRecipient): RecipientType {
  return recipient === 'monitoring' ? 'monitoring_team' : recipient;
}

function isReachable(contact: Contact): boolean {
  return contact.isActive && Boolean(contact.phone || contact.whatsapp);
}

function toRecipient(contact: Contact): NotificationRecipient {
  return {
    recipientType: contact.role,
    name: contact.name,
    phone: contact.phone,
    whatsapp: contact.whatsapp,
    priority: contact.priority,
  };
}

/** Highest-priority reachable contact per role, in first-seen role order. */
function contactsByRole(contacts: readonly Contact[]): Map<RecipientType, Contact> {
  const byRole = new Map<RecipientType, Contact>();
  for (const contact of sortRecipientsByPriority(contacts.filter(isReachable))) {
    if (!byRole.has(contact.role)) byRole.set(contact.role, contact);
  }
  return byRole;
}

export interface ResolveRecipientOptions {
  /** When none of the requested roles resolve, use every reachable role instead. */
  fallbackToAll?: boolean;
}

/**
 * One recipient per requested role. Only contacts with a phone or WhatsApp
 * number are eligible.
 */
export function resolveRecipients(
  recipientTypes: readonly MatrixRecipient[],
  contacts: readonly Contact[],
  options: ResolveRecipientOptions = {},
): NotificationRecipient[] {
  const byRole = contactsByRole(contacts);
  const recipients: NotificationRecipient[] = [];
  for (const type of new Set(recipientTypes.map(toRecipientType))) {
    const contact = byRole.get(type);
    if (contact) recipients.push(toRecipient(contact));
  }
  if (recipients.length === 0 && options.fallbackToAll) {
    return [...byRole.values()].map(toRecipient);
  }
  return recipients;
}

// ─── Decision proposals ───────────────────────────────────────────────────────

export interface DecisionProposal {
  draft: NotificationDecisionDraft;
  recipients: NotificationRecipient[];
}

export interface EscalationStep {
  matrixKey: Exclude<EscalationMatrixKey, 'monitor'>;
  newCount: number;
  maxEscalations: number;
}

/** Decision for one automatic escalation step; null when nobody is reachable. */
export function buildEscalationDecision(
  alert: Alert,
  step: EscalationStep,
  config: CompanyConfig,
  contacts: readonly Contact[],
): DecisionProposal | null {
  const entry = config.escalationMatrix[step.matrixKey];
  const recipients = resolveRecipients(entry.recipients, contacts, { fallbackToAll: true });
  if (recipients.length === 0) return null;

  const messageText = alert.aiMessage ?? 'Alert requires attention: automatic escalation';
  return {
    draft: {
      alertId: alert.id,
      companyId: alert.companyId,
      shouldNotify: true,
      escalationLevel: decisionLevelForMatrixKey(step.matrixKey),
      channelsToUse: entry.channels,
      messageText,
      callScript: callScriptFor(messageText),
      dedupeKey: `escalation-${alert.id}-${step.newCount}`,
      reason: `Automatic escalation (level ${step.newCount}/${step.maxEscalations}): no ACK within SLA`,
      isEscalation: true,
    },
    recipients,
  };
}

function formatOccurredAt(date: Date | undefined): string {
  if (!date) return 'N/A';
  return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

export function immediateMessage(alert: Alert, signal: Signal): string {
  const description = signal.primaryBehaviorLabel ?? alert.eventDescription ?? 'Safety event';
  const vehicle = signal.vehicleName ?? 'Unknown vehicle';
  const driver = signal.driverName ?? 'Unidentified';
  return `Safety alert: ${description} - Vehicle: ${vehicle}, Driver: ${driver}. ${formatOccurredAt(alert.occurredAt ?? signal.occurredAt)}`;
}

/**
 * Decision for a rule that notifies without waiting for triage. The rule's own
 * channels and recipients win over `escalationMatrix.warn`.
 */
export function buildImmediateDecision(
  alert: Alert,
  signal: Signal,
  rule: DetectionRule,
  config: CompanyConfig,
  contacts: readonly Contact[],
): DecisionProposal {
  const matrix = config.escalationMatrix.warn;
  const channels = rule.channels && rule.channels.length > 0 ? rule.channels : matrix.channels;
  const recipientTypes =
    rule.recipients && rule.recipients.length > 0 ? rule.recipients : matrix.recipients;
  const messageText = immediateMessage(alert, signal);
  return {
    draft: {
      alertId: alert.id,
      companyId: alert.companyId,
      shouldNotify: true,
      escalationLevel: 'high',
      channelsToUse: channels,
      messageText,
      callScript: callScriptFor(messageText),
      reason: `Immediate alert from detection rule ${rule.id}`,
      dedupeKey: `immediate-${signal.sourceEventId}`,
    },
    recipients: resolveRecipients(recipientTypes, contacts, { fallbackToAll: true }),
  };
}

// ─── AI pipeline decisions ────────────────────────────────────────────────────

/** Notification block returned by the triage pipeline alongside its assessment. */
export interface AiNotificationDecision {
  shouldNotify: boolean;
  escalationLevel?: string;
  channelsToUse?: NotificationChannel[];
  recipients?: NotificationRecipient[];
  messageText?: string;
  callScript?: string;
  dedupeKey?: string;
  reason?: string;
}

export function decisionFromAiPayload(alert: Alert, payload: AiNotificationDecision): DecisionProposal {
  return {
    draft: {
      alertId: alert.id,
      companyId: alert.companyId,
      shouldNotify: payload.shouldNotify,
      escalationLevel: payload.escalationLevel,
      channelsToUse: payload.channelsToUse,
      messageText: payload.messageText,
      callScript: payload.callScript,
      dedupeKey: payload.dedupeKey,
      reason: payload.reason,
    },
    recipients: payload.recipients ?? [],
  };
}

/**
 * The pipeline chose not to notify at level `none`; the company's `monitor`
 * matrix entry may still ask for a low-level notification. Null when it does not.
 */
export function applyMonitorMatrixOverride(
  payload: AiNotificationDecision,
  alert: Alert,
  config: CompanyConfig,
  contacts: readonly Contact[],
  humanMessage: string,
): DecisionProposal | null {
  if (payload.shouldNotify) return null;
  if (payload.escalationLevel !== 'none') return null;

  const entry = config.escalationMatrix.monitor;
  const channels = entry.channels.filter((c) => DISPATCHABLE_CHANNELS.includes(c));
  if (channels.length === 0 || entry.recipients.length === 0) return null;

  const recipients = resolveRecipients(entry.recipients, contacts);
  if (recipients.length === 0) return null;

  const messageText = payload.messageText ?? humanMessage;
  return {
    draft: {
      alertId: alert.id,
      companyId: alert.companyId,
      shouldNotify: true,
      escalationLevel: 'low',
      channelsToUse: channels,
      messageText,
      callScript: payload.callScript ?? callScriptFor(messageText),
      dedupeKey: payload.dedupeKey ?? alert.dedupeKey ?? `monitor-${alert.id}`,
      reason: 'Monitor-level notification per escalation matrix',
    },
    recipients,
  };
}

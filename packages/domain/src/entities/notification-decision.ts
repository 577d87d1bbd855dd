export type DecisionEscalationLevel = 'emergency' | 'critical' | 'high' | 'low' | 'none';

export const DECISION_ESCALATION_LEVELS: readonly DecisionEscalationLevel[] = [
  'emergency',
  'critical',
  'high',
  'low',
  'none',
];

export type RecipientType =
  | 'operator'
  | 'monitoring_team'
  | 'supervisor'
  | 'emergency'
  | 'dispatch'
  | 'other';

export type NotificationChannel = 'call' | 'whatsapp' | 'sms';

export interface NotificationRecipient {
  readonly recipientType: RecipientType;
  readonly name?: string;
  readonly phone?: string;
  readonly whatsapp?: string;
  /** 1 is contacted first. */
  readonly priority: number;
}

/**
 * Immutable record of what was decided for one alert at one point in time.
 * A new decision is always a new record.
 */
export interface NotificationDecision {
  readonly id: string;
  readonly alertId: string;
  readonly companyId: string;
  readonly shouldNotify: boolean;
  readonly escalationLevel: DecisionEscalationLevel;
  readonly messageText?: string;
  readonly callScript?: string;
  readonly reason?: string;
  readonly channelsToUse: NotificationChannel[];
  readonly dedupeKey?: string;
  readonly isEscalation: boolean;
  readonly recipients: readonly NotificationRecipient[];
  readonly createdAt: Date;
}

/** Attributes accepted before normalization; `escalationLevel` may be any raw string. */
export interface NotificationDecisionDraft {
  readonly alertId: string;
  readonly companyId: string;
  readonly shouldNotify: boolean;
  readonly escalationLevel?: string | null;
  readonly messageText?: string;
  readonly callScript?: string;
  readonly reason?: string;
  readonly channelsToUse?: NotificationChannel[];
  readonly dedupeKey?: string;
  readonly isEscalation?: boolean;
}

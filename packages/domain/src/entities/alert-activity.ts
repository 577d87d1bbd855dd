export type AlertActivityAction =
  | 'ai_processing_started'
  | 'ai_completed'
  | 'ai_failed'
  | 'ai_investigating'
  | 'ai_revalidated'
  | 'human_status_changed'
  | 'comment_added'
  | 'attention_initialized'
  | 'attention_acked'
  | 'attention_assigned'
  | 'attention_escalated'
  | 'attention_closed';

export interface AlertActivity {
  readonly id: string;
  readonly alertId: string;
  readonly companyId: string;
  /** Absent for system-initiated entries. */
  readonly userId?: string;
  readonly action: AlertActivityAction;
  readonly metadata: Record<string, unknown>;
  readonly createdAt: Date;
}

export interface AlertComment {
  readonly id: string;
  readonly alertId: string;
  readonly companyId: string;
  readonly userId: string;
  readonly content: string;
  readonly createdAt: Date;
}

export type AlertActivityDraft = Omit<AlertActivity, 'id'>;

export type AlertCommentDraft = Omit<AlertComment, 'id'>;

import type { RecipientType } from './notification-decision.js';

/** A company contact that notifications can be routed to. */
export interface Contact {
  readonly id: string;
  readonly companyId: string;
  readonly name: string;
  readonly role: RecipientType;
  readonly phone?: string;
  readonly whatsapp?: string;
  /** 1 is contacted first. */
  readonly priority: number;
  readonly isActive: boolean;
}

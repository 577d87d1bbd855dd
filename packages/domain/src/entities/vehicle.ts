import type { NotificationChannel, NotificationRecipient, RecipientType } from './notification-decision.js';

/** Latest telemetry snapshot per vehicle; `syncedAt` is absent when it never reported. */
export interface VehicleStat {
  readonly companyId: string;
  readonly vehicleId: string;
  readonly vehicleName?: string;
  readonly syncedAt?: Date;
}

export interface StaleVehicleAlert {
  readonly id: string;
  readonly companyId: string;
  readonly vehicleId: string;
  readonly vehicleName?: string;
  readonly lastStatAt?: Date;
  readonly alertedAt: Date;
  readonly resolvedAt?: Date;
  readonly channelsUsed: NotificationChannel[];
  readonly recipientsNotified: RecipientType[];
  readonly recipients: readonly NotificationRecipient[];
  readonly messageText: string;
}

export type StaleVehicleAlertDraft = Omit<StaleVehicleAlert, 'id' | 'resolvedAt'>;

export type SignalSeverity = 'critical' | 'warning' | 'info';

export type SignalEventState = 'needsReview' | 'needsCoaching' | 'dismissed' | 'coached';

/** Behavior labels arrive either as bare strings or as `{ label }` / `{ name }` objects. */
export type BehaviorLabelEntry =
  | string
  | {
      readonly label?: string;
      readonly name?: string;
      readonly source?: string;
    };

export interface Signal {
  readonly id: string;
  readonly companyId: string;
  /** External event id, unique per company. */
  readonly sourceEventId: string;
  // Soft references: the upstream fleet inventory may lag behind the stream.
  readonly vehicleId?: string;
  readonly vehicleName?: string;
  readonly driverId?: string;
  readonly driverName?: string;
  readonly latitude?: number;
  readonly longitude?: number;
  readonly address?: string;
  readonly primaryBehaviorLabel?: string;
  readonly behaviorLabels: BehaviorLabelEntry[];
  readonly contextLabels: BehaviorLabelEntry[];
  readonly severity: SignalSeverity;
  readonly eventState?: SignalEventState;
  readonly occurredAt: Date;
  readonly sourceUpdatedAt?: Date;
  readonly rawPayload: Record<string, unknown>;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

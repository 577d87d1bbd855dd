export type DomainErrorCode =
  | 'invalid_argument'
  | 'invalid_alert_transition'
  | 'invalid_incident_transition'
  | 'revalidation_limit_reached'
  | 'not_found';

export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends DomainError {
  readonly code = 'invalid_argument' as const;
}

export class NotFoundError extends DomainError {
  readonly code = 'not_found' as const;

  constructor(
    readonly entity: string,
    readonly id: string,
  ) {
    super(`${entity} ${id} not found`);
  }
}

export class AlertTransitionError extends DomainError {
  readonly code = 'invalid_alert_transition' as const;

  constructor(
    readonly alertId: string,
    readonly from: string,
    readonly to: string,
  ) {
    super(`Alert ${alertId} cannot move from ${from} to ${to}`);
  }
}

export class IncidentTransitionError extends DomainError {
  readonly code = 'invalid_incident_transition' as const;

  constructor(
    readonly incidentId: string,
    readonly from: string,
    readonly to: string,
  ) {
    super(`Incident ${incidentId} cannot move from ${from} to ${to}`);
  }
}

export class RevalidationLimitError extends DomainError {
  readonly code = 'revalidation_limit_reached' as const;

  constructor(
    readonly alertId: string,
    readonly maxInvestigations: number,
  ) {
    super(`Alert ${alertId} reached the limit of ${maxInvestigations} investigations`);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled case: ${String(value)}`);
}

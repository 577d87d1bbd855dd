import type { BehaviorLabelEntry, Signal, SignalEventState } from '../entities/signal.js';
import { determineSeverity, extractPrimaryLabel } from './behavior-labels.js';

// ---------------------------------------------------------------------------
// Inbound safety event (already validated at the boundary)
// ---------------------------------------------------------------------------

export interface StreamEventAddress {
  street?: string;
  city?: string;
  state?: string;
  postalCode?: string;
}

export interface StreamEvent {
  id: string;
  asset?: { id?: string; name?: string };
  driver?: { id?: string; name?: string };
  location?: {
    latitude?: number;
    longitude?: number;
    address?: StreamEventAddress;
  };
  behaviorLabels?: BehaviorLabelEntry[];
  contextLabels?: BehaviorLabelEntry[];
  eventState?: SignalEventState;
  /** Epoch ms or ISO-8601. */
  startMs?: number | string;
  createdAtTime?: string;
  updatedAtTime?: string;
  [extra: string]: unknown;
}

export type SignalDraft = Omit<Signal, 'id' | 'createdAt' | 'updatedAt'>;

export function formatAddress(address: StreamEventAddress | undefined): string | undefined {
  if (!address) return undefined;
  const parts = [address.street, address.city, address.state, address.postalCode].filter(
    (p): p is string => typeof p === 'string' && p !== '',
  );
  return parts.length > 0 ? parts.join(', ') : undefined;
}

function parseOccurredAt(event: StreamEvent, now: Date): Date {
  const raw = event.startMs ?? event.createdAtTime;
  if (raw === undefined) return now;
  const parsed = typeof raw === 'number' ? new Date(raw) : new Date(/^\d+$/.test(raw) ? Number(raw) : raw);
  return Number.isNaN(parsed.getTime()) ? now : parsed;
}

function parseOptionalDate(raw: string | undefined): Date | undefined {
  if (raw === undefined) return undefined;
  const parsed = new Date(raw);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

/** Builds a new signal from a stream event; severity is derived from the behavior labels. */
export function buildSignalFromStreamEvent(
  companyId: string,
  event: StreamEvent,
  now: Date,
): SignalDraft {
  const behaviorLabels = event.behaviorLabels ?? [];
  return {
    companyId,
    sourceEventId: event.id,
    vehicleId: event.asset?.id,
    vehicleName: event.asset?.name,
    driverId: event.driver?.id,
    driverName: event.driver?.name,
    latitude: event.location?.latitude,
    longitude: event.location?.longitude,
    address: formatAddress(event.location?.address),
    primaryBehaviorLabel: extractPrimaryLabel(behaviorLabels) ?? undefined,
    behaviorLabels,
    contextLabels: event.contextLabels ?? [],
    severity: determineSeverity(behaviorLabels),
    eventState: event.eventState,
    occurredAt: parseOccurredAt(event, now),
    sourceUpdatedAt: parseOptionalDate(event.updatedAtTime),
    rawPayload: { ...event },
  };
}

/**
 * Applies an upstream update. Absent fields keep their previous value; severity
 * is re-derived from the resulting label set.
 */
export function applyStreamEventUpdate(signal: Signal, event: StreamEvent, now: Date): Signal {
  const incoming = event.behaviorLabels ?? [];
  const contextLabels = event.contextLabels ?? [];
  const behaviorLabels = incoming.length > 0 ? incoming : signal.behaviorLabels;
  return {
    ...signal,
    vehicleId: event.asset?.id ?? signal.vehicleId,
    vehicleName: event.asset?.name ?? signal.vehicleName,
    driverId: event.driver?.id ?? signal.driverId,
    driverName: event.driver?.name ?? signal.driverName,
    latitude: event.location?.latitude ?? signal.latitude,
    longitude: event.location?.longitude ?? signal.longitude,
    address: formatAddress(event.location?.address) ?? signal.address,
    primaryBehaviorLabel: extractPrimaryLabel(incoming) ?? signal.primaryBehaviorLabel,
    behaviorLabels,
    contextLabels: contextLabels.length > 0 ? contextLabels : signal.contextLabels,
    severity: determineSeverity(behaviorLabels),
    eventState: event.eventState ?? signal.eventState,
    sourceUpdatedAt: parseOptionalDate(event.updatedAtTime) ?? now,
    rawPayload: { ...event },
    updatedAt: now,
  };
}

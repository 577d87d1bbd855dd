import type { BehaviorLabelEntry, SignalSeverity } from '../entities/signal.js';
import behaviorLabels from './behavior-labels.json';

export const CANONICAL_BEHAVIOR_LABELS: readonly string[] = behaviorLabels.canonical;

/** Exact-match taxonomy; the raw stream spelling is compared, not the normalized one. */
export const CRITICAL_LABELS: ReadonlySet<string> = new Set(behaviorLabels.critical);
export const WARNING_LABELS: ReadonlySet<string> = new Set(behaviorLabels.warning);

/** Text of a label entry: the string itself, or `label` then `name` of an object entry. */
export function labelValue(entry: BehaviorLabelEntry): string | null {
  if (typeof entry === 'string') return entry;
  return entry.label ?? entry.name ?? null;
}

/**
 * Case-insensitive match against the canonical list (noSeatbelt → NoSeatbelt).
 * Unknown labels pass through unchanged; empty input yields null.
 */
export function normalizeBehaviorLabel(
  label: string | null | undefined,
  canonical: readonly string[] = CANONICAL_BEHAVIOR_LABELS,
): string | null {
  if (label === null || label === undefined || label === '') return null;
  const lower = label.toLowerCase();
  return canonical.find((c) => c.toLowerCase() === lower) ?? label;
}

/** Critical wins over warning regardless of order; no match is info. */
export function determineSeverity(labels: readonly BehaviorLabelEntry[]): SignalSeverity {
  const values = labels.map(labelValue);
  if (values.some((v) => v !== null && CRITICAL_LABELS.has(v))) return 'critical';
  if (values.some((v) => v !== null && WARNING_LABELS.has(v))) return 'warning';
  return 'info';
}

export function extractPrimaryLabel(labels: readonly BehaviorLabelEntry[]): string | null {
  const first = labels[0];
  return first === undefined ? null : labelValue(first);
}

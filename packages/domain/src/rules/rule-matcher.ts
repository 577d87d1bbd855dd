import type { Signal } from '../entities/signal.js';
import type { CompanyConfig, DetectionRule, RuleAction } from '../entities/company-config.js';
import { labelValue, normalizeBehaviorLabel } from '../signals/behavior-labels.js';

type LabelledSignal = Pick<Signal, 'primaryBehaviorLabel' | 'behaviorLabels'>;

/**
 * Primary label followed by every behavior label, normalized against the
 * canonical list. Duplicates are dropped, first occurrence order is kept.
 */
export function getNormalizedLabels(signal: LabelledSignal, canonical: readonly string[]): string[] {
  const raw = [signal.primaryBehaviorLabel ?? null, ...signal.behaviorLabels.map(labelValue)];
  const labels: string[] = [];
  for (const value of raw) {
    const normalized = normalizeBehaviorLabel(value, canonical);
    if (normalized !== null && !labels.includes(normalized)) labels.push(normalized);
  }
  return labels;
}

/**
 * First rule, in declaration order, whose conditions are all present on the
 * signal. Rules without conditions never match.
 */
export function matchRule(signal: LabelledSignal, config: CompanyConfig): DetectionRule | null {
  const { enabled, rules } = config.safetyStreamNotify;
  if (!enabled || rules.length === 0) return null;

  const signalLabels = getNormalizedLabels(signal, config.canonicalLabels);
  if (signalLabels.length === 0) return null;

  for (const rule of rules) {
    if (rule.conditions.length === 0) continue;
    const conditions = rule.conditions.map(
      (c) => normalizeBehaviorLabel(c, config.canonicalLabels) ?? c,
    );
    if (conditions.every((c) => signalLabels.includes(c))) return rule;
  }
  return null;
}

// ─── Stored-format migration ──────────────────────────────────────────────────

/** Deprecated flat `labels` list: one single-condition rule per label. */
export function migrateLegacyNotifyLabels(labels: readonly string[]): DetectionRule[] {
  return labels.map((label) => ({
    id: `migrated-${label.toLowerCase()}`,
    conditions: [label],
    action: 'ai_pipeline',
  }));
}

/** Maps stored action names, including the legacy `notify*` spellings. */
export function parseRuleAction(raw: string | null | undefined): RuleAction {
  switch (raw) {
    case 'immediate_notify':
    case 'notify_immediate':
      return 'immediate_notify';
    case 'both':
      return 'both';
    default:
      return 'ai_pipeline';
  }
}

export function ruleTriggersPipeline(action: RuleAction): boolean {
  return action === 'ai_pipeline' || action === 'both';
}

export function ruleTriggersImmediateNotify(action: RuleAction): boolean {
  return action === 'immediate_notify' || action === 'both';
}

export type HealthState = 'unknown' | 'ok' | 'failed';

/** Matches when every field it sets equals the unit's state. */
export interface FailureRule {
  active?: string;
  sub?: string;
}

/** Rules per unit type; a type without an entry falls back to `default`. */
export interface FailureRuleTable {
  default: readonly FailureRule[];
  [unitType: string]: readonly FailureRule[] | undefined;
}

export const DEFAULT_FAILURE_RULES: FailureRuleTable = {
  default: [{ active: 'failed' }, { active: 'active', sub: 'failed' }],
};

export function buildFailureRules(configured?: Record<string, FailureRule[]>): FailureRuleTable {
  if (!configured) return DEFAULT_FAILURE_RULES;
  return { ...configured, default: configured.default ?? DEFAULT_FAILURE_RULES.default };
}

const ruleMatches = (rule: FailureRule, active: string, sub: string): boolean =>
  (rule.active === undefined || rule.active === active) && (rule.sub === undefined || rule.sub === sub);

export function deriveHealth(unitType: string, active: string, sub: string, rules: FailureRuleTable = DEFAULT_FAILURE_RULES): HealthState {
  const table = rules[unitType] ?? rules.default;
  return table.some(rule => ruleMatches(rule, active, sub)) ? 'failed' : 'ok';
}

export interface Transition {
  health: HealthState;
  notify: boolean;
}

/**
 * Edge detection: only the move into `failed` notifies. Staying failed is
 * silent, and leaving it re-arms the unit for the next failure.
 */
export function transition(prev: HealthState, next: HealthState): Transition {
  return { health: next, notify: next === 'failed' && prev !== 'failed' };
}

export function describeChange(unit: string, active: string, sub: string): string {
  return sub && sub !== active ? `${unit} becomes ${active} (${sub})` : `${unit} becomes ${active}`;
}

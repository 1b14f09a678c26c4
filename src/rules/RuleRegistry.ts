import type { RuleStrategy } from './RuleStrategy';
import { SingleYakumanRule } from './SingleYakumanRule';
import { StandardRule } from './StandardRule';

const RULES: RuleStrategy[] = [new StandardRule(), new SingleYakumanRule()];

export function getRule(id: string | undefined | null): RuleStrategy {
  const key = String(id ?? '').trim().toLowerCase();
  return RULES.find(r => r.id === key) ?? RULES[0]!;
}

export function hasRule(id: string): boolean {
  const key = id.trim().toLowerCase();
  return RULES.some(r => r.id === key);
}

export function listRules(): Array<{ id: string; name: string }> {
  return RULES.map(r => ({ id: r.id, name: r.name }));
}

export function defaultRuleId(): string {
  return RULES[0]!.id;
}

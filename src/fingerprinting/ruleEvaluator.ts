import type { CompiledRule, EventAttributes, FingerprintingConfig } from '../types.js';
import { matchesCompiled } from './matcher.js';

export function ruleMatches(rule: CompiledRule, event: EventAttributes): boolean {
  return rule.matchers.every(matcher => matchesCompiled(matcher, event));
}

/**
 * Linear scan in declaration order; the first rule whose matchers all hold wins.
 * Any future pre-filtering must keep that ordering guarantee.
 */
export function selectRule(config: FingerprintingConfig, event: EventAttributes): CompiledRule | null {
  for (const rule of config.rules) {
    if (ruleMatches(rule, event)) {
      return rule;
    }
  }
  return null;
}

import { describe, expect, it } from 'vitest';
import { buildConfig } from '../src/config/index.js';
import { ruleMatches, selectRule } from '../src/fingerprinting/ruleEvaluator.js';

const config = buildConfig({
  version: 1,
  rules: [
    { matchers: [['type', 'Foo'], ['module', 'a.*']], fingerprint: ['foo-in-a'] },
    { matchers: [['type', 'Foo']], fingerprint: ['foo'] },
    { matchers: [['type', '*']], fingerprint: ['any-type'] }
  ]
});

describe('RuleEvaluatorOrdering', () => {
  it('returns the first rule whose matchers all hold', () => {
    expect(selectRule(config, { type: 'Foo', module: 'a.b' })?.index).toBe(0);
    expect(selectRule(config, { type: 'Foo', module: 'b' })?.index).toBe(1);
    expect(selectRule(config, { type: 'Bar' })?.index).toBe(2);
  });

  it('returns null when no rule matches', () => {
    expect(selectRule(config, { module: 'a.b' })).toBeNull();
    expect(selectRule(buildConfig({ version: 1, rules: [] }), { type: 'Foo' })).toBeNull();
  });

  it('prefers declaration order over specificity', () => {
    const broadFirst = buildConfig({
      version: 1,
      rules: [
        { matchers: [['type', '*']], fingerprint: ['broad'] },
        { matchers: [['type', 'Foo'], ['module', 'a.*']], fingerprint: ['narrow'] }
      ]
    });
    expect(selectRule(broadFirst, { type: 'Foo', module: 'a.b' })?.index).toBe(0);
  });
});

describe('RuleEvaluatorConjunction', () => {
  it('requires every matcher of a rule to hold', () => {
    const [first] = config.rules;
    expect(ruleMatches(first, { type: 'Foo', module: 'a.x' })).toBe(true);
    expect(ruleMatches(first, { type: 'Foo' })).toBe(false);
    expect(ruleMatches(first, { type: 'Bar', module: 'a.x' })).toBe(false);
  });
});

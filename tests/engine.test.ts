import { describe, expect, it, vi } from 'vitest';
import { performance } from 'node:perf_hooks';
import { buildConfig } from '../src/config/index.js';
import {
  FingerprintEngine,
  StaticConfigSource,
  serializeGroupingResult,
  type ConfigSource
} from '../src/fingerprinting/engine.js';
import { MetricsRegistry } from '../src/metrics/index.js';

const RULE_TEXT = 'type:DatabaseUnavailable module:io.sentry.example.* -> database-unavailable {{ function }}';

const config = buildConfig(
  {
    version: 1,
    rules: [
      {
        matchers: [
          ['type', 'DatabaseUnavailable'],
          ['module', 'io.sentry.example.*']
        ],
        fingerprint: ['database-unavailable', '{{ function }}']
      }
    ]
  },
  'inline'
);

function createLog() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function createEngine(options: { defaultFingerprint?: string[] } = {}) {
  const metrics = new MetricsRegistry();
  const log = createLog();
  const engine = new FingerprintEngine(new StaticConfigSource(config), { ...options, metrics, log });
  return { engine, metrics, log };
}

describe('FingerprintEngineMatching', () => {
  it('renders the matched rule and reports the custom fingerprint variant', () => {
    const { engine } = createEngine();
    const result = engine.evaluate({
      type: 'DatabaseUnavailable',
      module: 'io.sentry.example.db',
      function: 'connect'
    });

    expect(result.fingerprint).toEqual(['database-unavailable', 'connect']);
    expect(result.matchedRule).toEqual({ index: 0, text: RULE_TEXT, attributes: {} });
    expect(result.configVersion).toBe(1);

    expect(serializeGroupingResult(result)).toEqual({
      fingerprint: ['database-unavailable', 'connect'],
      variants: {
        app: {
          type: 'component',
          contributes: false,
          contributes_to_similarity: true,
          hint: 'custom fingerprint takes precedence'
        },
        system: {
          type: 'component',
          contributes: false,
          contributes_to_similarity: true,
          hint: 'custom fingerprint takes precedence'
        },
        'custom-fingerprint': {
          type: 'custom-fingerprint',
          values: ['database-unavailable', 'connect'],
          matched_rule: RULE_TEXT
        }
      }
    });
  });

  it('substitutes the fallback for a missing placeholder attribute', () => {
    const { engine, metrics } = createEngine();
    const result = engine.evaluate({ type: 'DatabaseUnavailable', module: 'io.sentry.example.db' });

    expect(result.fingerprint).toEqual(['database-unavailable', '<no-function>']);
    expect(metrics.snapshot().evaluations.fallbackPlaceholders).toEqual({ function: 1 });
  });

  it('does not serialize a contributes key on the custom variant', () => {
    const { engine } = createEngine();
    const serialized = serializeGroupingResult(
      engine.evaluate({ type: 'DatabaseUnavailable', module: 'io.sentry.example.db', function: 'connect' })
    );
    expect(Object.keys(serialized.variants['custom-fingerprint'] ?? {})).toEqual(['type', 'values', 'matched_rule']);
  });
});

describe('FingerprintEngineFixture', () => {
  it('groups the database outage fixture by the custom fingerprint', () => {
    const { engine } = createEngine();
    const result = engine.evaluate({ type: 'DatabaseUnavailable', module: 'io.sentry.example.Foo' });

    expect(result.fingerprint).toEqual(['database-unavailable', '<no-function>']);
    expect(result.variants['custom-fingerprint']).toEqual({
      type: 'custom-fingerprint',
      contributes: true,
      values: ['database-unavailable', '<no-function>'],
      matchedRule: RULE_TEXT
    });
    for (const name of ['app', 'system']) {
      expect(result.variants[name]).toEqual({
        type: 'component',
        contributes: false,
        contributesToSimilarity: true,
        hint: 'custom fingerprint takes precedence'
      });
    }
  });

  it('leaves other modules to the default grouping', () => {
    const { engine } = createEngine();
    const result = engine.evaluate({ type: 'DatabaseUnavailable', module: 'io.sentry.other.Foo' });

    expect(result.matchedRule).toBeNull();
    expect(Object.keys(result.variants)).toEqual(['app', 'system']);
  });

  it('produces identical output for repeated evaluations', () => {
    const { engine } = createEngine();
    const event = { type: 'DatabaseUnavailable', module: 'io.sentry.example.Foo', function: 'connect' };
    expect(JSON.stringify(serializeGroupingResult(engine.evaluate(event)))).toBe(
      JSON.stringify(serializeGroupingResult(engine.evaluate(event)))
    );
  });
});

describe('FingerprintEngineBoundedCost', () => {
  it('evaluates a many-wildcard rule against a near-miss message promptly', () => {
    const wildcardConfig = buildConfig({
      version: 1,
      rules: [{ matchers: [['message', '*a*a*a*a*a*a*a*a*a*a*a*b']], fingerprint: ['many-a'] }]
    });
    const engine = new FingerprintEngine(new StaticConfigSource(wildcardConfig), {
      metrics: new MetricsRegistry(),
      log: createLog()
    });

    const started = performance.now();
    const result = engine.evaluate({ message: 'a'.repeat(40) });

    expect(performance.now() - started).toBeLessThan(1000);
    expect(result.matchedRule).toBeNull();
  });
});

describe('FingerprintEngineDefaults', () => {
  it('returns the default fingerprint unchanged when nothing matches', () => {
    const { engine } = createEngine();
    const result = engine.evaluate({ type: 'DatabaseUnavailable', module: 'com.other' });

    expect(result.fingerprint).toEqual(['{{ default }}']);
    expect(result.matchedRule).toBeNull();
    expect(serializeGroupingResult(result)).toEqual({
      fingerprint: ['{{ default }}'],
      variants: {
        app: { type: 'component', contributes: true, contributes_to_similarity: true },
        system: { type: 'component', contributes: true, contributes_to_similarity: true }
      }
    });
    expect('hint' in (serializeGroupingResult(result).variants.app ?? {})).toBe(false);
  });

  it('uses a configured default fingerprint', () => {
    const { engine } = createEngine({ defaultFingerprint: ['{{ default }}', 'unclassified'] });
    expect(engine.evaluate({}).fingerprint).toEqual(['{{ default }}', 'unclassified']);
  });

  it('hands out a fresh default array on every call', () => {
    const { engine } = createEngine();
    const first = engine.evaluate({});
    first.fingerprint.push('mutated');
    expect(engine.evaluate({}).fingerprint).toEqual(['{{ default }}']);
  });
});

describe('FingerprintEngineObservability', () => {
  it('reads the config source once per evaluation', () => {
    const getConfig = vi.fn(() => config);
    const source: ConfigSource = { getConfig };
    const engine = new FingerprintEngine(source, { metrics: new MetricsRegistry(), log: createLog() });

    engine.evaluate({ type: 'DatabaseUnavailable', module: 'io.sentry.example.db' });
    expect(getConfig).toHaveBeenCalledTimes(1);
  });

  it('records matched and unmatched evaluations', () => {
    const { engine, metrics } = createEngine();
    engine.evaluate({ type: 'DatabaseUnavailable', module: 'io.sentry.example.db', function: 'connect' });
    engine.evaluate({ type: 'Other' });

    const snapshot = metrics.snapshot();
    expect(snapshot.evaluations.total).toBe(2);
    expect(snapshot.evaluations.matched).toBe(1);
    expect(snapshot.evaluations.unmatched).toBe(1);
    expect(snapshot.evaluations.byRule).toEqual({ '0': 1 });
    expect(snapshot.evaluations.lastMatchedRule).toBe(0);
    expect(snapshot.latencies.evaluation?.count).toBe(2);
  });

  it('logs the outcome at debug', () => {
    const { engine, log } = createEngine();
    engine.evaluate({ type: 'DatabaseUnavailable', module: 'io.sentry.example.db', function: 'connect' });
    engine.evaluate({ type: 'Other' });

    expect(log.debug).toHaveBeenNthCalledWith(
      1,
      { ruleIndex: 0, fingerprint: ['database-unavailable', 'connect'], configVersion: 1 },
      'Custom fingerprint rule matched'
    );
    expect(log.debug).toHaveBeenNthCalledWith(
      2,
      { ruleIndex: null, fingerprint: ['{{ default }}'], configVersion: 1 },
      'No fingerprint rule matched'
    );
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ConfigManager, type ConfigReloadEvent } from '../src/config/index.js';
import { ConfigValidationError } from '../src/fingerprinting/errors.js';
import { FingerprintEngine } from '../src/fingerprinting/engine.js';
import { MetricsRegistry } from '../src/metrics/index.js';

function createLog() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function rulesFor(token: string) {
  return { version: 1, rules: [{ matchers: [['type', 'Foo']], fingerprint: [token] }] };
}

async function waitFor(predicate: () => boolean, timeout = 2000) {
  const start = Date.now();
  while (Date.now() - start < timeout) {
    if (predicate()) {
      return;
    }
    await new Promise(resolve => setTimeout(resolve, 20));
  }
  throw new Error('Timed out waiting for condition');
}

describe('ConfigHotReload', () => {
  let tempDir: string;
  let configPath: string;
  let metrics: MetricsRegistry;
  let log: ReturnType<typeof createLog>;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fingerprinting-reload-'));
    configPath = path.join(tempDir, 'fingerprinting.json');
    fs.writeFileSync(configPath, JSON.stringify(rulesFor('first')));
    metrics = new MetricsRegistry();
    log = createLog();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('loads the file at construction and records the active config', () => {
    const manager = new ConfigManager(configPath, { log, metrics });

    expect(manager.getPath()).toBe(path.resolve(configPath));
    expect(manager.getConfig().source).toBe(path.resolve(configPath));
    expect(manager.getConfig().rules).toHaveLength(1);
    expect(metrics.snapshot().config).toMatchObject({
      version: 1,
      ruleCount: 1,
      source: path.resolve(configPath),
      reloads: 0,
      reloadFailures: 0
    });
  });

  it('throws at construction when the file is invalid', () => {
    fs.writeFileSync(configPath, JSON.stringify({ version: 3, rules: [] }));
    expect(() => new ConfigManager(configPath, { log, metrics })).toThrow(ConfigValidationError);
  });

  it('swaps the snapshot on reload and emits previous and next', () => {
    const manager = new ConfigManager(configPath, { log, metrics });
    const engine = new FingerprintEngine(manager, { metrics, log });
    const before = manager.getConfig();
    const events: ConfigReloadEvent[] = [];
    manager.on('reload', (event: ConfigReloadEvent) => {
      events.push(event);
    });

    expect(engine.evaluate({ type: 'Foo' }).fingerprint).toEqual(['first']);

    fs.writeFileSync(configPath, JSON.stringify(rulesFor('second')));
    const next = manager.reload();

    expect(manager.getConfig()).toBe(next);
    expect(events).toHaveLength(1);
    expect(events[0].previous).toBe(before);
    expect(events[0].next).toBe(next);
    expect(engine.evaluate({ type: 'Foo' }).fingerprint).toEqual(['second']);
    expect(before.rules[0].text).toBe('type:Foo -> first');
    expect(metrics.snapshot().config.reloads).toBe(1);
    expect(log.info).toHaveBeenCalledWith(
      { version: 1, rules: 1, previousRules: 1 },
      'Fingerprinting config reloaded'
    );
  });

  it('keeps the previous snapshot when a reload is rejected', () => {
    const manager = new ConfigManager(configPath, { log, metrics });
    const before = manager.getConfig();
    const onReload = vi.fn();
    manager.on('reload', onReload);

    fs.writeFileSync(configPath, JSON.stringify({ version: 1, rules: [{ matchers: [['type', 'a\\q']], fingerprint: ['x'] }] }));

    expect(() => manager.reload()).toThrow(ConfigValidationError);
    expect(manager.getConfig()).toBe(before);
    expect(onReload).not.toHaveBeenCalled();
    expect(metrics.snapshot().config).toMatchObject({
      reloads: 0,
      reloadFailures: 1,
      lastReloadError: 'config.rules[0].matchers[0] invalid pattern "a\\q": unsupported escape "\\q"'
    });
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ source: path.resolve(configPath) }),
      'Fingerprinting config rejected; keeping previous rules'
    );
  });

  it('applies in-memory configs and clears the last error on success', () => {
    const manager = new ConfigManager(configPath, { log, metrics });

    expect(() => manager.apply({ version: 1, rules: [{ matchers: [], fingerprint: ['x'] }] })).toThrow(
      'config.rules[0].matchers must define at least one matcher'
    );
    expect(metrics.snapshot().config.lastReloadError).toBe('config.rules[0].matchers must define at least one matcher');
    expect(log.error).toHaveBeenLastCalledWith(
      expect.objectContaining({ source: null }),
      'Fingerprinting config rejected; keeping previous rules'
    );
    expect(() => manager.apply({ version: 2, rules: [] }, 'inline')).toThrow('config.version must be one of 1');
    expect(log.error).toHaveBeenLastCalledWith(
      expect.objectContaining({ source: 'inline' }),
      'Fingerprinting config rejected; keeping previous rules'
    );

    const applied = manager.apply(
      {
        version: 1,
        rules: [
          { matchers: [['type', 'Foo']], fingerprint: ['one'] },
          { matchers: [['type', 'Bar']], fingerprint: ['two'] }
        ]
      },
      'inline'
    );

    expect(manager.getConfig()).toBe(applied);
    expect(applied.source).toBe('inline');
    expect(metrics.snapshot().config).toMatchObject({
      version: 1,
      ruleCount: 2,
      source: 'inline',
      reloads: 1,
      reloadFailures: 2,
      lastReloadError: null
    });
  });

  it('logs warnings for rules on unknown attributes', () => {
    fs.writeFileSync(
      configPath,
      JSON.stringify({ version: 1, rules: [{ matchers: [['stacktrace', '*']], fingerprint: ['x'] }] })
    );
    new ConfigManager(configPath, { log, metrics });

    expect(log.warn).toHaveBeenCalledWith({ ruleIndex: 0 }, 'matcher on unknown attribute "stacktrace" never matches');
  });

  it('reloads watched files and reports rejected changes as errors', async () => {
    const manager = new ConfigManager(configPath, { log, metrics, debounceMs: 10 });
    const errors: Error[] = [];
    manager.on('error', (error: Error) => {
      errors.push(error);
    });
    const unwatch = manager.watch();

    try {
      fs.writeFileSync(configPath, JSON.stringify(rulesFor('watched')));
      await waitFor(() => manager.getConfig().rules[0].text === 'type:Foo -> watched');

      const accepted = manager.getConfig();
      fs.writeFileSync(configPath, '{ "version": 1, "rules": [');
      await waitFor(() => errors.length > 0);

      expect(errors[0]).toBeInstanceOf(ConfigValidationError);
      expect(manager.getConfig()).toBe(accepted);
    } finally {
      unwatch();
    }
  });

  it('keeps watching after the file is deleted and picks up its replacement', async () => {
    const manager = new ConfigManager(configPath, { log, metrics, debounceMs: 10, watchRetryMs: 20 });
    const errors: Error[] = [];
    manager.on('error', (error: Error) => {
      errors.push(error);
    });
    const unwatch = manager.watch();
    const before = manager.getConfig();

    try {
      fs.unlinkSync(configPath);
      await waitFor(() =>
        log.warn.mock.calls.some(call => call[1] === 'Fingerprinting config watch lost; retrying')
      );
      await waitFor(() => errors.length > 0);
      expect(manager.getConfig()).toBe(before);

      fs.writeFileSync(configPath, JSON.stringify(rulesFor('restored')));
      await waitFor(() => manager.getConfig().rules[0].text === 'type:Foo -> restored');
      expect(manager.getConfig().source).toBe(path.resolve(configPath));
    } finally {
      unwatch();
    }
  });

  it('stops retrying a lost watch once every caller unwatches', async () => {
    const manager = new ConfigManager(configPath, { log, metrics, debounceMs: 10, watchRetryMs: 20 });
    const unwatch = manager.watch();

    fs.unlinkSync(configPath);
    await waitFor(() => log.warn.mock.calls.length > 0);
    unwatch();
    const warnings = log.warn.mock.calls.length;

    await new Promise(resolve => setTimeout(resolve, 100));
    expect(log.warn.mock.calls.length).toBe(warnings);
  });

  it('shares one watcher between callers', () => {
    const manager = new ConfigManager(configPath, { log, metrics });
    const watchSpy = vi.spyOn(fs, 'watch');

    const first = manager.watch();
    const second = manager.watch();
    expect(watchSpy).toHaveBeenCalledTimes(1);

    first();
    second();
    watchSpy.mockRestore();
  });
});

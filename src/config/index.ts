import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import logger, { type LogSink } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import {
  isAttributeName,
  type CompiledRule,
  type FingerprintingConfig,
  type RawFingerprintRule,
  type RawFingerprintingConfig
} from '../types.js';
import { ConfigValidationError, TemplateSyntaxError, type ConfigIssue } from '../fingerprinting/errors.js';
import { compileMatcher, validatePattern } from '../fingerprinting/matcher.js';
import { parseTemplate, parseTemplateToken } from '../fingerprinting/template.js';
import type { ConfigSource } from '../fingerprinting/engine.js';
import { describeRule, parseRulesText } from './rulesText.js';

export const SUPPORTED_CONFIG_VERSIONS: readonly number[] = [1];

export type ConfigFormat = 'json' | 'text';

export type ConfigWarning = {
  ruleIndex: number;
  message: string;
};

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  minItems?: number;
  maxItems?: number;
};

type SchemaIssue = { path: string; message: string };

const matcherSchema: JsonSchema = {
  type: 'array',
  minItems: 2,
  maxItems: 2,
  items: { type: 'string' }
};

const fingerprintingConfigSchema: JsonSchema = {
  type: 'object',
  required: ['version', 'rules'],
  additionalProperties: false,
  properties: {
    version: { type: 'number', minimum: 1 },
    rules: {
      type: 'array',
      items: {
        type: 'object',
        required: ['matchers', 'fingerprint'],
        additionalProperties: false,
        properties: {
          matchers: {
            type: 'array',
            items: matcherSchema
          },
          fingerprint: {
            type: 'array',
            items: { type: 'string' }
          },
          attributes: {
            type: 'object',
            additionalProperties: { type: 'string' }
          }
        }
      }
    }
  }
};

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): SchemaIssue[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): SchemaIssue[] {
  const errors: SchemaIssue[] = [];

  if (type === 'object') {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      errors.push({ path: pathLabel, message: 'must be an object' });
      return errors;
    }

    const obj: Record<string, unknown> = { ...value };
    for (const key of schema.required ?? []) {
      if (!(key in obj)) {
        errors.push({ path: `${pathLabel}.${key}`, message: 'is required' });
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    if (schema.additionalProperties === false) {
      for (const key of Object.keys(obj)) {
        if (!definedProperties.has(key)) {
          errors.push({ path: `${pathLabel}.${key}`, message: 'is not allowed' });
        }
      }
    } else if (schema.additionalProperties && typeof schema.additionalProperties === 'object') {
      for (const key of Object.keys(obj)) {
        if (definedProperties.has(key)) {
          continue;
        }
        errors.push(...validateAgainstSchema(schema.additionalProperties, obj[key], `${pathLabel}.${key}`));
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in obj)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, obj[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push({ path: pathLabel, message: 'must be an array' });
      return errors;
    }

    if (typeof schema.minItems === 'number' && value.length < schema.minItems) {
      errors.push({ path: pathLabel, message: `must contain at least ${schema.minItems} items` });
    }
    if (typeof schema.maxItems === 'number' && value.length > schema.maxItems) {
      errors.push({ path: pathLabel, message: `must contain at most ${schema.maxItems} items` });
    }

    const itemSchema = schema.items;
    if (itemSchema) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(itemSchema, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push({ path: pathLabel, message: 'must be a number' });
      return errors;
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push({ path: pathLabel, message: `must be >= ${schema.minimum}` });
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push({ path: pathLabel, message: `must be one of ${schema.enum.join(', ')}` });
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push({ path: pathLabel, message: 'must be a string' });
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push({ path: pathLabel, message: `must be one of ${schema.enum.join(', ')}` });
    }

    return errors;
  }

  if (type === 'boolean' && typeof value !== 'boolean') {
    errors.push({ path: pathLabel, message: 'must be a boolean' });
  }

  return errors;
}

const RULE_PATH = /^config\.rules\[(\d+)\]/;

function toIssue(issue: SchemaIssue): ConfigIssue {
  const match = RULE_PATH.exec(issue.path);
  return { ...issue, ruleIndex: match ? Number(match[1]) : null };
}

function validateLogicalConfig(config: RawFingerprintingConfig) {
  const issues: ConfigIssue[] = [];

  if (!Number.isInteger(config.version) || !SUPPORTED_CONFIG_VERSIONS.includes(config.version)) {
    issues.push({
      path: 'config.version',
      message: `must be one of ${SUPPORTED_CONFIG_VERSIONS.join(', ')}`,
      ruleIndex: null
    });
  }

  config.rules.forEach((rule, ruleIndex) => {
    const label = `config.rules[${ruleIndex}]`;

    if (rule.matchers.length === 0) {
      issues.push({ path: `${label}.matchers`, message: 'must define at least one matcher', ruleIndex });
    }
    rule.matchers.forEach(([, pattern], matcherIndex) => {
      const problem = validatePattern(pattern);
      if (problem) {
        issues.push({ path: `${label}.matchers[${matcherIndex}]`, message: problem, ruleIndex });
      }
    });

    if (rule.fingerprint.length === 0) {
      issues.push({ path: `${label}.fingerprint`, message: 'must define at least one token', ruleIndex });
    }
    rule.fingerprint.forEach((token, tokenIndex) => {
      try {
        parseTemplateToken(token);
      } catch (error) {
        if (!(error instanceof TemplateSyntaxError)) {
          throw error;
        }
        issues.push({ path: `${label}.fingerprint[${tokenIndex}]`, message: error.message, ruleIndex });
      }
    });
  });

  if (issues.length > 0) {
    throw new ConfigValidationError(issues);
  }
}

export function validateConfig(config: unknown): asserts config is RawFingerprintingConfig {
  const issues = validateAgainstSchema(fingerprintingConfigSchema, config, 'config');
  if (issues.length > 0) {
    throw new ConfigValidationError(issues.map(toIssue));
  }
  validateLogicalConfig(config as RawFingerprintingConfig);
}

function compileRule(rule: RawFingerprintRule, index: number): CompiledRule {
  return Object.freeze({
    index,
    matchers: Object.freeze(rule.matchers.map(matcher => Object.freeze(compileMatcher(matcher)))),
    fingerprint: Object.freeze(parseTemplate(rule.fingerprint).map(token => Object.freeze(token))),
    attributes: Object.freeze({ ...(rule.attributes ?? {}) }),
    text: describeRule(rule)
  });
}

/**
 * Validates raw input and compiles it into an immutable snapshot. Either every
 * rule compiles or a {@link ConfigValidationError} is thrown; nothing partial escapes.
 */
export function buildConfig(raw: unknown, source: string | null = null): FingerprintingConfig {
  validateConfig(raw);
  return Object.freeze({
    version: raw.version,
    rules: Object.freeze(raw.rules.map((rule, index) => compileRule(rule, index))),
    source
  });
}

export function collectConfigWarnings(config: FingerprintingConfig): ConfigWarning[] {
  const warnings: ConfigWarning[] = [];
  for (const rule of config.rules) {
    for (const matcher of rule.matchers) {
      if (!isAttributeName(matcher.attribute)) {
        warnings.push({
          ruleIndex: rule.index,
          message: `matcher on unknown attribute "${matcher.attribute}" never matches`
        });
      }
    }
    for (const token of rule.fingerprint) {
      if (token.kind === 'placeholder' && !isAttributeName(token.name)) {
        warnings.push({
          ruleIndex: rule.index,
          message: `placeholder "${token.name}" is not a known attribute and always renders its fallback`
        });
      }
    }
  }
  return warnings;
}

export function detectConfigFormat(filePath: string): ConfigFormat {
  return path.extname(filePath).toLowerCase() === '.json' ? 'json' : 'text';
}

export function readRawConfig(contents: string, format: ConfigFormat): unknown {
  if (format === 'text') {
    return parseRulesText(contents);
  }
  try {
    return JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError([
      { path: 'config', message: `could not be parsed: ${message}`, ruleIndex: null }
    ]);
  }
}

export function parseConfig(
  contents: string,
  format: ConfigFormat = 'json',
  source: string | null = null
): FingerprintingConfig {
  return buildConfig(readRawConfig(contents, format), source);
}

export function loadConfigFromFile(filePath: string): FingerprintingConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents, detectConfigFormat(resolvedPath), resolvedPath);
}

export type ConfigReloadEvent = {
  previous: FingerprintingConfig;
  next: FingerprintingConfig;
};

export type ConfigManagerOptions = {
  log?: LogSink;
  metrics?: MetricsRegistry;
  debounceMs?: number;
  watchRetryMs?: number;
  persistentWatch?: boolean;
};

/**
 * Owns the active snapshot. Readers call {@link ConfigManager.getConfig} once per
 * evaluation; a reload builds the next snapshot completely and then replaces the
 * reference in a single assignment.
 */
export class ConfigManager extends EventEmitter implements ConfigSource {
  private currentConfig: FingerprintingConfig;
  private readonly filePath: string;
  private readonly log: LogSink;
  private readonly metrics: MetricsRegistry;
  private readonly debounceMs: number;
  private readonly watchRetryMs: number;
  private readonly persistentWatch: boolean;
  private watcher: fs.FSWatcher | null = null;
  private watchRefs = 0;
  private reloadTimer: NodeJS.Timeout | null = null;
  private watchRetryTimer: NodeJS.Timeout | null = null;

  constructor(filePath: string, options: ConfigManagerOptions = {}) {
    super();
    this.filePath = path.resolve(filePath);
    this.log = options.log ?? logger;
    this.metrics = options.metrics ?? metrics;
    this.debounceMs = options.debounceMs ?? 100;
    this.watchRetryMs = options.watchRetryMs ?? 1000;
    this.persistentWatch = options.persistentWatch ?? false;
    this.currentConfig = loadConfigFromFile(this.filePath);
    this.metrics.recordConfigLoad({
      version: this.currentConfig.version,
      ruleCount: this.currentConfig.rules.length,
      source: this.currentConfig.source
    });
    this.logWarnings(this.currentConfig);
  }

  getConfig(): FingerprintingConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): FingerprintingConfig {
    return this.activate(() => loadConfigFromFile(this.filePath), this.filePath);
  }

  apply(raw: unknown, source: string | null = null): FingerprintingConfig {
    return this.activate(() => buildConfig(raw, source), source);
  }

  isWatching() {
    return this.watchRefs > 0;
  }

  watch(): () => void {
    if (!this.watcher && !this.watchRetryTimer) {
      this.watcher = this.createWatcher();
    }

    this.watchRefs += 1;

    return () => {
      this.watchRefs = Math.max(0, this.watchRefs - 1);
      if (this.watchRefs === 0) {
        if (this.reloadTimer) {
          clearTimeout(this.reloadTimer);
          this.reloadTimer = null;
        }
        if (this.watchRetryTimer) {
          clearTimeout(this.watchRetryTimer);
          this.watchRetryTimer = null;
        }
        this.closeWatcher();
      }
    };
  }

  private activate(build: () => FingerprintingConfig, source: string | null): FingerprintingConfig {
    let next: FingerprintingConfig;
    try {
      next = build();
    } catch (error) {
      this.metrics.recordConfigReload({ status: 'failure', error });
      this.log.error({ err: error, source }, 'Fingerprinting config rejected; keeping previous rules');
      throw error;
    }

    const previous = this.currentConfig;
    this.currentConfig = next;
    this.metrics.recordConfigReload({
      status: 'success',
      version: next.version,
      ruleCount: next.rules.length,
      source: next.source
    });
    this.log.info(
      { version: next.version, rules: next.rules.length, previousRules: previous.rules.length },
      'Fingerprinting config reloaded'
    );
    this.logWarnings(next);
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }

  private logWarnings(config: FingerprintingConfig) {
    for (const warning of collectConfigWarnings(config)) {
      this.log.warn({ ruleIndex: warning.ruleIndex }, warning.message);
    }
  }

  private scheduleReload() {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }

    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      try {
        this.reload();
      } catch (error) {
        this.emitError(error);
      }
    }, this.debounceMs);
  }

  private emitError(error: unknown) {
    const err = error instanceof Error ? error : new Error(String(error));
    if (this.listenerCount('error') > 0) {
      this.emit('error', err);
    }
  }

  private recreateWatcher(): boolean {
    this.closeWatcher();
    try {
      this.watcher = this.createWatcher();
      return true;
    } catch (error) {
      this.log.warn(
        { err: error, path: this.filePath, retryMs: this.watchRetryMs },
        'Fingerprinting config watch lost; retrying'
      );
      this.emitError(error);
      this.scheduleWatchRetry();
      return false;
    }
  }

  private scheduleWatchRetry() {
    if (this.watchRetryTimer || this.watchRefs === 0) {
      return;
    }
    this.watchRetryTimer = setTimeout(() => {
      this.watchRetryTimer = null;
      if (this.watchRefs === 0 || this.watcher) {
        return;
      }
      if (this.recreateWatcher()) {
        // the file may have been replaced while unwatched
        this.scheduleReload();
      }
    }, this.watchRetryMs);
    if (!this.persistentWatch) {
      this.watchRetryTimer.unref();
    }
  }

  private closeWatcher() {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
  }

  private createWatcher() {
    const watcher = fs.watch(this.filePath, { persistent: this.persistentWatch }, eventType => {
      if (eventType === 'rename') {
        this.recreateWatcher();
      }
      this.scheduleReload();
    });
    watcher.on('error', error => {
      if (this.watcher === watcher) {
        this.recreateWatcher();
      }
      this.emitError(error);
    });
    return watcher;
  }
}

export { fingerprintingConfigSchema };

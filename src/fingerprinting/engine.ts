import { performance } from 'node:perf_hooks';
import logger, { type LogSink } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type {
  EventAttributes,
  FingerprintingConfig,
  GroupingResult,
  GroupingVariant
} from '../types.js';
import { selectRule } from './ruleEvaluator.js';
import { missingPlaceholders, renderFingerprint } from './template.js';
import { buildVariants } from './variantBuilder.js';

export interface ConfigSource {
  getConfig(): FingerprintingConfig;
}

export class StaticConfigSource implements ConfigSource {
  constructor(private readonly config: FingerprintingConfig) {}

  getConfig(): FingerprintingConfig {
    return this.config;
  }
}

export type FingerprintEngineOptions = {
  defaultFingerprint?: readonly string[];
  metrics?: MetricsRegistry;
  log?: LogSink;
};

export const DEFAULT_FINGERPRINT_VALUES: readonly string[] = ['{{ default }}'];

export class FingerprintEngine {
  private readonly defaultFingerprint: readonly string[];
  private readonly metrics: MetricsRegistry;
  private readonly log: LogSink;

  constructor(private readonly source: ConfigSource, options: FingerprintEngineOptions = {}) {
    this.defaultFingerprint = [...(options.defaultFingerprint ?? DEFAULT_FINGERPRINT_VALUES)];
    this.metrics = options.metrics ?? metrics;
    this.log = options.log ?? logger;
  }

  evaluate(event: EventAttributes): GroupingResult {
    const start = performance.now();
    // one read per evaluation so a concurrent reload cannot mix rule sets
    const config = this.source.getConfig();
    const rule = selectRule(config, event);

    const fingerprint = rule ? renderFingerprint(rule.fingerprint, event) : [...this.defaultFingerprint];
    const missing = rule ? missingPlaceholders(rule.fingerprint, event) : [];
    const variants = buildVariants(rule, fingerprint);

    this.metrics.recordEvaluation({
      ruleIndex: rule ? rule.index : null,
      missingPlaceholders: missing,
      durationMs: performance.now() - start
    });
    this.log.debug(
      { ruleIndex: rule ? rule.index : null, fingerprint, configVersion: config.version },
      rule ? 'Custom fingerprint rule matched' : 'No fingerprint rule matched'
    );

    return {
      fingerprint,
      variants,
      matchedRule: rule ? { index: rule.index, text: rule.text, attributes: rule.attributes } : null,
      configVersion: config.version
    };
  }
}

type SerializedComponentVariant = {
  type: 'component';
  contributes: boolean;
  contributes_to_similarity: boolean;
  hint?: string;
};

type SerializedCustomFingerprintVariant = {
  type: 'custom-fingerprint';
  values: string[];
  matched_rule: string;
};

export type SerializedVariant = SerializedComponentVariant | SerializedCustomFingerprintVariant;

export type SerializedGroupingResult = {
  fingerprint: string[];
  variants: Record<string, SerializedVariant>;
};

function serializeVariant(variant: GroupingVariant): SerializedVariant {
  if (variant.type === 'custom-fingerprint') {
    return { type: variant.type, values: [...variant.values], matched_rule: variant.matchedRule };
  }
  const serialized: SerializedComponentVariant = {
    type: variant.type,
    contributes: variant.contributes,
    contributes_to_similarity: variant.contributesToSimilarity
  };
  if (typeof variant.hint === 'string') {
    serialized.hint = variant.hint;
  }
  return serialized;
}

/** Output boundary shape handed to the grouping/storage collaborator. */
export function serializeGroupingResult(result: GroupingResult): SerializedGroupingResult {
  const variants: Record<string, SerializedVariant> = {};
  for (const [name, variant] of Object.entries(result.variants)) {
    variants[name] = serializeVariant(variant);
  }
  return { fingerprint: [...result.fingerprint], variants };
}

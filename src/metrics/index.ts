import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import pino from 'pino';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type HistogramSnapshot = Record<string, number>;

type HistogramConfig = {
  buckets: number[];
  format: (bucket: number, previous?: number) => string;
};

type PrometheusHistogramOptions = {
  metricName?: string;
  help?: string;
  labels?: Record<string, string>;
};

type PrometheusGaugeOptions = {
  metricName?: string;
  help?: string;
  labels?: Record<string, string>;
};

type PrometheusGaugeSample = {
  value: number;
  labels?: Record<string, string>;
  sortKey?: number | string;
};

type PrometheusEvaluationOptions = {
  evaluationMetricName?: string;
  ruleMetricName?: string;
  fallbackMetricName?: string;
  reloadMetricName?: string;
  labels?: Record<string, string>;
};

type EvaluationMetric = {
  ruleIndex: number | null;
  missingPlaceholders: string[];
  durationMs: number;
};

type ConfigLoadMetric = {
  version: number;
  ruleCount: number;
  source: string | null;
};

type ConfigReloadMetric =
  | ({ status: 'success' } & ConfigLoadMetric)
  | { status: 'failure'; error: unknown };

type EvaluationSnapshot = {
  total: number;
  matched: number;
  unmatched: number;
  byRule: CounterMap;
  fallbackPlaceholders: CounterMap;
  lastMatchedRule: number | null;
  lastEvaluatedAt: string | null;
};

type ConfigSnapshot = {
  version: number | null;
  ruleCount: number;
  source: string | null;
  reloads: number;
  reloadFailures: number;
  lastReloadAt: string | null;
  lastReloadError: string | null;
};

type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: CounterMap;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  evaluations: EvaluationSnapshot;
  config: ConfigSnapshot;
  latencies: Record<string, LatencyStats>;
  histograms: Record<string, HistogramSnapshot>;
};

function formatBucketValue(value: number) {
  return Number.isInteger(value) ? `${value}` : value.toFixed(2).replace(/0+$/, '').replace(/\.$/, '');
}

const EVALUATION_DURATION_HISTOGRAM: HistogramConfig = {
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  format: (bucket, previous) => {
    if (typeof previous === 'undefined') {
      return `<${formatBucketValue(bucket)}`;
    }
    const lower = formatBucketValue(previous);
    const upper = formatBucketValue(bucket);
    return previous === bucket ? upper : `${lower}-${upper}`;
  }
};

const PINO_LEVEL_ORDER = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
const LOG_LEVEL_BUCKETS = PINO_LEVEL_ORDER.map(level => (pino.levels.values[level] ?? 0) + 1);
const LOG_LEVEL_HISTOGRAM: HistogramConfig = {
  buckets: LOG_LEVEL_BUCKETS,
  format: bucket => {
    const index = LOG_LEVEL_BUCKETS.indexOf(bucket);
    return index >= 0 ? PINO_LEVEL_ORDER[index] : 'fatal+';
  }
};

const EVALUATION_LATENCY_METRIC = 'evaluation';
const EVALUATION_HISTOGRAM_METRIC = 'evaluation.duration';

class MetricsRegistry {
  private readonly resetEmitter = new EventEmitter();
  private readonly logLevelCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastLogLevelChangeAt: number | null = null;
  private readonly logLevelChangeCounters = new Map<string, number>();
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private readonly latencyStats = new Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>();
  private readonly histograms = new Map<string, Map<string, number>>();
  private readonly histogramStats = new Map<string, { sum: number; count: number }>();
  private readonly histogramConfigs = new Map<string, HistogramConfig>();
  private readonly reservedHistograms: Array<{ metric: string; config: HistogramConfig }> = [];
  private evaluationsTotal = 0;
  private evaluationsMatched = 0;
  private readonly ruleHits = new Map<string, number>();
  private readonly fallbackPlaceholders = new Map<string, number>();
  private lastMatchedRule: number | null = null;
  private lastEvaluationAt: number | null = null;
  private configVersion: number | null = null;
  private configRuleCount = 0;
  private configSource: string | null = null;
  private configReloads = 0;
  private configReloadFailures = 0;
  private lastConfigReloadAt: number | null = null;
  private lastConfigReloadError: string | null = null;

  constructor() {
    this.registerReservedHistogram('logs.level', LOG_LEVEL_HISTOGRAM);
    this.registerReservedHistogram(EVALUATION_HISTOGRAM_METRIC, EVALUATION_DURATION_HISTOGRAM);
  }

  reset() {
    this.logLevelCounters.clear();
    this.logLevelChangeCounters.clear();
    this.currentLogLevel = 'info';
    this.lastLogLevelChangeAt = null;
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.latencyStats.clear();
    this.histograms.clear();
    this.histogramStats.clear();
    this.histogramConfigs.clear();
    this.restoreReservedHistograms();
    this.evaluationsTotal = 0;
    this.evaluationsMatched = 0;
    this.ruleHits.clear();
    this.fallbackPlaceholders.clear();
    this.lastMatchedRule = null;
    this.lastEvaluationAt = null;
    this.configVersion = null;
    this.configRuleCount = 0;
    this.configSource = null;
    this.configReloads = 0;
    this.configReloadFailures = 0;
    this.lastConfigReloadAt = null;
    this.lastConfigReloadError = null;
    this.resetEmitter.emit('reset');
  }

  onReset(listener: () => void) {
    this.resetEmitter.on('reset', listener);
    return () => {
      this.resetEmitter.off('reset', listener);
    };
  }

  private registerReservedHistogram(metric: string, config: HistogramConfig) {
    this.reservedHistograms.push({ metric, config });
    this.ensureHistogram(metric, config);
  }

  private restoreReservedHistograms() {
    for (const entry of this.reservedHistograms) {
      this.ensureHistogram(entry.metric, entry.config);
    }
  }

  private ensureHistogram(metric: string, config: HistogramConfig) {
    const histogram = this.histograms.get(metric);
    if (histogram) {
      if (this.histogramConfigs.get(metric) !== config) {
        this.histogramConfigs.set(metric, config);
      }
      return histogram;
    }
    const map = new Map<string, number>();
    this.histograms.set(metric, map);
    this.histogramConfigs.set(metric, config);
    return map;
  }

  incrementLogLevel(level: string, context?: { message?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    const levelValue = pino.levels.values[normalized];
    if (typeof levelValue === 'number' && Number.isFinite(levelValue)) {
      this.observeHistogram('logs.level', levelValue, LOG_LEVEL_HISTOGRAM);
    }

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (!previousNormalized || previousNormalized === normalized) {
      return;
    }
    this.lastLogLevelChangeAt = Date.now();
    this.logLevelChangeCounters.set(normalized, (this.logLevelChangeCounters.get(normalized) ?? 0) + 1);
  }

  recordEvaluation(detail: EvaluationMetric) {
    this.evaluationsTotal += 1;
    this.lastEvaluationAt = Date.now();

    if (detail.ruleIndex !== null) {
      this.evaluationsMatched += 1;
      this.lastMatchedRule = detail.ruleIndex;
      const key = String(detail.ruleIndex);
      this.ruleHits.set(key, (this.ruleHits.get(key) ?? 0) + 1);
    }

    for (const name of detail.missingPlaceholders) {
      this.fallbackPlaceholders.set(name, (this.fallbackPlaceholders.get(name) ?? 0) + 1);
    }

    this.observeLatency(EVALUATION_LATENCY_METRIC, detail.durationMs);
    this.observeHistogram(EVALUATION_HISTOGRAM_METRIC, detail.durationMs, EVALUATION_DURATION_HISTOGRAM);
  }

  recordConfigLoad(detail: ConfigLoadMetric) {
    this.configVersion = detail.version;
    this.configRuleCount = detail.ruleCount;
    this.configSource = detail.source;
  }

  recordConfigReload(detail: ConfigReloadMetric) {
    this.lastConfigReloadAt = Date.now();
    if (detail.status === 'failure') {
      this.configReloadFailures += 1;
      this.lastConfigReloadError = detail.error instanceof Error ? detail.error.message : String(detail.error);
      return;
    }
    this.configReloads += 1;
    this.lastConfigReloadError = null;
    this.recordConfigLoad(detail);
  }

  observeLatency(metric: string, durationMs: number) {
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  observeHistogram(metric: string, value: number, config: HistogramConfig = EVALUATION_DURATION_HISTOGRAM) {
    const histogramConfig = this.histogramConfigs.get(metric) ?? config;
    const histogram = this.ensureHistogram(metric, histogramConfig);

    if (Number.isFinite(value)) {
      const stats = this.histogramStats.get(metric);
      if (stats) {
        stats.sum += value;
        stats.count += 1;
      } else {
        this.histogramStats.set(metric, { sum: value, count: 1 });
      }
    }

    const bucketLabel = resolveHistogramBucket(value, histogramConfig);
    histogram.set(bucketLabel, (histogram.get(bucketLabel) ?? 0) + 1);
  }

  async time<T>(metric: string, fn: () => Promise<T> | T): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  exportHistogramForPrometheus(metric: string, options: PrometheusHistogramOptions = {}): string {
    const histogram = this.histograms.get(metric);
    if (!histogram) {
      return '';
    }
    const histogramConfig = this.histogramConfigs.get(metric) ?? EVALUATION_DURATION_HISTOGRAM;
    const stats = this.histogramStats.get(metric);
    return formatPrometheusHistogram(metric, histogram, histogramConfig, stats, options);
  }

  exportLogLevelMetrics() {
    return {
      byLevel: mapLogLevelCounters(this.logLevelCounters),
      lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
      lastErrorMessage: this.lastErrorMessage,
      currentLevel: this.currentLogLevel,
      lastLevelChangeAt: this.lastLogLevelChangeAt
        ? new Date(this.lastLogLevelChangeAt).toISOString()
        : null,
      levelChanges: mapFrom(this.logLevelChangeCounters)
    };
  }

  exportEvaluationMetricsForPrometheus(options: PrometheusEvaluationOptions = {}): string {
    const labels = options.labels ?? {};
    const sections = [
      formatPrometheusGauge(
        'evaluations',
        [
          { value: this.evaluationsMatched, labels: { outcome: 'matched' }, sortKey: 0 },
          {
            value: this.evaluationsTotal - this.evaluationsMatched,
            labels: { outcome: 'unmatched' },
            sortKey: 1
          }
        ],
        {
          metricName: options.evaluationMetricName,
          help: 'Events evaluated against the fingerprinting rules',
          labels
        }
      ),
      formatPrometheusGauge(
        'rule_hits',
        Array.from(this.ruleHits.entries()).map(([rule, value]) => ({
          value,
          labels: { rule },
          sortKey: Number(rule)
        })),
        {
          metricName: options.ruleMetricName,
          help: 'Events grouped by each fingerprinting rule',
          labels
        }
      ),
      formatPrometheusGauge(
        'placeholder_fallbacks',
        Array.from(this.fallbackPlaceholders.entries()).map(([attribute, value]) => ({
          value,
          labels: { attribute }
        })),
        {
          metricName: options.fallbackMetricName,
          help: 'Fingerprint placeholders rendered with their fallback value',
          labels
        }
      ),
      formatPrometheusGauge(
        'config_reloads',
        [
          { value: this.configReloads, labels: { status: 'success' }, sortKey: 0 },
          { value: this.configReloadFailures, labels: { status: 'failure' }, sortKey: 1 }
        ],
        {
          metricName: options.reloadMetricName,
          help: 'Fingerprinting config reload attempts',
          labels
        }
      )
    ];

    return sections.filter(section => section.length > 0).join('\n');
  }

  snapshot(): MetricsSnapshot {
    return {
      createdAt: new Date().toISOString(),
      logs: {
        byLevel: mapLogLevelCounters(this.logLevelCounters),
        lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
        lastErrorMessage: this.lastErrorMessage
      },
      evaluations: {
        total: this.evaluationsTotal,
        matched: this.evaluationsMatched,
        unmatched: this.evaluationsTotal - this.evaluationsMatched,
        byRule: mapFrom(this.ruleHits),
        fallbackPlaceholders: mapFrom(this.fallbackPlaceholders),
        lastMatchedRule: this.lastMatchedRule,
        lastEvaluatedAt: this.lastEvaluationAt ? new Date(this.lastEvaluationAt).toISOString() : null
      },
      config: {
        version: this.configVersion,
        ruleCount: this.configRuleCount,
        source: this.configSource,
        reloads: this.configReloads,
        reloadFailures: this.configReloadFailures,
        lastReloadAt: this.lastConfigReloadAt ? new Date(this.lastConfigReloadAt).toISOString() : null,
        lastReloadError: this.lastConfigReloadError
      },
      latencies: mapFromLatencies(this.latencyStats),
      histograms: mapFromHistograms(this.histograms)
    };
  }
}

function orderedLogLevelEntries(source: Map<string, number>): Array<[string, number]> {
  const normalized = new Map<string, number>();
  for (const [key, value] of source.entries()) {
    const lower = key.toLowerCase();
    normalized.set(lower, (normalized.get(lower) ?? 0) + value);
  }

  const ordered: Array<[string, number]> = [];
  for (const level of PINO_LEVEL_ORDER) {
    ordered.push([level, normalized.get(level) ?? 0]);
    normalized.delete(level);
  }

  const extras = Array.from(normalized.entries()).sort(([a], [b]) => a.localeCompare(b));
  return ordered.concat(extras);
}

function mapLogLevelCounters(source: Map<string, number>): CounterMap {
  return Object.fromEntries(orderedLogLevelEntries(source));
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b)));
}

function mapFromLatencies(
  source: Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>
): Record<string, LatencyStats> {
  const result: Record<string, LatencyStats> = {};
  for (const [name, stats] of source.entries()) {
    result[name] = {
      count: stats.count,
      totalMs: stats.totalMs,
      minMs: stats.minMs === Number.POSITIVE_INFINITY ? 0 : stats.minMs,
      maxMs: stats.maxMs,
      averageMs: stats.count === 0 ? 0 : stats.totalMs / stats.count
    };
  }
  return result;
}

function mapFromHistograms(source: Map<string, Map<string, number>>): Record<string, HistogramSnapshot> {
  const result: Record<string, HistogramSnapshot> = {};
  for (const [metric, histogram] of source.entries()) {
    result[metric] = mapHistogram(histogram);
  }
  return result;
}

function mapHistogram(source: Map<string, number>): HistogramSnapshot {
  const ordered = Array.from(source.entries()).sort(([a], [b]) => compareHistogramKeys(a, b));
  return Object.fromEntries(ordered);
}

function sanitizeLabels(labels?: Record<string, string>): Record<string, string> {
  if (!labels) {
    return {};
  }
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(labels)) {
    if (key === 'le') {
      continue;
    }
    result[key] = value;
  }
  return result;
}

function formatPrometheusHistogram(
  metricKey: string,
  histogram: Map<string, number>,
  config: HistogramConfig,
  stats: { sum: number; count: number } | undefined,
  options: PrometheusHistogramOptions
): string {
  const metricName = sanitizePrometheusMetricName(options.metricName ?? `fingerprinting_${metricKey}`);
  const lines: string[] = [];
  if (options.help) {
    lines.push(`# HELP ${metricName} ${escapePrometheusHelp(options.help)}`);
  }
  lines.push(`# TYPE ${metricName} histogram`);

  const baseLabels = sanitizeLabels(options.labels);
  const baseLabelString = formatPrometheusLabels(baseLabels);

  let cumulative = 0;
  let previous: number | undefined;
  for (const bucket of config.buckets) {
    cumulative += histogram.get(config.format(bucket, previous)) ?? 0;
    const bucketLabels = { ...baseLabels, le: formatPrometheusValue(bucket) };
    lines.push(`${metricName}_bucket${formatPrometheusLabels(bucketLabels)} ${formatPrometheusValue(cumulative)}`);
    previous = bucket;
  }

  const overflowCount = histogram.get(`${config.buckets[config.buckets.length - 1]}+`) ?? 0;
  const totalCount = Math.max(cumulative + overflowCount, stats?.count ?? 0);
  lines.push(
    `${metricName}_bucket${formatPrometheusLabels({ ...baseLabels, le: '+Inf' })} ${formatPrometheusValue(totalCount)}`
  );
  lines.push(`${metricName}_sum${baseLabelString} ${formatPrometheusValue(stats?.sum ?? 0)}`);
  lines.push(`${metricName}_count${baseLabelString} ${formatPrometheusValue(totalCount)}`);

  return lines.join('\n');
}

function formatPrometheusGauge(
  metricKey: string,
  samples: PrometheusGaugeSample[],
  options: PrometheusGaugeOptions
): string {
  const filtered = samples.filter(sample => Number.isFinite(sample.value));
  if (filtered.length === 0) {
    return '';
  }

  const metricName = sanitizePrometheusMetricName(options.metricName ?? `fingerprinting_${metricKey}`);
  const baseLabels = sanitizeLabels(options.labels);

  const normalized = filtered.map(sample => {
    const mergedLabels = { ...baseLabels, ...sanitizeLabels(sample.labels) };
    return {
      value: sample.value,
      labelString: formatPrometheusLabels(mergedLabels),
      sortKey: sample.sortKey
    };
  });

  normalized.sort((a, b) => {
    const sortOrder = compareGaugeSortKey(a.sortKey, b.sortKey);
    if (sortOrder !== 0) {
      return sortOrder;
    }
    return a.labelString.localeCompare(b.labelString);
  });

  const lines: string[] = [];
  if (options.help) {
    lines.push(`# HELP ${metricName} ${escapePrometheusHelp(options.help)}`);
  }
  lines.push(`# TYPE ${metricName} gauge`);
  for (const sample of normalized) {
    lines.push(`${metricName}${sample.labelString} ${formatPrometheusValue(sample.value)}`);
  }

  return lines.join('\n');
}

function compareGaugeSortKey(a: number | string | undefined, b: number | string | undefined): number {
  if (typeof a === 'undefined' && typeof b === 'undefined') {
    return 0;
  }
  if (typeof b === 'undefined') {
    return -1;
  }
  if (typeof a === 'undefined') {
    return 1;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const aStr = String(a);
  const bStr = String(b);
  if (aStr === bStr) {
    return 0;
  }
  return aStr < bStr ? -1 : 1;
}

function sanitizePrometheusMetricName(name: string): string {
  const collapsed = name
    .replace(/[^A-Za-z0-9_]/g, '_')
    .replace(/_{2,}/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
  if (!collapsed) {
    return 'fingerprinting_metric';
  }
  if (/^[0-9]/.test(collapsed)) {
    return `fingerprinting_${collapsed}`;
  }
  return collapsed;
}

function sanitizePrometheusLabelName(name: string): string {
  const collapsed = name
    .replace(/[^A-Za-z0-9_]/g, '_')
    .replace(/_{2,}/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
  if (!collapsed) {
    return 'label';
  }
  if (/^[0-9]/.test(collapsed)) {
    return `_${collapsed}`;
  }
  return collapsed;
}

function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function escapePrometheusHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, ' ');
}

function formatPrometheusLabels(labels: Record<string, string>): string {
  const entries = Object.entries(labels).map(([key, value]) => [sanitizePrometheusLabelName(key), value] as const);
  if (entries.length === 0) {
    return '';
  }
  entries.sort(([a], [b]) => a.localeCompare(b));
  return `{${entries.map(([key, value]) => `${key}="${escapePrometheusLabelValue(value)}"`).join(',')}}`;
}

function formatPrometheusValue(value: number): string {
  if (!Number.isFinite(value) || value === 0) {
    return '0';
  }
  if (Number.isInteger(value)) {
    return value.toString();
  }
  const fixed = value.toFixed(6).replace(/0+$/, '').replace(/\.$/, '');
  return fixed.length > 0 ? fixed : '0';
}

function compareHistogramKeys(a: string, b: string) {
  const extract = (key: string) => {
    if (key.startsWith('<')) {
      return [parseFloat(key.slice(1)), -1] as const;
    }
    if (key.endsWith('+')) {
      return [parseFloat(key.slice(0, -1)), Number.POSITIVE_INFINITY] as const;
    }
    const [start, end] = key.split('-').map(Number);
    return [start, end ?? start] as const;
  };

  const [aStart, aEnd] = extract(a);
  const [bStart, bEnd] = extract(b);
  if (aStart === bStart) {
    return aEnd - bEnd;
  }
  return aStart - bStart;
}

function resolveHistogramBucket(value: number, config: HistogramConfig) {
  const { buckets, format } = config;
  let previous: number | undefined;
  for (const bucket of buckets) {
    if (value < bucket) {
      return format(bucket, previous);
    }
    previous = bucket;
  }
  return `${buckets[buckets.length - 1]}+`;
}

const defaultRegistry = new MetricsRegistry();

export type {
  ConfigReloadMetric,
  EvaluationMetric,
  HistogramSnapshot,
  MetricsSnapshot,
  PrometheusEvaluationOptions,
  PrometheusHistogramOptions
};
export { MetricsRegistry };
export default defaultRegistry;

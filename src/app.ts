import { fileURLToPath } from 'node:url';
import logger, { type LogSink } from './logger.js';
import metrics, { type MetricsSnapshot } from './metrics/index.js';
import { ConfigManager, type ConfigManagerOptions } from './config/index.js';
import { getEngineSettings, type EngineSettings } from './config/settings.js';
import { FingerprintEngine } from './fingerprinting/engine.js';

type HealthStatus = 'ok' | 'degraded';

export type HealthIndicatorContext = {
  metrics: MetricsSnapshot;
};

export type HealthIndicatorResult = {
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type HealthIndicator = (context: HealthIndicatorContext) =>
  | HealthIndicatorResult
  | Promise<HealthIndicatorResult>;

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

type RegisteredIndicator = {
  name: string;
  indicator: HealthIndicator;
};

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

const healthIndicators: RegisteredIndicator[] = [];
const shutdownHooks: RegisteredHook[] = [];

export function registerHealthIndicator(name: string, indicator: HealthIndicator) {
  const existingIndex = healthIndicators.findIndex(entry => entry.name === name);
  const entry: RegisteredIndicator = { name, indicator };
  if (existingIndex >= 0) {
    healthIndicators[existingIndex] = entry;
  } else {
    healthIndicators.push(entry);
  }

  return () => {
    const index = healthIndicators.findIndex(item => item.name === name);
    if (index >= 0) {
      healthIndicators.splice(index, 1);
    }
  };
}

export async function collectHealthChecks(context: Partial<HealthIndicatorContext> = {}) {
  const results: Array<{ name: string; status: HealthStatus; details?: Record<string, unknown> }> = [];
  const enrichedContext: HealthIndicatorContext = {
    metrics: context.metrics ?? metrics.snapshot()
  };
  for (const entry of healthIndicators) {
    try {
      const result = await entry.indicator(enrichedContext);
      results.push({ name: entry.name, status: result.status, details: result.details });
    } catch (error) {
      results.push({
        name: entry.name,
        status: 'degraded',
        details: {
          error: error instanceof Error ? error.message : String(error)
        }
      });
    }
  }
  return results;
}

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  const existingIndex = shutdownHooks.findIndex(entry => entry.name === name);
  const entry: RegisteredHook = { name, hook };
  if (existingIndex >= 0) {
    shutdownHooks[existingIndex] = entry;
  } else {
    shutdownHooks.push(entry);
  }

  return () => {
    const index = shutdownHooks.findIndex(item => item.name === name);
    if (index >= 0) {
      shutdownHooks.splice(index, 1);
    }
  };
}

export async function runShutdownHooks(context: ShutdownHookContext) {
  const results: Array<{ name: string; status: 'ok' | 'error'; error?: Error }> = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      results.push({
        name: entry.name,
        status: 'error',
        error: error instanceof Error ? error : new Error(String(error))
      });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  healthIndicators.splice(0, healthIndicators.length);
  shutdownHooks.splice(0, shutdownHooks.length);
}

export type BootstrapOptions = Partial<EngineSettings> & ConfigManagerOptions;

export type FingerprintingService = {
  engine: FingerprintEngine;
  manager: ConfigManager;
  stop: () => void;
};

export function bootstrap(options: BootstrapOptions = {}): FingerprintingService {
  const settings = { ...getEngineSettings(), ...options };
  const log = options.log ?? logger;
  log.info({ rulesPath: settings.rulesPath }, 'Fingerprinting bootstrap starting');

  const manager = new ConfigManager(settings.rulesPath, options);
  const engine = new FingerprintEngine(manager, {
    defaultFingerprint: settings.defaultFingerprint,
    metrics: options.metrics,
    log
  });

  const onWatchError = (error: Error) => {
    log.warn({ err: error }, 'Watched fingerprinting config change was rejected');
  };
  manager.on('error', onWatchError);
  const unwatch = settings.watch ? manager.watch() : () => {};

  registerHealthIndicator('fingerprinting-config', context => {
    const config = manager.getConfig();
    const { lastReloadError } = context.metrics.config;
    return {
      status: lastReloadError ? 'degraded' : 'ok',
      details: {
        version: config.version,
        rules: config.rules.length,
        source: config.source,
        lastReloadError
      }
    };
  });

  let stopped = false;
  const stop = () => {
    if (stopped) {
      return;
    }
    stopped = true;
    unwatch();
    manager.off('error', onWatchError);
  };
  registerShutdownHook('fingerprinting-config-watch', () => {
    stop();
  });

  log.info(
    { version: manager.getConfig().version, rules: manager.getConfig().rules.length },
    'Bootstrap completed'
  );
  return { engine, manager, stop };
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGTERM', 'SIGINT', 'SIGQUIT'];

export type SignalHandlerOptions = {
  log?: LogSink;
  exit?: (code: number) => void;
};

export function registerSignalHandlers(options: SignalHandlerOptions = {}) {
  const log = options.log ?? logger;
  const exit =
    options.exit ??
    ((code: number) => {
      process.exit(code);
    });

  const shutdown = async (signal: NodeJS.Signals) => {
    log.info({ signal }, 'Fingerprinting service shutting down');
    const results = await runShutdownHooks({ reason: 'signal', signal });
    const failures = results.filter(result => result.status === 'error');
    for (const failure of failures) {
      log.error({ err: failure.error, hook: failure.name }, 'Shutdown hook failed');
    }
    exit(failures.length > 0 ? 1 : 0);
  };

  const handleSignal = (signal: NodeJS.Signals) => {
    void shutdown(signal);
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, handleSignal);
  }

  return () => {
    for (const signal of SHUTDOWN_SIGNALS) {
      process.off(signal, handleSignal);
    }
  };
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  try {
    // a persistent watcher keeps the process alive until a signal arrives
    const service = bootstrap({ persistentWatch: true });
    if (service.manager.isWatching()) {
      registerSignalHandlers();
    } else {
      logger.info('Config watch disabled; rules were validated and the service exits');
    }
  } catch (error) {
    logger.error({ err: error }, 'Bootstrap failed');
    process.exitCode = 1;
  }
}

import { EventEmitter } from 'node:events';
import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'fingerprinting';

const AVAILABLE_LOG_LEVELS = new Set(
  Object.keys(pino.levels.values)
    .map(level => level.toLowerCase())
    .concat('silent')
);

const levelEvents = new EventEmitter();

function extractMessage(args: unknown[]): string | undefined {
  for (const value of args) {
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
    if (value instanceof Error && value.message.length > 0) {
      return value.message;
    }
    if (value && typeof value === 'object' && 'err' in value && value.err instanceof Error) {
      return value.err.message;
    }
  }
  return undefined;
}

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel =
        typeof logLevel === 'number' ? pino.levels.labels[logLevel] ?? String(logLevel) : logLevel;
      metrics.incrementLogLevel(resolvedLevel, { message: extractMessage(inputArgs) });
      return method.apply(this, inputArgs);
    }
  }
});

let currentLevel = logger.level;
let lastLevelChangePrevious: string | null = null;
metrics.recordLogLevelChange(currentLevel, currentLevel);

metrics.onReset(() => {
  metrics.recordLogLevelChange(currentLevel, lastLevelChangePrevious ?? currentLevel);
});

function normalizeLevel(value: string) {
  return value.trim().toLowerCase();
}

function isLevel(value: string): value is pino.LevelWithSilent {
  return AVAILABLE_LOG_LEVELS.has(value);
}

export function getLogLevel(): string {
  return currentLevel;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = normalizeLevel(nextLevel);
  if (!isLevel(normalized)) {
    const available = getAvailableLogLevels().join(', ');
    throw new Error(`Unknown log level "${normalized}" (available: ${available})`);
  }
  const previous = currentLevel;
  if (previous === normalized) {
    return currentLevel;
  }

  logger.level = normalized;
  currentLevel = logger.level;
  metrics.recordLogLevelChange(currentLevel, previous);
  lastLevelChangePrevious = previous;
  levelEvents.emit('change', currentLevel, previous);
  logger.info({ level: currentLevel }, 'Log level updated');
  return currentLevel;
}

export function onLogLevelChange(listener: (level: string, previous: string | null) => void) {
  const wrapper = (level: string, previous: string | null) => {
    listener(level, previous);
  };
  levelEvents.on('change', wrapper);
  return () => {
    levelEvents.off('change', wrapper);
  };
}

export function getLogLevelMetrics() {
  return metrics.exportLogLevelMetrics();
}

export type Logger = typeof logger;

export type LogSink = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export default logger;

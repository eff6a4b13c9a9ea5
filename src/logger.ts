import { EventEmitter } from 'node:events';
import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'SleepMonitor';

const AVAILABLE_LOG_LEVELS = new Set(
  [...Object.keys(pino.levels.values), 'silent'].map(level => level.toLowerCase())
);

const levelEvents = new EventEmitter();

type LogContext = {
  message?: string;
  detector?: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readDetector(value: unknown): string | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const detector = value.detector;
  return typeof detector === 'string' && detector.length > 0 ? detector : undefined;
}

function extractContext(args: unknown[]): LogContext {
  let message: string | undefined;
  let detector: string | undefined;

  for (const value of args) {
    if (typeof value === 'string' && value.length > 0 && !message) {
      message = value;
    } else if (isRecord(value)) {
      if (!detector) {
        detector =
          readDetector(value) ??
          readDetector(value.meta) ??
          readDetector(value.context) ??
          readDetector(value.event);
      }
      if (typeof value.message === 'string' && value.message.length > 0 && !message) {
        message = value.message;
      }
    }
  }

  return { message, detector };
}

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel =
        typeof logLevel === 'number' ? pino.levels.labels[logLevel] ?? String(logLevel) : logLevel;
      const context = extractContext(inputArgs);
      metrics.incrementLogLevel(resolvedLevel, context);
      return method.apply(this, inputArgs);
    }
  }
});

let currentLevel = logger.level;
metrics.recordLogLevelChange(currentLevel);

metrics.onReset(() => {
  metrics.recordLogLevelChange(currentLevel);
});

function normalizeLevel(value: string) {
  return value.trim().toLowerCase();
}

function assertLevel(level: string) {
  if (!AVAILABLE_LOG_LEVELS.has(level)) {
    const available = Array.from(AVAILABLE_LOG_LEVELS).sort().join(', ');
    throw new Error(`Unknown log level "${level}" (available: ${available})`);
  }
}

export function getLogLevel(): string {
  return currentLevel;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = normalizeLevel(nextLevel);
  assertLevel(normalized);
  const previous = currentLevel;
  if (previous === normalized) {
    return currentLevel;
  }

  logger.level = normalized;
  currentLevel = logger.level;
  metrics.recordLogLevelChange(currentLevel);
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

export default logger;

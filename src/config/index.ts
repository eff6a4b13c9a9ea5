import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import type { EventSuppressionRule } from '../types.js';
import type { MotionDetectorOptions } from '../video/motionDetector.js';
import type { FrameGateOptions } from '../pipeline/frameGate.js';
import type { BreathingAnalyzerOptions } from '../sleep/breathingAnalyzer.js';
import type { SleepStateMachineOptions } from '../sleep/stateMachine.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type DatabaseConfig = {
  path: string;
};

export type EventsConfig = {
  suppression?: {
    rules: EventSuppressionRule[];
  };
};

export type VideoConfig = {
  framesPerSecond: number;
  referenceWidth: number;
  referenceHeight: number;
  queueSize: number;
};

export type MotionConfig = {
  diffThreshold?: number;
  blurKernelSize?: number;
  dilateIterations?: number;
  contrastClipLimit?: number;
  contrastTiles?: number;
  calibrationFrames?: number;
  persistentRatio?: number;
  gridRows?: number;
  gridCols?: number;
  minComponentAreaRatio?: number;
  maxAspectRatio?: number;
  edgeBandRatio?: number;
  smallComponentAreaRatio?: number;
};

export type FrameGateConfig = {
  enabled?: boolean;
  duplicateWindowMs?: number;
  minZeroStreak?: number;
};

export type BreathingConfig = {
  peakThreshold?: number;
  minIntervalSeconds?: number;
  maxIntervalSeconds?: number;
  decayTimeoutSeconds?: number;
  lowVariability?: number;
  highVariability?: number;
};

export type RangeConfig = [number, number];

export type SleepConfig = {
  noMotionThreshold?: number;
  highMotionThreshold?: number;
  deepMotionRange?: RangeConfig;
  remMotionRange?: RangeConfig;
  deepBpmRange?: RangeConfig;
  remBpmRange?: RangeConfig;
  quietCeiling?: number;
  warmupSeconds?: number;
  confirmation?: {
    noBreathingSeconds?: number;
    awakeSeconds?: number;
    spasmSeconds?: number;
    defaultSeconds?: number;
  };
};

export type SleepMonitorConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  database: DatabaseConfig;
  events?: EventsConfig;
  video: VideoConfig;
  motion: MotionConfig;
  frameGate: FrameGateConfig;
  breathing: BreathingConfig;
  sleep: SleepConfig;
};

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  minItems?: number;
  maxItems?: number;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
};

const positiveNumber: JsonSchema = { type: 'number', minimum: 0 };
const ratio: JsonSchema = { type: 'number', minimum: 0, maximum: 1 };
const rangeSchema: JsonSchema = {
  type: 'array',
  items: { type: 'number', minimum: 0 },
  minItems: 2,
  maxItems: 2
};
const severitySchema: JsonSchema = { type: 'string', enum: ['info', 'warning', 'critical'] };

const suppressionRuleSchema: JsonSchema = {
  type: 'object',
  required: ['reason'],
  additionalProperties: false,
  properties: {
    id: { type: 'string' },
    detector: { type: ['string', 'array'], items: { type: 'string' } },
    source: { type: ['string', 'array'], items: { type: 'string' } },
    severity: { type: ['string', 'array'], enum: ['info', 'warning', 'critical'], items: severitySchema },
    suppressForMs: positiveNumber,
    rateLimit: {
      type: 'object',
      required: ['count', 'perMs'],
      additionalProperties: false,
      properties: {
        count: { type: 'number', minimum: 1 },
        perMs: { type: 'number', minimum: 1 }
      }
    },
    reason: { type: 'string' }
  }
};

const sleepMonitorConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'database', 'video', 'motion', 'frameGate', 'breathing', 'sleep'],
  additionalProperties: false,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: { name: { type: 'string' } }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: {
          type: 'string',
          enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']
        }
      }
    },
    database: {
      type: 'object',
      required: ['path'],
      additionalProperties: false,
      properties: { path: { type: 'string' } }
    },
    events: {
      type: 'object',
      additionalProperties: false,
      properties: {
        suppression: {
          type: 'object',
          required: ['rules'],
          additionalProperties: false,
          properties: {
            rules: { type: 'array', items: suppressionRuleSchema }
          }
        }
      }
    },
    video: {
      type: 'object',
      required: ['framesPerSecond', 'referenceWidth', 'referenceHeight', 'queueSize'],
      additionalProperties: false,
      properties: {
        framesPerSecond: { type: 'number', minimum: 0.1, maximum: 120 },
        referenceWidth: { type: 'number', minimum: 1 },
        referenceHeight: { type: 'number', minimum: 1 },
        queueSize: { type: 'number', minimum: 1 }
      }
    },
    motion: {
      type: 'object',
      additionalProperties: false,
      properties: {
        diffThreshold: { type: 'number', minimum: 0, maximum: 255 },
        blurKernelSize: { type: 'number', minimum: 1 },
        dilateIterations: positiveNumber,
        contrastClipLimit: positiveNumber,
        contrastTiles: { type: 'number', minimum: 1 },
        calibrationFrames: { type: 'number', minimum: 1 },
        persistentRatio: ratio,
        gridRows: { type: 'number', minimum: 1 },
        gridCols: { type: 'number', minimum: 1 },
        minComponentAreaRatio: ratio,
        maxAspectRatio: { type: 'number', minimum: 1 },
        edgeBandRatio: { type: 'number', minimum: 0, maximum: 0.5 },
        smallComponentAreaRatio: ratio
      }
    },
    frameGate: {
      type: 'object',
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        duplicateWindowMs: positiveNumber,
        minZeroStreak: { type: 'number', minimum: 1 }
      }
    },
    breathing: {
      type: 'object',
      additionalProperties: false,
      properties: {
        peakThreshold: positiveNumber,
        minIntervalSeconds: positiveNumber,
        maxIntervalSeconds: positiveNumber,
        decayTimeoutSeconds: positiveNumber,
        lowVariability: positiveNumber,
        highVariability: positiveNumber
      }
    },
    sleep: {
      type: 'object',
      additionalProperties: false,
      properties: {
        noMotionThreshold: positiveNumber,
        highMotionThreshold: positiveNumber,
        deepMotionRange: rangeSchema,
        remMotionRange: rangeSchema,
        deepBpmRange: rangeSchema,
        remBpmRange: rangeSchema,
        quietCeiling: positiveNumber,
        warmupSeconds: positiveNumber,
        confirmation: {
          type: 'object',
          additionalProperties: false,
          properties: {
            noBreathingSeconds: positiveNumber,
            awakeSeconds: positiveNumber,
            spasmSeconds: positiveNumber,
            defaultSeconds: positiveNumber
          }
        }
      }
    }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
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
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    const additional = schema.additionalProperties;
    if (additional === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (additional && typeof additional === 'object') {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(...validateAgainstSchema(additional, value[key], `${pathLabel}.${key}`));
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (key in value) {
        errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
      }
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    if (typeof schema.minItems === 'number' && value.length < schema.minItems) {
      errors.push(`${pathLabel} must have at least ${schema.minItems} items`);
    }

    if (typeof schema.maxItems === 'number' && value.length > schema.maxItems) {
      errors.push(`${pathLabel} must have at most ${schema.maxItems} items`);
    }

    const items = schema.items;
    if (items) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean' && typeof value !== 'boolean') {
    errors.push(`${pathLabel} must be a boolean`);
  }

  return errors;
}

function matchesConfigSchema(value: unknown): value is SleepMonitorConfig {
  return validateAgainstSchema(sleepMonitorConfigSchema, value, 'config').length === 0;
}

export function validateConfig(config: unknown): asserts config is SleepMonitorConfig {
  if (!matchesConfigSchema(config)) {
    throw new Error(validateAgainstSchema(sleepMonitorConfigSchema, config, 'config').join('; '));
  }
  validateLogicalConfig(config);
}

export function parseConfig(contents: string): SleepMonitorConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): SleepMonitorConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

function validateLogicalConfig(config: SleepMonitorConfig) {
  const messages: string[] = [];

  const { minIntervalSeconds, maxIntervalSeconds, lowVariability, highVariability } = config.breathing;
  if (
    typeof minIntervalSeconds === 'number' &&
    typeof maxIntervalSeconds === 'number' &&
    minIntervalSeconds >= maxIntervalSeconds
  ) {
    messages.push('config.breathing.minIntervalSeconds must be less than maxIntervalSeconds');
  }

  if (
    typeof lowVariability === 'number' &&
    typeof highVariability === 'number' &&
    lowVariability > highVariability
  ) {
    messages.push('config.breathing.lowVariability must not exceed highVariability');
  }

  const ranges: Array<[string, RangeConfig | undefined]> = [
    ['deepMotionRange', config.sleep.deepMotionRange],
    ['remMotionRange', config.sleep.remMotionRange],
    ['deepBpmRange', config.sleep.deepBpmRange],
    ['remBpmRange', config.sleep.remBpmRange]
  ];
  for (const [name, range] of ranges) {
    if (range && range[0] > range[1]) {
      messages.push(`config.sleep.${name} must be ordered [min, max]`);
    }
  }

  const { noMotionThreshold, highMotionThreshold } = config.sleep;
  if (
    typeof noMotionThreshold === 'number' &&
    typeof highMotionThreshold === 'number' &&
    noMotionThreshold >= highMotionThreshold
  ) {
    messages.push('config.sleep.noMotionThreshold must be below highMotionThreshold');
  }

  const kernel = config.motion.blurKernelSize;
  if (typeof kernel === 'number' && (!Number.isInteger(kernel) || kernel % 2 === 0)) {
    messages.push('config.motion.blurKernelSize must be an odd integer');
  }

  const { gridRows, gridCols, calibrationFrames } = config.motion;
  for (const [name, value] of [
    ['gridRows', gridRows],
    ['gridCols', gridCols],
    ['calibrationFrames', calibrationFrames]
  ] as const) {
    if (typeof value === 'number' && !Number.isInteger(value)) {
      messages.push(`config.motion.${name} must be an integer`);
    }
  }

  if (!Number.isInteger(config.video.queueSize)) {
    messages.push('config.video.queueSize must be an integer');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export type PipelineOptions = {
  framesPerSecond: number;
  queueSize: number;
  motion: MotionDetectorOptions;
  frameGate: FrameGateOptions;
  breathing: BreathingAnalyzerOptions;
  stateMachine: SleepStateMachineOptions;
  suppressionRules: EventSuppressionRule[];
};

export function resolvePipelineOptions(config: SleepMonitorConfig): PipelineOptions {
  const { sleep, breathing } = config;
  return {
    framesPerSecond: config.video.framesPerSecond,
    queueSize: config.video.queueSize,
    motion: { ...config.motion },
    frameGate: {
      ...config.frameGate,
      referenceWidth: config.video.referenceWidth,
      referenceHeight: config.video.referenceHeight
    },
    breathing: { ...breathing },
    stateMachine: {
      noMotionThreshold: sleep.noMotionThreshold,
      highMotionThreshold: sleep.highMotionThreshold,
      deepMotionRange: sleep.deepMotionRange,
      remMotionRange: sleep.remMotionRange,
      deepBpmRange: sleep.deepBpmRange,
      remBpmRange: sleep.remBpmRange,
      quietCeiling: sleep.quietCeiling,
      warmupSeconds: sleep.warmupSeconds,
      lowVariability: breathing.lowVariability,
      highVariability: breathing.highVariability,
      confirmation: sleep.confirmation ? { ...sleep.confirmation } : undefined
    },
    suppressionRules: config.events?.suppression?.rules ?? []
  };
}

export type ConfigReloadEvent = {
  previous: SleepMonitorConfig;
  next: SleepMonitorConfig;
};

export class ConfigManager extends EventEmitter {
  private currentConfig: SleepMonitorConfig;
  private readonly filePath: string;

  constructor(filePath = path.resolve(process.cwd(), 'config/default.json')) {
    super();
    this.filePath = path.resolve(filePath);
    this.currentConfig = loadConfigFromFile(this.filePath);
  }

  getConfig(): SleepMonitorConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): SleepMonitorConfig {
    const next = loadConfigFromFile(this.filePath);
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }
}

let defaultManager: ConfigManager | null = null;

export function getDefaultConfigManager(): ConfigManager {
  if (!defaultManager) {
    defaultManager = new ConfigManager();
  }
  return defaultManager;
}

export { sleepMonitorConfigSchema };

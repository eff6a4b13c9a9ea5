import process from 'node:process';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import eventBus, { EventBus } from './eventBus.js';
import { getSleepSession, listSleepSessions, sessionStore, type StoredSleepSession } from './db.js';
import {
  getDefaultConfigManager,
  loadConfigFromFile,
  resolvePipelineOptions,
  type SleepMonitorConfig
} from './config/index.js';
import { SleepMonitor } from './pipeline/monitor.js';
import { createManualClock } from './utils/clock.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

const DEFAULT_IO: CliIo = {
  stdout: process.stdout,
  stderr: process.stderr
};

const USAGE_LINES = [
  'Usage: sleep-monitor <command> [options]',
  '',
  'Commands:',
  '  analyze <dir> [--fps n] [--config path] [--json] [--no-save]',
  '                          Run the PNG frames of a directory through the sleep monitor',
  '  sessions list [--limit n] [--json]',
  '                          List stored sleep sessions, newest first',
  '  sessions show <id>      Print one stored sleep session as JSON',
  '  log-level [get|set <level>]',
  '                          Inspect or change the log level',
  '  help                    Show this message'
];

const LOG_LEVEL_USAGE = 'Usage: sleep-monitor log-level [get|set <level>]';
const SESSIONS_USAGE = 'Usage: sleep-monitor sessions <list|show> [options]';

type AnalyzeArgs = {
  directory?: string;
  fps?: number;
  configPath?: string;
  json: boolean;
  save: boolean;
  help: boolean;
  errors: string[];
};

type SessionsListArgs = {
  limit?: number;
  json: boolean;
  errors: string[];
};

export async function runCli(argv = process.argv.slice(2), io: CliIo = DEFAULT_IO): Promise<number> {
  const command = argv[0] ?? 'help';

  switch (command) {
    case 'analyze': {
      return runAnalyzeCommand(argv.slice(1), io);
    }
    case 'sessions': {
      return runSessionsCommand(argv.slice(1), io);
    }
    case 'log-level': {
      return runLogLevelCommand(argv.slice(1), io);
    }
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      io.stderr.write(`${USAGE_LINES.join('\n')}\n`);
      return 1;
    }
  }
}

function parseAnalyzeArgs(args: string[]): AnalyzeArgs {
  const result: AnalyzeArgs = { json: false, save: true, help: false, errors: [] };
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === '--help' || token === '-h') {
      result.help = true;
      continue;
    }
    if (token === '--json' || token === '-j') {
      result.json = true;
      continue;
    }
    if (token === '--no-save') {
      result.save = false;
      continue;
    }
    if (token === '--fps') {
      const value = Number(args[index + 1]);
      if (!Number.isFinite(value) || value <= 0) {
        result.errors.push('--fps requires a positive number');
      } else {
        result.fps = value;
      }
      index += 1;
      continue;
    }
    if (token === '--config' || token === '-c') {
      const value = args[index + 1];
      if (!value || value.startsWith('-')) {
        result.errors.push('Missing value for --config');
      } else {
        result.configPath = value;
        index += 1;
      }
      continue;
    }
    if (token.startsWith('-')) {
      result.errors.push(`Unknown option: ${token}`);
      continue;
    }
    if (result.directory) {
      result.errors.push(`Unexpected argument: ${token}`);
      continue;
    }
    result.directory = token;
  }
  return result;
}

function listFrameFiles(directory: string): string[] {
  return fs
    .readdirSync(directory, { withFileTypes: true })
    .filter(entry => entry.isFile() && entry.name.toLowerCase().endsWith('.png'))
    .map(entry => entry.name)
    .sort((a, b) => a.localeCompare(b))
    .map(name => path.join(directory, name));
}

function discardEvent() {
  return undefined;
}

async function runAnalyzeCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseAnalyzeArgs(args);
  if (parsed.help) {
    io.stdout.write(`${USAGE_LINES[3]}\n`);
    return 0;
  }
  if (!parsed.directory) {
    parsed.errors.push('Missing frames directory');
  }
  if (parsed.errors.length > 0 || !parsed.directory) {
    for (const error of parsed.errors) {
      io.stderr.write(`${error}\n`);
    }
    return 1;
  }

  let config: SleepMonitorConfig;
  try {
    config = parsed.configPath
      ? loadConfigFromFile(parsed.configPath)
      : getDefaultConfigManager().getConfig();
  } catch (error) {
    io.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }

  const directory = path.resolve(parsed.directory);
  let files: string[];
  try {
    files = listFrameFiles(directory);
  } catch (error) {
    io.stderr.write(`Cannot read ${directory}: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
  if (files.length === 0) {
    io.stderr.write(`No PNG frames found in ${directory}\n`);
    return 1;
  }

  const options = resolvePipelineOptions(config);
  const fps = parsed.fps ?? options.framesPerSecond;
  const frameIntervalMs = 1000 / fps;
  const clock = createManualClock(Date.now());
  const bus = parsed.save ? eventBus : new EventBus({ store: discardEvent, log: logger });
  bus.configureSuppression(options.suppressionRules);

  const monitor = new SleepMonitor({
    source: path.basename(directory),
    motion: options.motion,
    frameGate: options.frameGate,
    breathing: options.breathing,
    stateMachine: options.stateMachine,
    queueSize: options.queueSize,
    clock: clock.now,
    store: parsed.save ? sessionStore : null,
    bus
  });

  monitor.start();
  let failed = 0;
  for (const file of files) {
    try {
      monitor.processFrame(fs.readFileSync(file), clock.now());
    } catch (error) {
      failed += 1;
      io.stderr.write(
        `Skipping ${path.basename(file)}: ${error instanceof Error ? error.message : String(error)}\n`
      );
    }
    clock.advance(frameIntervalMs);
  }

  const stats = monitor.getStats();
  const record = monitor.stop();

  if (parsed.json) {
    io.stdout.write(
      `${JSON.stringify({ frames: files.length, failed, stats, session: record, saved: parsed.save }, null, 2)}\n`
    );
    return 0;
  }

  const lines = [
    `Frames analyzed: ${files.length - failed}/${files.length}`,
    `Final state: ${stats.currentState}`,
    `Session duration: ${stats.sessionDurationSeconds}s`,
    `Total sleep: ${stats.totalSleepSeconds}s (deep ${stats.deepSleepSeconds}s, light ${stats.lightSleepSeconds}s)`,
    `Wake-ups: ${stats.wakeUps}`,
    `Spasms: ${stats.spasmCount}`,
    `Breathing rate: ${stats.breathingRateBpm.toFixed(1)} bpm`,
    `Quality score: ${record?.qualityScore ?? stats.sleepQualityScore}`
  ];
  if (record) {
    lines.push(`Session: ${record.id}${parsed.save ? ' (saved)' : ''}`);
  }
  io.stdout.write(`${lines.join('\n')}\n`);
  return 0;
}

async function runSessionsCommand(args: string[], io: CliIo): Promise<number> {
  const [subcommand, ...rest] = args;

  if (subcommand === 'list') {
    const parsed = parseSessionsListArgs(rest);
    if (parsed.errors.length > 0) {
      for (const error of parsed.errors) {
        io.stderr.write(`${error}\n`);
      }
      return 1;
    }
    const sessions = listSleepSessions(parsed.limit);
    if (parsed.json) {
      io.stdout.write(`${JSON.stringify(sessions, null, 2)}\n`);
      return 0;
    }
    if (sessions.length === 0) {
      io.stdout.write('No sleep sessions recorded\n');
      return 0;
    }
    io.stdout.write(`${sessions.map(formatSessionLine).join('\n')}\n`);
    return 0;
  }

  if (subcommand === 'show') {
    const [id] = rest;
    if (!id) {
      io.stderr.write('Missing session id\n');
      return 1;
    }
    const session = getSleepSession(id);
    if (!session) {
      io.stderr.write(`Sleep session not found: ${id}\n`);
      return 1;
    }
    io.stdout.write(`${JSON.stringify(session, null, 2)}\n`);
    return 0;
  }

  if (subcommand === 'help' || subcommand === '--help') {
    io.stdout.write(`${SESSIONS_USAGE}\n`);
    return 0;
  }

  if (!subcommand) {
    io.stderr.write(`${SESSIONS_USAGE}\n`);
    return 1;
  }

  io.stderr.write(`Unknown sessions command: ${subcommand}\n`);
  io.stderr.write(`${SESSIONS_USAGE}\n`);
  return 1;
}

function parseSessionsListArgs(args: string[]): SessionsListArgs {
  const result: SessionsListArgs = { json: false, errors: [] };
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === '--json' || token === '-j') {
      result.json = true;
      continue;
    }
    if (token === '--limit') {
      const value = Number(args[index + 1]);
      if (!Number.isInteger(value) || value <= 0) {
        result.errors.push('--limit requires a positive integer');
      } else {
        result.limit = value;
      }
      index += 1;
      continue;
    }
    result.errors.push(`Unknown option: ${token}`);
  }
  return result;
}

function formatSessionLine(session: StoredSleepSession) {
  const durationSeconds = Math.max(0, Math.round((session.endTime - session.startTime) / 1000));
  return [
    session.id,
    new Date(session.startTime).toISOString(),
    `duration=${durationSeconds}s`,
    `sleep=${session.totalSleepSeconds}s`,
    `wakeUps=${session.wakeUpCount}`,
    `quality=${session.qualityScore}`
  ].join('  ');
}

async function runLogLevelCommand(args: string[], io: CliIo): Promise<number> {
  const [first, second] = args;
  const available = getAvailableLogLevels();

  if (!first || first === 'get') {
    io.stdout.write(`${getLogLevel()}\n`);
    return 0;
  }

  if (first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${LOG_LEVEL_USAGE}\n`);
    return 0;
  }

  if (first === 'set') {
    if (!second) {
      io.stderr.write('Missing value for log level\n');
      io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
      return 1;
    }
    return applyLogLevel(second, io);
  }

  if (first.startsWith('-')) {
    io.stderr.write(`Unknown option: ${first}\n`);
    io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
    return 1;
  }

  if (!available.includes(first.toLowerCase())) {
    io.stderr.write(`Unknown log level "${first}" (available: ${available.join(', ')})\n`);
    return 1;
  }

  return applyLogLevel(first, io);
}

function applyLogLevel(level: string, io: CliIo): number {
  try {
    const normalized = setLogLevel(level);
    io.stdout.write(`Log level set to ${normalized}\n`);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${message}\n`);
    return 1;
  }
}

export type { CliIo };

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'Sleep monitor CLI failed');
      process.exit(1);
    }
  );
}

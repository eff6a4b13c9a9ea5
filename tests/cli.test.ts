import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runCli } from '../src/cli.js';
import { clearEvents, clearSleepSessions, listEvents } from '../src/db.js';
import { setLogLevel } from '../src/logger.js';
import { createTexture, encodePng, texturedFrame } from './helpers/frames.js';

const WIDTH = 32;
const HEIGHT = 24;
const defaultConfigPath = fileURLToPath(new URL('../config/default.json', import.meta.url));

function createIo() {
  const output = { stdout: '', stderr: '' };
  const collector = (key: 'stdout' | 'stderr') =>
    new Writable({
      decodeStrings: false,
      write(chunk, _encoding, callback) {
        output[key] += String(chunk);
        callback();
      }
    });
  return { io: { stdout: collector('stdout'), stderr: collector('stderr') }, output };
}

describe('sleep-monitor CLI', () => {
  const tempDirs: string[] = [];

  function tempDir() {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sleep-cli-'));
    tempDirs.push(dir);
    return dir;
  }

  function writeConfig(dir: string) {
    const defaults: unknown = JSON.parse(fs.readFileSync(defaultConfigPath, 'utf-8'));
    if (typeof defaults !== 'object' || defaults === null) {
      throw new Error('default config must be an object');
    }
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(
      file,
      JSON.stringify({
        ...defaults,
        motion: { blurKernelSize: 3, calibrationFrames: 3, gridRows: 3, gridCols: 4 }
      })
    );
    return file;
  }

  function writeFrames(count: number) {
    const dir = tempDir();
    const still = encodePng(texturedFrame(createTexture(WIDTH, HEIGHT, 5), WIDTH, HEIGHT));
    for (let index = 0; index < count; index += 1) {
      fs.writeFileSync(path.join(dir, `frame-${String(index).padStart(2, '0')}.png`), still);
    }
    return dir;
  }

  beforeEach(() => {
    clearSleepSessions();
    clearEvents();
  });

  afterEach(() => {
    setLogLevel('silent');
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('CliHelp prints usage', async () => {
    const { io, output } = createIo();

    await expect(runCli(['help'], io)).resolves.toBe(0);
    expect(output.stdout.split('\n')[0]).toBe('Usage: sleep-monitor <command> [options]');
  });

  it('CliUnknownCommand fails with usage on stderr', async () => {
    const { io, output } = createIo();

    await expect(runCli(['dance'], io)).resolves.toBe(1);
    expect(output.stderr.split('\n')[0]).toBe('Unknown command: dance');
    expect(output.stdout).toBe('');
  });

  it('CliLogLevel reads and changes the level', async () => {
    const first = createIo();
    await expect(runCli(['log-level'], first.io)).resolves.toBe(0);
    expect(first.output.stdout).toBe('silent\n');

    const second = createIo();
    await expect(runCli(['log-level', 'set', 'warn'], second.io)).resolves.toBe(0);
    expect(second.output.stdout).toBe('Log level set to warn\n');

    const third = createIo();
    await expect(runCli(['log-level', 'loud'], third.io)).resolves.toBe(1);
    expect(third.output.stderr).toBe(
      'Unknown log level "loud" (available: debug, error, fatal, info, silent, trace, warn)\n'
    );
  });

  it('CliSessionsEmpty reports no sessions', async () => {
    const { io, output } = createIo();

    await expect(runCli(['sessions', 'list'], io)).resolves.toBe(0);
    expect(output.stdout).toBe('No sleep sessions recorded\n');
  });

  it('CliSessionsShowMissing fails for an unknown id', async () => {
    const { io, output } = createIo();

    await expect(runCli(['sessions', 'show', 'nope'], io)).resolves.toBe(1);
    expect(output.stderr).toBe('Sleep session not found: nope\n');
  });

  it('CliSessionsBadLimit rejects a non-integer limit', async () => {
    const { io, output } = createIo();

    await expect(runCli(['sessions', 'list', '--limit', 'x'], io)).resolves.toBe(1);
    expect(output.stderr).toBe('--limit requires a positive integer\n');
  });

  it('CliAnalyzeJson reports stats without saving', async () => {
    const frames = writeFrames(12);
    const config = writeConfig(tempDir());
    const { io, output } = createIo();

    await expect(runCli(['analyze', frames, '--config', config, '--json', '--no-save'], io)).resolves.toBe(0);

    const report: unknown = JSON.parse(output.stdout);
    expect(report).toMatchObject({
      frames: 12,
      failed: 0,
      saved: false,
      stats: { currentState: 'calibrating', framesProcessed: 12, calibrated: true },
      session: { totalSleepSeconds: 0, wakeUpCount: 0 }
    });
    expect(listEvents()).toEqual([]);

    const listing = createIo();
    await runCli(['sessions', 'list'], listing.io);
    expect(listing.output.stdout).toBe('No sleep sessions recorded\n');
  });

  it('CliAnalyzeSave stores the session for later listing', async () => {
    const frames = writeFrames(12);
    const config = writeConfig(tempDir());
    const analyze = createIo();

    await expect(runCli(['analyze', frames, '--config', config], analyze.io)).resolves.toBe(0);

    const lines = analyze.output.stdout.trim().split('\n');
    expect(lines[0]).toBe('Frames analyzed: 12/12');
    expect(lines[1]).toBe('Final state: calibrating');
    const sessionLine = lines[lines.length - 1];
    expect(sessionLine).toMatch(/^Session: .+ \(saved\)$/);
    const sessionId = sessionLine.slice('Session: '.length, -' (saved)'.length);

    const listing = createIo();
    await expect(runCli(['sessions', 'list'], listing.io)).resolves.toBe(0);
    expect(listing.output.stdout.startsWith(`${sessionId}  `)).toBe(true);

    const show = createIo();
    await expect(runCli(['sessions', 'show', sessionId], show.io)).resolves.toBe(0);
    expect(JSON.parse(show.output.stdout)).toMatchObject({ id: sessionId, totalSleepSeconds: 0 });
    expect(listEvents({ detector: 'sleep-session' })).toHaveLength(1);
  });

  it('CliAnalyzeSkipsBrokenFrames keeps going after a bad PNG', async () => {
    const frames = writeFrames(4);
    fs.writeFileSync(path.join(frames, 'broken.png'), 'not a png');
    const config = writeConfig(tempDir());
    const { io, output } = createIo();

    await expect(runCli(['analyze', frames, '--config', config, '--json', '--no-save'], io)).resolves.toBe(0);

    expect(output.stderr).toMatch(/^Skipping broken\.png: /);
    expect(JSON.parse(output.stdout)).toMatchObject({ frames: 5, failed: 1 });
  });

  it('CliAnalyzeMissingDirectory fails', async () => {
    const missing = path.join(tempDir(), 'absent');
    const { io, output } = createIo();

    await expect(runCli(['analyze', missing, '--no-save'], io)).resolves.toBe(1);
    expect(output.stderr.startsWith(`Cannot read ${missing}: `)).toBe(true);
  });

  it('CliAnalyzeEmptyDirectory fails', async () => {
    const empty = tempDir();
    const { io, output } = createIo();

    await expect(runCli(['analyze', empty, '--no-save'], io)).resolves.toBe(1);
    expect(output.stderr).toBe(`No PNG frames found in ${empty}\n`);
  });

  it('CliAnalyzeArguments rejects bad options', async () => {
    const { io, output } = createIo();

    await expect(runCli(['analyze', '--fps', '0'], io)).resolves.toBe(1);
    expect(output.stderr).toBe('--fps requires a positive number\nMissing frames directory\n');
  });
});

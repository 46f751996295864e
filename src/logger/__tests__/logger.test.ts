import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { closeLogfileDestination, createDiagnostics, openLogfileDestination } from '../index.js';

function createCapture() {
  const lines: string[] = [];
  return {
    lines,
    write(data: string): void {
      lines.push(data);
    },
  };
}

describe('createDiagnostics', () => {
  it('is silent by default', () => {
    const capture = createCapture();
    const diagnostics = createDiagnostics(undefined, capture);
    diagnostics.error('not shown');
    expect(diagnostics.level).toBe('silent');
    expect(capture.lines).toEqual([]);
  });

  it('writes JSON lines at or above the configured level', () => {
    const capture = createCapture();
    const diagnostics = createDiagnostics('info', capture);
    diagnostics.debug('below the level');
    diagnostics.info({ path: 'run.log' }, 'logfile opened');

    expect(capture.lines).toHaveLength(1);
    const record: unknown = JSON.parse(capture.lines[0] ?? '');
    expect(record).toMatchObject({
      level: 30,
      name: 'herald',
      path: 'run.log',
      msg: 'logfile opened',
    });
    expect(record).toHaveProperty('time', expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/));
  });
});

describe('logfile destinations', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'herald-logger-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes synchronously and creates the directory', () => {
    const path = join(dir, 'sub', 'run.log');
    const dest = openLogfileDestination(path);
    dest.write('one\n');
    expect(readFileSync(path, 'utf8')).toBe('one\n');
    dest.write('two\n');
    closeLogfileDestination(dest);
    expect(readFileSync(path, 'utf8')).toBe('one\ntwo\n');
  });

  it('truncates an existing file', () => {
    const path = join(dir, 'run.log');
    const first = openLogfileDestination(path);
    first.write('old\n');
    closeLogfileDestination(first);
    const second = openLogfileDestination(path);
    second.write('new\n');
    closeLogfileDestination(second);
    expect(existsSync(path)).toBe(true);
    expect(readFileSync(path, 'utf8')).toBe('new\n');
  });
});

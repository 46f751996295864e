// Logfile targets: a path, an open stream, or an in-memory cache that is
// replayed once a real logfile is attached.

import { existsSync, renameSync } from 'node:fs';
import { closeLogfileDestination, openLogfileDestination } from '../logger/index.js';
import type { LogfileStream, OutputStream } from '../types/output.js';

/** Holds log text until a real logfile is available. */
export class LoggingCache implements OutputStream {
  private readonly chunks: string[] = [];

  write(data: string): boolean {
    this.chunks.push(data);
    return true;
  }

  text(): string {
    return this.chunks.join('');
  }

  /** Copy everything cached into `target`. */
  replay(target: OutputStream): void {
    for (const chunk of this.chunks) target.write(chunk);
  }
}

export type LogfileTarget = string | boolean | OutputStream;

/** An attached logfile. `owned` files were opened here and are closed here. */
export interface Logfile {
  readonly stream: LogfileStream;
  readonly owned: boolean;
  readonly path?: string;
}

/**
 * Open a logfile by path. With `prevSuffix`, an existing file is first
 * renamed by appending the suffix.
 */
export function openLogfile(path: string, prevSuffix?: string): Logfile {
  if (prevSuffix && existsSync(path)) renameSync(path, path + prevSuffix);
  return { stream: openLogfileDestination(path), owned: true, path };
}

export function closeLogfile(logfile: Logfile): void {
  if (logfile.owned) {
    closeLogfileDestination(logfile.stream);
  } else {
    logfile.stream.flushSync?.();
  }
}

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

/** e.g. "Monday, 19 October 2026 at 3:04:05 PM" */
export function formatInvocationTime(date: Date): string {
  const hours = date.getHours() % 12 || 12;
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  const meridiem = date.getHours() < 12 ? 'AM' : 'PM';
  return (
    `${WEEKDAYS[date.getDay()] ?? ''}, ${date.getDate()} ${MONTHS[date.getMonth()] ?? ''} ` +
    `${date.getFullYear()} at ${hours}:${minutes}:${seconds} ${meridiem}`
  );
}

export interface LogfileHeaderInput {
  progName: string;
  version?: string;
  argv: readonly string[];
  date: Date;
}

/** The lines that open every logfile. */
export function logfileHeader(input: LogfileHeaderInput): string[] {
  const lines: string[] = [];
  if (input.progName && input.version) {
    lines.push(`${input.progName}: version ${input.version}`);
  }
  const when = formatInvocationTime(input.date);
  lines.push(
    input.argv.length > 0
      ? `Invoked as '${input.argv.join(' ')}' on ${when}.`
      : `Invoked on ${when}.`,
  );
  return lines;
}

import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';
import type { DiagnosticsLevel } from '../types/config.js';
import type { LogfileStream } from '../types/output.js';

export type Diagnostics = Logger;

/**
 * The library's own logger. Silent unless a level is configured; writes
 * JSON lines synchronously to stderr, or to `destination` when given.
 */
export function createDiagnostics(
  level: DiagnosticsLevel = 'silent',
  destination?: DestinationStream,
): Diagnostics {
  return pino(
    {
      name: 'herald',
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination ?? pino.destination({ dest: 2, sync: true }),
  );
}

/**
 * Open a logfile through pino's SonicBoom destination. Writes are
 * synchronous so termination can flush and close without waiting.
 * The file is truncated and its directory created if needed.
 */
export function openLogfileDestination(path: string): LogfileStream {
  return pino.destination({ dest: path, sync: true, append: false, mkdir: true });
}

/** Flush, then close, a destination the session owns. */
export function closeLogfileDestination(dest: LogfileStream): void {
  dest.flushSync?.();
  dest.end?.();
}

// Stream types shared by sessions, logfiles and progress bars

/** Minimal writable interface for testability. */
export interface OutputStream {
  write(data: string): boolean;
  isTTY?: boolean;
  /** Node streams report write failures such as EPIPE through `'error'`. */
  on?(event: 'error', listener: (err: Error) => void): unknown;
}

/** A logfile destination the session owns and may flush or close. */
export interface LogfileStream extends OutputStream {
  flushSync?(): void;
  end?(): void;
}

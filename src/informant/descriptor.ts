// Informant descriptors: what kind of message an informant emits and
// under which session settings it reaches each destination.

import type { ColorName } from '../output/colors.js';
import type { Session } from '../session/index.js';

/** A destination gate: fixed, or computed from the session's settings. */
export type Gate = boolean | ((session: Session) => boolean);

export interface InformantDescriptor {
  /** Identifies the informant in diagnostics and `with` copies. */
  kind: string;
  severity?: string;
  isError: boolean;
  log: Gate;
  output: Gate;
  notify: Gate;
  /** Exit status after dispatch; `true` means 1. */
  terminate: false | true | number;
  isContinuation: boolean;
  messageColor?: ColorName;
  headerColor?: ColorName;
}

export type DescriptorOverrides = Partial<InformantDescriptor>;

export function resolveGate(gate: Gate, session: Session): boolean {
  return typeof gate === 'function' ? gate(session) : gate;
}

/** Copy only the descriptor fields of `source`, which may be a callable informant. */
export function descriptorOf(source: InformantDescriptor): InformantDescriptor {
  return {
    kind: source.kind,
    severity: source.severity,
    isError: source.isError,
    log: source.log,
    output: source.output,
    notify: source.notify,
    terminate: source.terminate,
    isContinuation: source.isContinuation,
    messageColor: source.messageColor,
    headerColor: source.headerColor,
  };
}

export function defineDescriptor(
  kind: string,
  fields: DescriptorOverrides = {},
): InformantDescriptor {
  return {
    kind,
    isError: false,
    log: true,
    output: true,
    notify: false,
    terminate: false,
    isContinuation: false,
    ...fields,
  };
}

const unlessMuted = (session: Session): boolean => !session.mute;
const unlessQuiet = (session: Session): boolean => !session.quiet && !session.mute;

export const LOG = defineDescriptor('log', { output: false });

export const COMMENT = defineDescriptor('comment', {
  output: (session) => session.verbose && unlessQuiet(session),
  messageColor: 'cyan',
});

export const CODICIL = defineDescriptor('codicil', { isContinuation: true });

export const NARRATE = defineDescriptor('narrate', {
  output: (session) => session.narrate && unlessQuiet(session),
  messageColor: 'blue',
});

export const DISPLAY = defineDescriptor('display', { output: unlessQuiet });

export const OUTPUT = defineDescriptor('output', { output: unlessMuted });

export const NOTIFY = defineDescriptor('notify', { output: unlessQuiet, notify: true });

export const DEBUG = defineDescriptor('debug', {
  severity: 'DEBUG',
  headerColor: 'magenta',
});

export const WARN = defineDescriptor('warn', {
  severity: 'warning',
  output: unlessQuiet,
  headerColor: 'yellow',
});

export const ERROR = defineDescriptor('error', {
  severity: 'error',
  isError: true,
  output: unlessMuted,
  headerColor: 'red',
});

export const FATAL = defineDescriptor('fatal', {
  severity: 'error',
  isError: true,
  output: unlessMuted,
  terminate: 1,
  headerColor: 'red',
});

export const PANIC = defineDescriptor('panic', {
  severity: 'internal error (please report)',
  isError: true,
  terminate: 3,
  headerColor: 'red',
});

/** True for descriptors and for callable informants carrying descriptor fields. */
export function isDescriptor(value: unknown): value is InformantDescriptor {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'kind' in value &&
    typeof value.kind === 'string' &&
    'isContinuation' in value &&
    typeof value.isContinuation === 'boolean'
  );
}

/** The built-in descriptors by name. */
export const BUILTINS: ReadonlyMap<string, InformantDescriptor> = new Map(
  [LOG, COMMENT, CODICIL, NARRATE, DISPLAY, OUTPUT, NOTIFY, DEBUG, WARN, ERROR, FATAL, PANIC].map(
    (descriptor) => [descriptor.kind, descriptor],
  ),
);

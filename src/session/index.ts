/**
 * Session: the settings and state every informant call is dispatched
 * against.
 *
 * Owns the output streams, the logfile, the culprit stack, the error count
 * and the record of the last message (which continuations such as
 * `codicil` reuse). Creating a session activates it unless
 * `activate: false` is passed.
 */

import { basename } from 'node:path';
import {
  joinCulprit as joinCulpritText,
  CulpritStack,
  scoped,
} from '../culprit/index.js';
import {
  indent,
  join,
  layoutMessage,
  namedValues,
  renderCodicils,
  splitArguments,
} from '../compose/index.js';
import { HeraldError } from '../errors/index.js';
import {
  PANIC,
  resolveGate,
  type InformantDescriptor,
} from '../informant/descriptor.js';
import { createDiagnostics, type Diagnostics } from '../logger/index.js';
import { SystemNotifier } from '../notifications/system.js';
import { colorize, isTTY, stripColors } from '../output/colors.js';
import {
  SessionSettingsSchema,
  type Colorscheme,
  type SessionSettings,
} from '../types/config.js';
import type { Culprit, CulpritPart } from '../types/message.js';
import type { NotificationSink, NotificationUrgency } from '../types/notification.js';
import type { OutputStream } from '../types/output.js';
import { osError } from '../utils/index.js';
import {
  LoggingCache,
  closeLogfile,
  logfileHeader,
  openLogfile,
  type Logfile,
  type LogfileTarget,
} from './logfile.js';
import { activateSession, deactivateSession } from './stack.js';
import { resolveStreamPolicy, type StreamPolicy, type StreamPolicyFn } from './stream-policy.js';

export { LoggingCache } from './logfile.js';
export type { LogfileTarget } from './logfile.js';
export { STREAM_POLICY_FNS, resolveStreamPolicy } from './stream-policy.js';
export type { StreamPolicy, StreamPolicyFn } from './stream-policy.js';

export interface SessionOptions
  extends Partial<Omit<SessionSettings, 'logfile' | 'streamPolicy' | 'diagnostics'>> {
  logfile?: LogfileTarget;
  streamPolicy?: StreamPolicy;
  /** Command line; `argv[0]` names the program. Defaults to the process's. */
  argv?: readonly string[];
  /** Called once, just before the session terminates. */
  terminationCallback?: () => void;
  stdout?: OutputStream;
  stderr?: OutputStream;
  notifier?: NotificationSink;
  exit?: (status: number) => void;
  /** A pino logger, or the level for a new one. */
  diagnostics?: Diagnostics | SessionSettings['diagnostics'];
  activate?: boolean;
  /** User attributes, read back with `get`. */
  extra?: Record<string, unknown>;
}

export interface TerminateOptions {
  /** When false, return the status instead of exiting. */
  exit?: boolean;
}

export interface ReportOptions {
  /**
   * When false the message is not recorded as the one a `codicil`
   * continues. Progress bars report this way.
   */
  remember?: boolean;
}

/** Anything drawing on the console that must end its line before output. */
export interface Interruptible {
  interrupt(): void;
}

interface Gates {
  output: boolean;
  log: boolean;
  notify: boolean;
}

interface MessageRecord {
  informant: InformantDescriptor;
  gates: Gates;
  stream: OutputStream;
  /** Indent stops for continuations of this message. */
  indent: number;
}

const guardedStreams = new WeakSet<OutputStream>();

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export class Session {
  mute: boolean;
  quiet: boolean;
  verbose: boolean;
  narrate: boolean;
  colorscheme: Colorscheme;
  lengthThresh: number;
  culpritSep: string;
  errorStatus: number;
  notifyIfNoTty: boolean;
  flush: boolean;
  stdout: OutputStream;
  stderr: OutputStream;

  readonly version?: string;
  readonly argv: readonly string[];
  readonly diagnostics: Diagnostics;

  private readonly progName: string;
  private readonly showProgName: boolean;
  private readonly prevLogfileSuffix?: string;
  private readonly extra: Readonly<Record<string, unknown>>;
  private readonly exitFn: (status: number) => void;
  private readonly culprits = new CulpritStack();
  private terminationCallback?: () => void;
  private notifier?: NotificationSink;
  private policy: StreamPolicyFn;
  private logfile?: Logfile;
  private errorCount = 0;
  private lastMessage?: MessageRecord;
  private progress?: Interruptible;

  constructor(options: SessionOptions = {}) {
    const {
      logfile,
      streamPolicy,
      argv,
      terminationCallback,
      stdout,
      stderr,
      notifier,
      exit,
      diagnostics,
      activate,
      extra,
      ...rest
    } = options;

    const parsed = SessionSettingsSchema.safeParse({
      ...rest,
      diagnostics: typeof diagnostics === 'string' ? diagnostics : undefined,
    });
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new HeraldError(`invalid session settings (${issues}).`);
    }
    const settings = parsed.data;

    this.mute = settings.mute;
    this.quiet = settings.quiet;
    this.verbose = settings.quiet ? false : settings.verbose;
    this.narrate = settings.quiet ? false : settings.narrate;
    this.colorscheme = settings.colorscheme;
    this.lengthThresh = settings.lengthThresh;
    this.culpritSep = settings.culpritSep;
    this.errorStatus = settings.errorStatus;
    this.notifyIfNoTty = settings.notifyIfNoTty;
    this.flush = settings.flush;
    this.version = settings.version;
    this.prevLogfileSuffix = settings.prevLogfileSuffix;

    this.argv = argv ?? process.argv.slice(1);
    const argv0 = this.argv[0];
    this.progName =
      typeof settings.progName === 'string' ? settings.progName : argv0 ? basename(argv0) : '';
    this.showProgName = settings.progName !== false;

    this.stdout = stdout ?? process.stdout;
    this.stderr = stderr ?? process.stderr;
    this.diagnostics =
      diagnostics === undefined || typeof diagnostics === 'string'
        ? createDiagnostics(settings.diagnostics)
        : diagnostics;
    this.notifier = notifier;
    this.exitFn = exit ?? ((status) => process.exit(status));
    this.terminationCallback = terminationCallback;
    this.extra = { ...extra };
    this.policy = resolveStreamPolicy(streamPolicy ?? settings.streamPolicy);

    this.setLogfile(logfile ?? settings.logfile);
    if (activate !== false) {
      activateSession(this);
      this.diagnostics.debug({ progName: this.progName }, 'session activated');
    }
  }

  /** A user attribute passed in `extra`, `undefined` when absent. */
  get(name: string): unknown {
    return this.extra[name];
  }

  getProgName(): string {
    return this.progName;
  }

  /** Turn console output off or back on. */
  suppressOutput(mute = true): void {
    this.mute = mute;
  }

  setStreamPolicy(policy: StreamPolicy): void {
    this.policy = resolveStreamPolicy(policy);
  }

  // -- culprits -------------------------------------------------------------

  /** Replace the culprit while `fn` runs. */
  setCulprit<T>(culprit: Culprit, fn: () => T): T {
    return this.culprits.set(culprit, fn);
  }

  /** Extend the culprit while `fn` runs. */
  addCulprit<T>(culprit: Culprit, fn: () => T): T {
    return this.culprits.add(culprit, fn);
  }

  getCulprit(extra?: Culprit | null): CulpritPart[] {
    return this.culprits.get(extra);
  }

  joinCulprit(extra?: Culprit | null): string {
    return joinCulpritText(this.getCulprit(extra), this.culpritSep);
  }

  // -- logfile --------------------------------------------------------------

  /**
   * Attach a logfile: a path, `true` for `.<prog>.log`, a stream, or
   * `false` for none. The previous logfile is closed; a LoggingCache it
   * held is replayed into the new one. A path that cannot be opened is
   * reported on stderr and the previous logfile is kept.
   */
  setLogfile(target: LogfileTarget): void {
    const previous = this.logfile;
    let next: Logfile | undefined;
    if (target !== false) {
      const path = target === true ? `.${this.progName || 'herald'}.log` : target;
      if (typeof path !== 'string') {
        next = { stream: path, owned: false };
      } else {
        try {
          next = openLogfile(path, this.prevLogfileSuffix);
        } catch (err) {
          // The previous logfile, if any, stays attached.
          this.diagnostics.error({ err, path }, 'cannot open logfile');
          this.write(this.stderr, osError(err) + '\n');
          return;
        }
      }
    }

    this.logfile = next;
    if (previous) this.closeQuietly(previous);
    if (!next) return;

    if (previous?.stream instanceof LoggingCache) {
      previous.stream.replay(next.stream);
    } else {
      const lines = logfileHeader({
        progName: this.progName,
        version: this.version,
        argv: this.argv,
        date: new Date(),
      });
      next.stream.write(lines.map((line) => line + '\n').join(''));
    }
  }

  flushLogfile(): void {
    this.logfile?.stream.flushSync?.();
  }

  closeLogfile(): void {
    const logfile = this.logfile;
    this.logfile = undefined;
    if (logfile) closeLogfile(logfile);
  }

  private closeQuietly(logfile: Logfile): void {
    try {
      closeLogfile(logfile);
    } catch (err) {
      this.diagnostics.warn({ err }, 'cannot close logfile');
    }
  }

  private writeLog(text: string, flush: boolean): void {
    const logfile = this.logfile;
    if (!logfile) return;
    this.write(logfile.stream, stripColors(text));
    if (flush) logfile.stream.flushSync?.();
  }

  // -- progress -------------------------------------------------------------

  /** Register the bar currently drawing; output interrupts it first. */
  attachProgress(bar: Interruptible): void {
    this.progress = bar;
  }

  detachProgress(bar: Interruptible): void {
    if (this.progress === bar) this.progress = undefined;
  }

  // -- dispatch -------------------------------------------------------------

  /** The header for a message of this informant, e.g. `"prog error: "`. */
  header(informant: InformantDescriptor): string {
    if (!informant.severity) return '';
    return this.showProgName && this.progName
      ? `${this.progName} ${informant.severity}: `
      : `${informant.severity}: `;
  }

  /**
   * Compose a message and send it to the destinations the informant's gates
   * allow. A message that cannot be composed is reported through `panic`.
   */
  report(
    informant: InformantDescriptor,
    args: readonly unknown[],
    options: ReportOptions = {},
  ): void {
    try {
      this.dispatch(informant, args, options.remember ?? true);
    } catch (err) {
      if (informant.kind === PANIC.kind || !(err instanceof HeraldError)) throw err;
      this.dispatch(PANIC, [err.render()]);
    }
  }

  private dispatch(
    informant: InformantDescriptor,
    args: readonly unknown[],
    remember = true,
  ): void {
    const { args: positional, options } = splitArguments(args);
    const continuation = informant.isContinuation;
    const record = continuation ? this.lastMessage : undefined;
    const action = record?.informant ?? informant;
    const gates: Gates = record?.gates ?? {
      output: resolveGate(informant.output, this),
      log: resolveGate(informant.log, this),
      notify: resolveGate(informant.notify, this),
    };

    const culprit =
      'culprit' in options
        ? joinCulpritText(options.culprit, this.culpritSep)
        : continuation
          ? ''
          : this.joinCulprit();
    const layout = layoutMessage({
      header: continuation ? '' : this.header(informant),
      culprit,
      body: join(positional, namedValues(options), options),
      codicils: renderCodicils(options.codicil, options.wrap),
      lengthThresh: this.lengthThresh,
    });
    const body = record ? indent(layout.body, record.indent) : layout.body;
    const end = options.end ?? '\n';
    const flush = options.flush ?? this.flush;
    const stream = options.file ?? record?.stream ?? this.policy(action, this.stdout, this.stderr);

    if (gates.output) {
      const colored = isTTY(stream);
      const text =
        colorize(layout.header, action.headerColor, this.colorscheme, colored) +
        colorize(body, action.messageColor, this.colorscheme, colored);
      this.progress?.interrupt();
      this.write(stream, text + end);
    }
    if (gates.log) this.writeLog(layout.header + body + end, flush);
    if (gates.notify || (this.notifyIfNoTty && action.isError && !isTTY(stream))) {
      this.sendNotification(body, options.urgency ?? (action.isError ? 'critical' : 'normal'));
    }

    if (continuation) return;
    if (informant.isError) this.errorCount++;
    if (remember) this.lastMessage = { informant, gates, stream, indent: layout.header ? 1 : 0 };
    if (informant.terminate !== false) {
      this.terminate(informant.terminate === true ? 1 : informant.terminate);
    }
  }

  private write(stream: OutputStream, text: string): void {
    this.guard(stream);
    try {
      stream.write(text);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'EPIPE') {
        this.diagnostics.debug({ err }, 'broken pipe; output dropped');
        return;
      }
      throw err;
    }
  }

  /** Drop broken pipes that a Node stream reports after `write` returns. */
  private guard(stream: OutputStream): void {
    if (!stream.on || guardedStreams.has(stream)) return;
    guardedStreams.add(stream);
    stream.on('error', (err) => {
      if (isErrnoException(err) && err.code === 'EPIPE') {
        this.diagnostics.debug({ err }, 'broken pipe; output dropped');
        return;
      }
      throw err;
    });
  }

  private sendNotification(body: string, urgency: NotificationUrgency): void {
    const notifier = (this.notifier ??= new SystemNotifier(this.diagnostics));
    notifier.send({ title: this.progName || 'herald', body: stripColors(body), urgency });
  }

  // -- errors & termination -------------------------------------------------

  /** Number of errors reported so far; `reset` zeroes the count. */
  errorsAccrued(reset = false): number {
    const count = this.errorCount;
    if (reset) this.errorCount = 0;
    return count;
  }

  /** Terminate normally. */
  done(options: TerminateOptions = {}): number {
    return this.terminate(0, options);
  }

  /**
   * Terminate the program. With no status (or `true`) the status is
   * `errorStatus` if errors accrued, else 0. A string status is written to
   * stderr and yields `errorStatus`.
   */
  terminate(status?: number | boolean | string, options: TerminateOptions = {}): number {
    let code: number;
    if (typeof status === 'string') {
      this.write(this.stderr, status + '\n');
      code = this.errorStatus;
    } else if (status === undefined || status === true) {
      code = this.errorCount > 0 ? this.errorStatus : 0;
    } else if (status === false) {
      code = 0;
    } else {
      code = status;
    }

    const callback = this.terminationCallback;
    this.terminationCallback = undefined;
    callback?.();

    const name = this.progName || 'program';
    this.writeLog(
      code === 0 ? `${name}: terminates normally.\n` : `${name}: terminates with status ${code}.\n`,
      false,
    );
    this.closeLogfile();

    if (options.exit === false) return code;
    this.exitFn(code);
    return code;
  }

  /** Terminate with `status` only if errors accrued. */
  terminateIfErrors(
    status: number = this.errorStatus,
    options: TerminateOptions = {},
  ): number | undefined {
    if (this.errorCount === 0) return undefined;
    return this.terminate(status, options);
  }

  // -- scope ----------------------------------------------------------------

  /** Remove this session from the stack, restoring the one below. */
  disconnect(): void {
    deactivateSession(this);
  }

  /** Run `fn` with this session active; it is disconnected afterwards. */
  run<T>(fn: () => T): T {
    return scoped(
      () => activateSession(this),
      () => this.disconnect(),
      fn,
    );
  }
}

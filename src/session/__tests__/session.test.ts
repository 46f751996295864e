import { describe, it, expect, afterEach, vi } from 'vitest';
import { Writable } from 'node:stream';
import ansis from 'ansis';
import { HeraldError } from '../../errors/index.js';
import {
  codicil,
  comment,
  display,
  error,
  fatal,
  log,
  narrate,
  notify,
  output,
  warn,
} from '../../informant/index.js';
import { createDiagnostics } from '../../logger/index.js';
import type { DesktopNotification, NotificationSink } from '../../types/notification.js';
import { LoggingCache, Session, resolveStreamPolicy, type SessionOptions } from '../index.js';

function createMockOutput(isTTY = false) {
  const chunks: string[] = [];
  return {
    chunks,
    isTTY,
    write(data: string): boolean {
      chunks.push(data);
      return true;
    },
    text(): string {
      return chunks.join('');
    },
  };
}

function createMockNotifier() {
  const sent: DesktopNotification[] = [];
  const notifier: NotificationSink = {
    name: 'mock',
    send(notification: DesktopNotification): void {
      sent.push(notification);
    },
  };
  return { notifier, sent };
}

const sessions: Session[] = [];

function makeSession(options: SessionOptions = {}) {
  const stdout = createMockOutput();
  const stderr = createMockOutput();
  const exit = vi.fn();
  const session = new Session({ progName: 'myprog', argv: ['myprog'], stdout, stderr, exit, ...options });
  sessions.push(session);
  return { session, stdout, stderr, exit };
}

afterEach(() => {
  for (const session of sessions.splice(0)) session.disconnect();
});

describe('dispatch', () => {
  it('display joins its arguments onto stdout', () => {
    const { stdout, stderr } = makeSession();
    display('ice', 9);
    expect(stdout.text()).toBe('ice 9\n');
    expect(stderr.chunks).toEqual([]);
  });

  it('error adds header and culprit and counts the error', () => {
    const { session, stdout } = makeSession();
    error('file not found.', { culprit: 'data.in' });
    expect(stdout.text()).toBe('myprog error: data.in: file not found.\n');
    expect(session.errorsAccrued()).toBe(1);
  });

  it('fatal writes to stderr and exits with status 1', () => {
    const { stdout, stderr, exit } = makeSession();
    fatal('bad input.', { culprit: 'cfg' });
    expect(stderr.text()).toBe('myprog error: cfg: bad input.\n');
    expect(stdout.chunks).toEqual([]);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('codicil continues the previous message without a header', () => {
    const { stdout } = makeSession();
    warn('file not found.', { culprit: 'ghost' });
    codicil('skipping');
    expect(stdout.chunks).toEqual(['myprog warning: ghost: file not found.\n', '    skipping\n']);
  });

  it('codicil follows the previous message to its stream', () => {
    const { stdout, stderr } = makeSession({ streamPolicy: 'header' });
    warn('careful');
    codicil('really');
    expect(stderr.chunks).toEqual(['myprog warning: careful\n', '    really\n']);
    expect(stdout.chunks).toEqual([]);
  });

  it('codicil is suppressed along with the message it continues', () => {
    const { stdout } = makeSession({ quiet: true });
    warn('hidden');
    codicil('also hidden');
    expect(stdout.chunks).toEqual([]);
  });

  it('codicil without a previous message stands alone', () => {
    const { stdout } = makeSession();
    codicil('skipping');
    expect(stdout.text()).toBe('skipping\n');
  });

  it('continuations are not counted as errors', () => {
    const { session } = makeSession();
    error('broken');
    codicil('details');
    expect(session.errorsAccrued()).toBe(1);
  });

  it('hides the program name when progName is false', () => {
    const { stdout } = makeSession({ progName: false, argv: ['/usr/bin/tool'] });
    error('x');
    expect(stdout.text()).toBe('error: x\n');
  });

  it('derives the program name from argv', () => {
    const { session, stdout } = makeSession({ progName: true, argv: ['/usr/bin/tool', '-v'] });
    warn('x');
    expect(stdout.text()).toBe('tool warning: x\n');
    expect(session.getProgName()).toBe('tool');
  });

  it('moves a long message below its header', () => {
    const { stdout } = makeSession({ lengthThresh: 20 });
    warn('this body is rather long');
    expect(stdout.text()).toBe('myprog warning:\n    this body is rather long\n');
  });

  it('writes to the per-call file', () => {
    const { stdout } = makeSession();
    const other = createMockOutput();
    display('elsewhere', { file: other });
    expect(other.text()).toBe('elsewhere\n');
    expect(stdout.chunks).toEqual([]);
  });

  it('honors end and sep', () => {
    const { stdout } = makeSession();
    display('a', 'b', { sep: '-', end: '' });
    expect(stdout.text()).toBe('a-b');
  });

  it('fills named values from the options object', () => {
    const { stdout } = makeSession();
    display({ template: '{n} of {total} done', n: 3, total: 7 });
    expect(stdout.text()).toBe('3 of 7 done\n');
  });

  it('reports composition failures through panic', () => {
    const { stderr, exit } = makeSession();
    display({ template: '{oops' });
    expect(stderr.text()).toBe(
      "myprog internal error (please report): {oops: Unmatched '{' in template.\n",
    );
    expect(exit).toHaveBeenCalledWith(3);
  });

  it('swallows broken pipes', () => {
    const { session } = makeSession();
    session.stdout = {
      write(): boolean {
        throw Object.assign(new Error('write EPIPE'), { code: 'EPIPE' });
      },
    };
    expect(() => display('lost')).not.toThrow();
  });

  it('drops broken pipes that a stream reports after the write', async () => {
    const lines: string[] = [];
    const diagnostics = createDiagnostics('debug', {
      write(line: string): void {
        lines.push(line);
      },
    });
    const stdout = new Writable({
      write(_chunk, _encoding, callback) {
        callback(Object.assign(new Error('write EPIPE'), { code: 'EPIPE' }));
      },
    });
    const closed = new Promise<void>((resolve) => {
      stdout.once('close', () => resolve());
    });
    makeSession({ stdout, diagnostics });

    display('hello');
    display('again');
    await closed;

    expect(stdout.listenerCount('error')).toBe(1);
    expect(lines.some((line) => line.includes('"msg":"broken pipe; output dropped"'))).toBe(true);
  });

  it('propagates other stream failures', () => {
    const { session } = makeSession();
    session.stdout = {
      write(): boolean {
        throw new Error('disk on fire');
      },
    };
    expect(() => display('lost')).toThrow('disk on fire');
  });
});

describe('colors', () => {
  it('colors the header when the stream is a TTY', () => {
    const stdout = createMockOutput(true);
    makeSession({ stdout });
    error('x');
    expect(stdout.text()).toBe(ansis.red('myprog error: ') + 'x\n');
  });

  it('uses bold colors for the light scheme', () => {
    const stdout = createMockOutput(true);
    makeSession({ stdout, colorscheme: 'light', verbose: true });
    comment('note');
    expect(stdout.text()).toBe(ansis.bold.cyan('note') + '\n');
  });

  it('does not color when the stream is not a TTY', () => {
    const { stdout } = makeSession();
    error('x');
    expect(stdout.text()).toBe('myprog error: x\n');
  });

  it('does not color under the none scheme', () => {
    const stdout = createMockOutput(true);
    makeSession({ stdout, colorscheme: 'none' });
    error('x');
    expect(stdout.text()).toBe('myprog error: x\n');
  });
});

describe('gates', () => {
  it('comment needs verbose', () => {
    const quiet = makeSession();
    comment('hidden');
    expect(quiet.stdout.chunks).toEqual([]);
    quiet.session.disconnect();

    const loud = makeSession({ verbose: true });
    comment('shown');
    expect(loud.stdout.text()).toBe('shown\n');
  });

  it('narrate needs narrate', () => {
    const { stdout } = makeSession({ narrate: true });
    narrate('step one');
    expect(stdout.text()).toBe('step one\n');
  });

  it('quiet turns off verbose and narrate', () => {
    const { session, stdout } = makeSession({ quiet: true, verbose: true, narrate: true });
    expect(session.verbose).toBe(false);
    expect(session.narrate).toBe(false);
    comment('a');
    narrate('b');
    display('c');
    output('d');
    expect(stdout.text()).toBe('d\n');
  });

  it('mute silences output but errors still count', () => {
    const { session, stdout } = makeSession({ mute: true });
    output('a');
    warn('b');
    error('c');
    expect(stdout.chunks).toEqual([]);
    expect(session.errorsAccrued()).toBe(1);
  });

  it('suppressOutput toggles mute', () => {
    const { session, stdout } = makeSession();
    session.suppressOutput();
    display('hidden');
    session.suppressOutput(false);
    display('shown');
    expect(stdout.text()).toBe('shown\n');
  });

  it('log writes nothing to the console but logs every call', () => {
    const cache = new LoggingCache();
    const { stdout } = makeSession({ logfile: cache });
    log('same line');
    log('same line');
    expect(stdout.chunks).toEqual([]);
    expect(cache.text().split('\n').slice(1)).toEqual(['same line', 'same line', '']);
  });

  it('informant fields can be changed in place', () => {
    const { stdout } = makeSession();
    const loud = display.with({ severity: 'note' });
    loud('x');
    expect(stdout.text()).toBe('myprog note: x\n');
    expect(display.severity).toBeUndefined();
  });
});

describe('stream policies', () => {
  it('header sends messages with a severity to stderr', () => {
    const { stdout, stderr } = makeSession({ streamPolicy: 'header' });
    display('plain');
    warn('careful');
    expect(stdout.text()).toBe('plain\n');
    expect(stderr.text()).toBe('myprog warning: careful\n');
  });

  it('errors sends only errors to stderr', () => {
    const { stdout, stderr } = makeSession({ streamPolicy: 'errors' });
    warn('careful');
    error('broken');
    expect(stdout.text()).toBe('myprog warning: careful\n');
    expect(stderr.text()).toBe('myprog error: broken\n');
  });

  it('all sends everything to stderr', () => {
    const { stdout, stderr } = makeSession({ streamPolicy: 'all' });
    display('a');
    expect(stdout.chunks).toEqual([]);
    expect(stderr.text()).toBe('a\n');
  });

  it('accepts a function', () => {
    const { stdout, stderr } = makeSession({
      streamPolicy: (informant, out, err) => (informant.kind === 'display' ? err : out),
    });
    display('a');
    output('b');
    expect(stderr.text()).toBe('a\n');
    expect(stdout.text()).toBe('b\n');
  });

  it('can be changed on a live session', () => {
    const { session, stderr } = makeSession();
    session.setStreamPolicy('all');
    display('a');
    expect(stderr.text()).toBe('a\n');
  });

  it('rejects unknown names', () => {
    expect(() => resolveStreamPolicy('bogus')).toThrow(HeraldError);
    expect(() => resolveStreamPolicy('bogus')).toThrow('bogus: unknown stream policy.');
  });
});

describe('notifications', () => {
  it('notify sends the body to the notifier', () => {
    const { notifier, sent } = createMockNotifier();
    const { stdout } = makeSession({ notifier });
    notify('build done');
    expect(stdout.text()).toBe('build done\n');
    expect(sent).toEqual([{ title: 'myprog', body: 'build done', urgency: 'normal' }]);
  });

  it('the call can set the urgency', () => {
    const { notifier, sent } = createMockNotifier();
    makeSession({ notifier });
    notify('fyi', { urgency: 'low' });
    expect(sent).toEqual([{ title: 'myprog', body: 'fyi', urgency: 'low' }]);
  });

  it('notifyIfNoTty also notifies errors written to a non-TTY stream', () => {
    const { notifier, sent } = createMockNotifier();
    const { stdout } = makeSession({ notifier, notifyIfNoTty: true });
    error('broken', { culprit: 'db' });
    warn('not an error');
    expect(stdout.text()).toBe('myprog error: db: broken\nmyprog warning: not an error\n');
    expect(sent).toEqual([{ title: 'myprog', body: 'db: broken', urgency: 'critical' }]);
  });

  it('notifyIfNoTty does nothing for a TTY', () => {
    const { notifier, sent } = createMockNotifier();
    makeSession({ notifier, notifyIfNoTty: true, stdout: createMockOutput(true) });
    error('broken');
    expect(sent).toEqual([]);
  });
});

describe('culprits', () => {
  it('set, add and restore', () => {
    const { session } = makeSession();
    session.setCulprit('x', () => {
      expect(session.getCulprit()).toEqual(['x']);
      session.addCulprit(1, () => {
        expect(session.getCulprit()).toEqual(['x', 1]);
        expect(session.joinCulprit()).toBe('x, 1');
      });
      expect(session.getCulprit()).toEqual(['x']);
    });
    expect(session.getCulprit()).toEqual([]);
  });

  it('messages pick up the active culprit', () => {
    const { session, stdout } = makeSession();
    session.addCulprit('cfg', () => warn('bad'));
    expect(stdout.text()).toBe('myprog warning: cfg: bad\n');
  });

  it('a per-call culprit replaces the active one', () => {
    const { session, stdout } = makeSession();
    session.addCulprit('cfg', () => warn('bad', { culprit: 'line 3' }));
    expect(stdout.text()).toBe('myprog warning: line 3: bad\n');
  });

  it('uses the session separator', () => {
    const { session } = makeSession({ culpritSep: ' / ' });
    expect(session.setCulprit(['a', 'b'], () => session.joinCulprit())).toBe('a / b');
  });
});

describe('termination', () => {
  it('terminate with no status reflects accrued errors', () => {
    const clean = makeSession();
    expect(clean.session.terminate(undefined, { exit: false })).toBe(0);
    clean.session.disconnect();

    const failed = makeSession({ errorStatus: 5 });
    error('x');
    failed.session.terminate();
    expect(failed.exit).toHaveBeenCalledWith(5);
  });

  it('a string status is written to stderr', () => {
    const { session, stderr, exit } = makeSession();
    expect(session.terminate('giving up')).toBe(1);
    expect(stderr.text()).toBe('giving up\n');
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('exit: false returns the status without exiting', () => {
    const { session, exit } = makeSession();
    expect(session.terminate(4, { exit: false })).toBe(4);
    expect(exit).not.toHaveBeenCalled();
  });

  it('done exits with 0', () => {
    const { session, exit } = makeSession();
    session.done();
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('calls the termination callback once', () => {
    const terminationCallback = vi.fn();
    const { session } = makeSession({ terminationCallback });
    session.terminate(0);
    session.terminate(0);
    expect(terminationCallback).toHaveBeenCalledTimes(1);
  });

  it('terminateIfErrors only terminates after errors', () => {
    const { session, exit } = makeSession();
    expect(session.terminateIfErrors()).toBeUndefined();
    expect(exit).not.toHaveBeenCalled();
    error('x');
    expect(session.terminateIfErrors()).toBe(1);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('errorsAccrued can reset the count', () => {
    const { session } = makeSession();
    error('a');
    error('b');
    expect(session.errorsAccrued(true)).toBe(2);
    expect(session.errorsAccrued()).toBe(0);
    error('c');
    expect(session.errorsAccrued()).toBe(1);
  });
});

describe('settings', () => {
  it('reads extra attributes', () => {
    const { session } = makeSession({ extra: { user: 'ann' } });
    expect(session.get('user')).toBe('ann');
    expect(session.get('nope')).toBeUndefined();
  });

  it('rejects invalid settings', () => {
    expect(() => new Session({ errorStatus: 0, activate: false })).toThrow(
      /invalid session settings \(errorStatus:/,
    );
  });
});

import { describe, it, expect, afterEach, vi } from 'vitest';
import { display, error } from '../../informant/index.js';
import { Session } from '../index.js';
import {
  errorsAccrued,
  getInformer,
  isActive,
  setCulprit,
  joinCulprit,
  setInformer,
  terminate,
  withSession,
} from '../stack.js';

function createMockOutput() {
  const chunks: string[] = [];
  return {
    chunks,
    write(data: string): boolean {
      chunks.push(data);
      return true;
    },
    text(): string {
      return chunks.join('');
    },
  };
}

const sessions: Session[] = [];

function makeSession(activate = true) {
  const stdout = createMockOutput();
  const exit = vi.fn();
  const session = new Session({ argv: ['myprog'], stdout, stderr: createMockOutput(), exit, activate });
  sessions.push(session);
  return { session, stdout, exit };
}

afterEach(() => {
  for (const session of sessions.splice(0)) session.disconnect();
});

describe('session stack', () => {
  it('a new session becomes the informer', () => {
    const { session } = makeSession();
    expect(getInformer()).toBe(session);
    expect(isActive(session)).toBe(true);
  });

  it('disconnecting restores the previous session', () => {
    const a = makeSession();
    const b = makeSession();
    display('to b');
    b.session.disconnect();
    display('to a');
    expect(getInformer()).toBe(a.session);
    expect(b.stdout.text()).toBe('to b\n');
    expect(a.stdout.text()).toBe('to a\n');
  });

  it('disconnecting a buried session leaves the top one active', () => {
    const a = makeSession();
    const b = makeSession();
    a.session.disconnect();
    expect(getInformer()).toBe(b.session);
  });

  it('falls back to a default session', () => {
    const { session } = makeSession();
    session.disconnect();
    const fallback = getInformer();
    expect(fallback).toBeInstanceOf(Session);
    expect(fallback).not.toBe(session);
    expect(getInformer()).toBe(fallback);
  });

  it('activate: false leaves the stack alone', () => {
    const a = makeSession();
    makeSession(false);
    expect(getInformer()).toBe(a.session);
  });

  it('setInformer returns the session it replaced', () => {
    const a = makeSession();
    const b = makeSession(false);
    expect(setInformer(b.session)).toBe(a.session);
    expect(getInformer()).toBe(b.session);
    expect(setInformer(a.session)).toBe(b.session);
    expect(getInformer()).toBe(a.session);
  });

  it('withSession activates a session only while the function runs', () => {
    const outer = makeSession();
    const inner = createMockOutput();
    const result = withSession({ argv: ['inner'], stdout: inner }, (session) => {
      expect(getInformer()).toBe(session);
      display('inside');
      return 42;
    });
    display('outside');
    expect(result).toBe(42);
    expect(inner.text()).toBe('inside\n');
    expect(outer.stdout.text()).toBe('outside\n');
  });

  it('withSession restores the stack when the function throws', () => {
    const outer = makeSession();
    expect(() =>
      withSession({ argv: ['inner'] }, () => {
        throw new Error('boom');
      }),
    ).toThrow('boom');
    expect(getInformer()).toBe(outer.session);
  });

  it('withSession restores the stack after a promise settles', async () => {
    const outer = makeSession();
    let inner: Session | undefined;
    const pending = withSession({ argv: ['inner'] }, async (session) => {
      inner = session;
      await Promise.resolve();
      expect(getInformer()).toBe(session);
    });
    await pending;
    expect(inner).toBeInstanceOf(Session);
    expect(getInformer()).toBe(outer.session);
  });

  it('shortcuts act on the active session', () => {
    const { session, exit } = makeSession();
    error('x');
    expect(errorsAccrued()).toBe(1);
    expect(setCulprit('cfg', () => joinCulprit())).toBe('cfg');
    expect(terminate(undefined, { exit: false })).toBe(1);
    expect(exit).not.toHaveBeenCalled();
    expect(session.errorsAccrued()).toBe(1);
  });
});

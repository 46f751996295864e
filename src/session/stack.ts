// The session stack. The most recently activated session receives every
// message; a default session sits underneath and is never removed.

import type { Culprit, CulpritPart } from '../types/message.js';
import { Session, type SessionOptions, type TerminateOptions } from './index.js';

const stack: Session[] = [];
let fallback: Session | undefined;

function defaultSession(): Session {
  fallback ??= new Session({ activate: false });
  return fallback;
}

/** The active session. */
export function getInformer(): Session {
  return stack[stack.length - 1] ?? defaultSession();
}

/** Make `session` active, moving it to the top if it is already stacked. */
export function activateSession(session: Session): void {
  if (session === fallback) return;
  deactivateSession(session);
  stack.push(session);
}

/** Remove `session` from the stack; the one below becomes active. */
export function deactivateSession(session: Session): void {
  const index = stack.lastIndexOf(session);
  if (index !== -1) stack.splice(index, 1);
}

export function isActive(session: Session): boolean {
  return getInformer() === session;
}

/** Activate `session` and return the session it replaced. */
export function setInformer(session: Session): Session {
  const previous = getInformer();
  activateSession(session);
  return previous;
}

/** Run `fn` with a fresh session that is disconnected however `fn` exits. */
export function withSession<T>(options: SessionOptions, fn: (session: Session) => T): T {
  const session = new Session({ ...options, activate: false });
  return session.run(() => fn(session));
}

// Shortcuts that act on the active session.

export function done(options?: TerminateOptions): number {
  return getInformer().done(options);
}

export function terminate(status?: number | boolean | string, options?: TerminateOptions): number {
  return getInformer().terminate(status, options);
}

export function terminateIfErrors(status?: number, options?: TerminateOptions): number | undefined {
  return getInformer().terminateIfErrors(status, options);
}

export function errorsAccrued(reset = false): number {
  return getInformer().errorsAccrued(reset);
}

export function getProgName(): string {
  return getInformer().getProgName();
}

export function setCulprit<T>(culprit: Culprit, fn: () => T): T {
  return getInformer().setCulprit(culprit, fn);
}

export function addCulprit<T>(culprit: Culprit, fn: () => T): T {
  return getInformer().addCulprit(culprit, fn);
}

export function getCulprit(extra?: Culprit | null): CulpritPart[] {
  return getInformer().getCulprit(extra);
}

export function joinCulprit(extra?: Culprit | null): string {
  return getInformer().joinCulprit(extra);
}

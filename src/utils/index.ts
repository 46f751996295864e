/**
 * Small helpers shared by the composer, sessions and errors.
 */

import type { RemovePolicy } from '../types/message.js';

/** True for `{}`-style objects: object literals and `Object.create(null)`. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Falsy in the broad sense used for template values: nullish, false, zero,
 * NaN, empty strings and empty collections.
 */
export function isFalsy(value: unknown): boolean {
  if (!value) return true;
  if (Array.isArray(value)) return value.length === 0;
  if (value instanceof Map || value instanceof Set) return value.size === 0;
  if (isPlainObject(value)) return Object.keys(value).length === 0;
  return false;
}

/** Returns a predicate that is true for values the remove policy culls. */
export function removalPredicate(
  remove: RemovePolicy,
  hasRemove: boolean,
): (value: unknown) => boolean {
  if (!hasRemove) return isFalsy;
  if (typeof remove === 'function') return remove;
  if (Array.isArray(remove)) {
    const members: readonly unknown[] = remove;
    return (value) => members.includes(value);
  }
  if (remove instanceof Set) {
    const members: ReadonlySet<unknown> = remove;
    return (value) => members.has(value);
  }
  return (value) => value === remove;
}

/**
 * Drop the culled items from a collection.
 * Without a policy, falsy items are removed.
 */
export function cull<T>(items: Iterable<T>, remove?: RemovePolicy): T[] {
  const culled = removalPredicate(remove, arguments.length > 1);
  return [...items].filter((item) => !culled(item));
}

/** Convert a message argument to text. */
export function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Error) return value.message;
  return String(value);
}

/** Add a period unless the sentence already ends with terminal punctuation. */
export function fullStop(sentence: unknown, end = '.', allow = '.?!'): string {
  const text = stringify(sentence);
  const last = text.slice(-1);
  return last && allow.includes(last) ? text : text + end;
}

const ERRNO_DESCRIPTIONS: Record<string, string> = {
  ENOENT: 'no such file or directory',
  EACCES: 'permission denied',
  EPERM: 'operation not permitted',
  EEXIST: 'file exists',
  EISDIR: 'is a directory',
  ENOTDIR: 'not a directory',
  ENOTEMPTY: 'directory not empty',
  EMFILE: 'too many open files',
  ENOSPC: 'no space left on device',
  EROFS: 'read-only file system',
  EPIPE: 'broken pipe',
};

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && ('code' in err || 'syscall' in err);
}

/**
 * Describe an operating system error as `"<path> -> <dest>: <description>."`.
 * Non-system errors fall back to their own message.
 */
export function osError(err: unknown): string {
  if (!isErrnoException(err)) return fullStop(stringify(err));
  const dest = 'dest' in err && typeof err.dest === 'string' ? err.dest : undefined;
  const paths = cull([err.path, dest]).join(' -> ');
  const description =
    (err.code !== undefined ? ERRNO_DESCRIPTIONS[err.code] : undefined) ??
    stripErrnoPrefix(err.message).toLowerCase();
  return fullStop(cull([paths, description]).join(': '));
}

// Node formats system errors as "ENOENT: no such file or directory, open 'x'"
function stripErrnoPrefix(message: string): string {
  const match = /^[A-Z]+: ([^,]+)/.exec(message);
  return match?.[1] ?? message;
}

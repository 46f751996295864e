/**
 * Culprits: the "who/where" labels prefixed to messages.
 *
 * A session owns one CulpritStack. `set` replaces the visible culprit and
 * `add` extends it; both last exactly as long as the callback they wrap.
 */

import type { Culprit, CulpritPart } from '../types/message.js';
import { stringify } from '../utils/index.js';

export const DEFAULT_CULPRIT_SEP = ', ';

/** Flatten a culprit into its parts, dropping nullish entries. */
export function culpritParts(culprit: Culprit | null | undefined): CulpritPart[] {
  if (culprit === null || culprit === undefined) return [];
  if (typeof culprit === 'string' || typeof culprit === 'number') return [culprit];
  const parts: CulpritPart[] = [];
  for (const part of culprit) {
    if (part !== null && part !== undefined) parts.push(part);
  }
  return parts;
}

/** Render a culprit by joining its parts. */
export function joinCulprit(
  culprit: Culprit | null | undefined,
  sep: string = DEFAULT_CULPRIT_SEP,
): string {
  return culpritParts(culprit).map(stringify).join(sep);
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Run `body` with `enter` applied, undoing it with `exit` on every path.
 * Promise results keep the scope open until they settle.
 */
export function scoped<T>(enter: () => void, exit: () => void, body: () => T): T {
  enter();
  let result: T;
  try {
    result = body();
  } catch (err) {
    exit();
    throw err;
  }
  if (isPromiseLike(result)) {
    void result.then(exit, exit);
    return result;
  }
  exit();
  return result;
}

interface CulpritFrame {
  readonly parts: readonly CulpritPart[];
  /** A `set` frame hides every frame below it. */
  readonly replaces: boolean;
}

export class CulpritStack {
  private frames: CulpritFrame[] = [];

  /** Replace the visible culprit while `body` runs. */
  set<T>(culprit: Culprit, body: () => T): T {
    return this.within({ parts: culpritParts(culprit), replaces: true }, body);
  }

  /** Append to the visible culprit while `body` runs. */
  add<T>(culprit: Culprit, body: () => T): T {
    return this.within({ parts: culpritParts(culprit), replaces: false }, body);
  }

  /** The visible culprit followed by `extra`. */
  get(extra?: Culprit | null): CulpritPart[] {
    let first = 0;
    this.frames.forEach((frame, index) => {
      if (frame.replaces) first = index;
    });
    const visible = this.frames.slice(first).flatMap((frame) => frame.parts);
    return [...visible, ...culpritParts(extra)];
  }

  get depth(): number {
    return this.frames.length;
  }

  // Each scope removes only its own frame, so async scopes may end in any order.
  private within<T>(frame: CulpritFrame, body: () => T): T {
    return scoped(
      () => {
        this.frames.push(frame);
      },
      () => {
        const index = this.frames.lastIndexOf(frame);
        if (index !== -1) this.frames.splice(index, 1);
      },
      body,
    );
  }
}

/**
 * ProgressBar: a one-line textual progress bar that survives interleaved
 * output.
 *
 * The bar is ten segments wide, each ending in a countdown digit:
 *
 *   ⋅⋅⋅⋅⋅⋅9⋅⋅⋅⋅⋅⋅8⋅⋅⋅⋅⋅⋅7 ... ⋅⋅⋅⋅⋅⋅0
 *
 * Any message the session writes while the bar is mid-line first ends the
 * line; the next draw starts the bar over from its prefix.
 */

import { DISPLAY, type InformantDescriptor } from '../informant/descriptor.js';
import { colorize, isTTY, type ColorName } from '../output/colors.js';
import type { Session } from '../session/index.js';
import { getInformer } from '../session/stack.js';

export const DEFAULT_PROGRESS_WIDTH = 79;
const FILL = '⋅';
const SEGMENTS = 10;

const PROGRESS = { ...DISPLAY, kind: 'progress', log: false };

export interface ProgressMarker {
  glyph: string;
  color?: ColorName;
}

export interface ProgressBarOptions {
  start?: number;
  /** Scale the bar logarithmically; `start` must then be positive. */
  log?: boolean;
  prefix?: string;
  width?: number;
  informant?: InformantDescriptor;
  markers?: Readonly<Record<string, ProgressMarker>>;
  session?: Session;
}

export type ProgressState = 'idle' | 'drawing' | 'interrupted' | 'done' | 'escaped';

export class ProgressBar {
  private readonly stop: number;
  private readonly start: number;
  private readonly log: boolean;
  private readonly prefix: string;
  private readonly chunk: number;
  private readonly informant: InformantDescriptor;
  private readonly markers: Readonly<Record<string, ProgressMarker>>;
  private readonly session: Session;

  private cells: string[] = [];
  private pendingMarker?: string;
  private writing = false;
  private current: ProgressState = 'idle';

  constructor(stop: number, options: ProgressBarOptions = {}) {
    this.stop = stop;
    this.start = options.start ?? 0;
    this.log = options.log ?? false;
    this.prefix = options.prefix ?? '';
    this.informant = options.informant ?? PROGRESS;
    this.markers = options.markers ?? {};
    this.session = options.session ?? getInformer();

    const width = options.width !== undefined && options.width > 0 ? options.width : DEFAULT_PROGRESS_WIDTH;
    this.chunk = Math.max(1, Math.floor((width - this.prefix.length) / SEGMENTS));
  }

  /** Yield each item, advancing the bar after it is handled. */
  static *over<T>(items: Iterable<T>, options: ProgressBarOptions = {}): Generator<T> {
    const list = [...items];
    const bar = new ProgressBar(list.length, options);
    for (const [index, item] of list.entries()) {
      yield item;
      bar.draw(index + 1);
    }
  }

  get state(): ProgressState {
    return this.current;
  }

  get totalCells(): number {
    return this.chunk * SEGMENTS;
  }

  /**
   * Advance the bar to `value`. A marker names the glyph for the cells this
   * call draws; if it draws none the marker waits for the next cell.
   */
  draw(value: number, marker?: string): void {
    if (this.current === 'done' || this.current === 'escaped') return;
    if (marker !== undefined) this.pendingMarker = marker;

    const target = this.cellsFor(value);
    if (target <= this.cells.length) return;

    let text = '';
    if (this.current !== 'drawing') {
      text = this.prefix + this.cells.join('');
      this.session.attachProgress(this);
    }
    const colored = isTTY(this.session.stdout);
    const markerName = this.pendingMarker;
    for (let index = this.cells.length; index < target; index++) {
      const cell = this.cell(index, markerName, colored);
      this.cells.push(cell);
      text += cell;
    }
    this.pendingMarker = undefined;
    this.current = 'drawing';

    if (this.cells.length === this.totalCells) {
      text += '\n';
      this.finish('done');
    }
    this.emit(text);
  }

  /** Draw any remaining cells and end the line. */
  done(): void {
    this.draw(this.stop);
  }

  /** End the line where it is; later draws do nothing. */
  escape(): void {
    if (this.current === 'done' || this.current === 'escaped') return;
    const partial = this.current === 'drawing';
    this.finish('escaped');
    if (partial) this.emit('\n');
  }

  /** Called by the session before other output reaches the console. */
  interrupt(): void {
    if (this.writing || this.current !== 'drawing') return;
    this.current = 'interrupted';
    this.emit('\n');
  }

  /**
   * Run `fn` with the bar. A throw escapes the bar; a normal return
   * completes it unless it was escaped.
   */
  run<T>(fn: (bar: ProgressBar) => T): T {
    let result: T;
    try {
      result = fn(this);
    } catch (err) {
      this.escape();
      throw err;
    }
    if (this.current !== 'escaped' && this.current !== 'done') this.done();
    return result;
  }

  private cellsFor(value: number): number {
    let fraction: number;
    if (this.log) {
      fraction = Math.log(value / this.start) / Math.log(this.stop / this.start);
    } else {
      fraction = this.stop === this.start ? 1 : (value - this.start) / (this.stop - this.start);
    }
    if (!Number.isFinite(fraction)) fraction = value >= this.stop ? 1 : 0;
    const cells = Math.floor(fraction * this.totalCells + 1e-9);
    return Math.min(this.totalCells, Math.max(0, cells));
  }

  private cell(index: number, markerName: string | undefined, colored: boolean): string {
    const position = index + 1;
    const digit = position % this.chunk === 0 ? String(SEGMENTS - position / this.chunk) : undefined;
    const marker = markerName === undefined ? undefined : this.markers[markerName];
    if (!marker) return digit ?? FILL;
    return colorize(digit ?? marker.glyph, marker.color, this.session.colorscheme, colored);
  }

  private finish(state: 'done' | 'escaped'): void {
    this.current = state;
    this.session.detachProgress(this);
  }

  private emit(text: string): void {
    this.writing = true;
    try {
      this.session.report(this.informant, [text, { end: '', culprit: null }], {
        remember: false,
      });
    } finally {
      this.writing = false;
    }
  }
}

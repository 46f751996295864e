/**
 * Terminal colors for message headers and bodies.
 *
 * Uses ansis for the escape sequences and its strip() for logfile output.
 * The light scheme uses the bold variant of each color.
 */

import ansis from 'ansis';
import type { Colorscheme } from '../types/config.js';
import type { OutputStream } from '../types/output.js';

export const COLOR_NAMES = [
  'black',
  'red',
  'green',
  'yellow',
  'blue',
  'magenta',
  'cyan',
  'white',
] as const;

export type ColorName = (typeof COLOR_NAMES)[number];

type Paint = (text: string) => string;

const dark: Record<ColorName, Paint> = {
  black: ansis.black,
  red: ansis.red,
  green: ansis.green,
  yellow: ansis.yellow,
  blue: ansis.blue,
  magenta: ansis.magenta,
  cyan: ansis.cyan,
  white: ansis.white,
};

const light: Record<ColorName, Paint> = {
  black: ansis.bold.black,
  red: ansis.bold.red,
  green: ansis.bold.green,
  yellow: ansis.bold.yellow,
  blue: ansis.bold.blue,
  magenta: ansis.bold.magenta,
  cyan: ansis.bold.cyan,
  white: ansis.bold.white,
};

/**
 * Paint `text` in `color` under `scheme`. Returns the text unchanged when
 * disabled, without a color, or under the `none` scheme.
 */
export function colorize(
  text: string,
  color: ColorName | undefined,
  scheme: Colorscheme,
  enabled = true,
): string {
  if (!enabled || !color || scheme === 'none' || !text) return text;
  const paint = scheme === 'light' ? light[color] : dark[color];
  return paint(text);
}

/** A painter bound to one color and scheme. */
export class Color {
  constructor(
    readonly color: ColorName,
    readonly scheme: Colorscheme = 'dark',
    readonly enabled = true,
  ) {}

  paint(...args: unknown[]): string {
    return colorize(args.map(String).join(' '), this.color, this.scheme, this.enabled);
  }
}

export function isTTY(stream: OutputStream): boolean {
  return stream.isTTY === true;
}

export function stripColors(text: string): string {
  return ansis.strip(text);
}

// Line-level text helpers: indentation and wrapping

export const INDENT = '    ';

/**
 * Indent every line by `stops` leaders; `first` shifts the first line
 * relative to the rest. Lines that end up blank are emptied.
 */
export function indent(text: string, stops = 1, first = 0, leader = INDENT): string {
  return text
    .split('\n')
    .map((line, index) => {
      const count = index === 0 ? stops + first : stops;
      return (leader.repeat(Math.max(count, 0)) + line).trimEnd();
    })
    .join('\n');
}

export const DEFAULT_WRAP_WIDTH = 70;

/**
 * Wrap each physical line independently to `width` columns. Embedded
 * newlines stay hard breaks; continuation lines keep the line's own
 * leading whitespace. Words longer than the width get a line of their own.
 */
export function wrapText(text: string, width: number): string {
  return text
    .split('\n')
    .map((line) => wrapLine(line, width))
    .join('\n');
}

function wrapLine(line: string, width: number): string {
  if (line.length <= width) return line;
  const leading = /^\s*/.exec(line)?.[0] ?? '';
  const words = line.slice(leading.length).split(/\s+/).filter(Boolean);

  const lines: string[] = [];
  let current = '';
  for (const word of words) {
    if (!current) {
      current = leading + word;
    } else if (current.length + 1 + word.length <= width) {
      current += ' ' + word;
    } else {
      lines.push(current);
      current = leading + word;
    }
  }
  if (current) lines.push(current);
  return lines.join('\n');
}

export function resolveWrapWidth(wrap: boolean | number | undefined): number | undefined {
  if (wrap === true) return DEFAULT_WRAP_WIDTH;
  if (typeof wrap === 'number' && wrap > 0) return wrap;
  return undefined;
}

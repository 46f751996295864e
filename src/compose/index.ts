/**
 * Message composition: pure text in, text out.
 *
 * `join` turns arguments into a body (plain join or template selection),
 * `layoutMessage` attaches the header, culprit and codicils, and `compose`
 * runs the whole pipeline. Nothing here touches a session or a stream.
 */

import { HeraldError, TemplateError } from '../errors/index.js';
import { joinCulprit } from '../culprit/index.js';
import {
  MessageOptionsSchema,
  OPTION_KEYS,
  type Codicil,
  type Culprit,
  type FormatOptions,
  type MessageOptions,
} from '../types/message.js';
import { isPlainObject, removalPredicate, stringify } from '../utils/index.js';
import { fillTemplate, parseTemplate, type ParsedTemplate } from './template.js';
import { indent, resolveWrapWidth, wrapText } from './text.js';

export { INDENT, indent, wrapText, DEFAULT_WRAP_WIDTH } from './text.js';
export { parseTemplate, fillTemplate } from './template.js';
export type { ParsedTemplate } from './template.js';

export const DEFAULT_LENGTH_THRESH = 80;

export interface ParsedArguments {
  args: unknown[];
  options: MessageOptions;
}

/**
 * Validate a trailing options object. Throws HeraldError listing each bad
 * field.
 */
export function parseOptions(raw: Record<string, unknown>): MessageOptions {
  const result = MessageOptionsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new HeraldError(`invalid message options (${issues}).`);
  }
  return result.data;
}

/** Split call arguments into positionals and the trailing options object. */
export function splitArguments(args: readonly unknown[]): ParsedArguments {
  const last = args[args.length - 1];
  if (isPlainObject(last)) {
    return { args: args.slice(0, -1), options: parseOptions(last) };
  }
  return { args: [...args], options: {} };
}

/** The named template values of an options object: every non-option key. */
export function namedValues(options: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const named: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(options)) {
    if (!OPTION_KEYS.has(key)) named[key] = value;
  }
  return named;
}

function isUsable(
  template: ParsedTemplate,
  args: readonly unknown[],
  named: Readonly<Record<string, unknown>>,
  culled: (value: unknown) => boolean,
): boolean {
  return (
    template.positional.every((index) => index < args.length) &&
    template.named.every(
      (name) => Object.prototype.hasOwnProperty.call(named, name) && !culled(named[name]),
    )
  );
}

function fillCandidates(
  candidates: readonly string[],
  args: readonly unknown[],
  named: Readonly<Record<string, unknown>>,
  culled: (value: unknown) => boolean,
): string {
  let last: ParsedTemplate | undefined;
  for (const source of candidates) {
    last = parseTemplate(source);
    if (isUsable(last, args, named, culled)) return fillTemplate(last, args, named);
  }
  if (!last) throw new TemplateError('no template given.');
  return fillTemplate(last, args, named, true);
}

/**
 * Build the message body. Without a template the stringified arguments are
 * joined with `sep`; otherwise the first usable candidate is filled.
 */
export function join(
  args: readonly unknown[],
  named: Readonly<Record<string, unknown>> = {},
  options: FormatOptions = {},
): string {
  let message: string;
  if (options.template === undefined) {
    message = args.map(stringify).join(options.sep ?? ' ');
  } else {
    const candidates = typeof options.template === 'string' ? [options.template] : options.template;
    const culled = removalPredicate(options.remove, 'remove' in options);
    message = fillCandidates(candidates, args, named, culled);
  }
  const width = resolveWrapWidth(options.wrap);
  return width === undefined ? message : wrapText(message, width);
}

/** Each codicil becomes its own (optionally wrapped) block. */
export function renderCodicils(codicil: Codicil | undefined, wrap?: boolean | number): string[] {
  if (codicil === undefined) return [];
  const lines = typeof codicil === 'string' ? [codicil] : codicil;
  return lines.map((line) => join([line], {}, { wrap }));
}

export interface LayoutInput {
  header: string;
  culprit: string;
  body: string;
  codicils: readonly string[];
  lengthThresh: number;
}

export interface MessageLayout {
  /** Header text, kept apart so it can be colored on its own. */
  header: string;
  body: string;
}

/**
 * Arrange header, culprit, body and codicils. A body that is multi-line or
 * too long to share a line with its lead starts on the next line, indented.
 */
export function layoutMessage(input: LayoutInput): MessageLayout {
  const { culprit, codicils, lengthThresh } = input;
  let header = input.header;
  let body = input.body;

  if (header || culprit) {
    const lead = header + (culprit ? `${culprit}: ` : '');
    const firstLine = body.split('\n', 1)[0] ?? '';
    const breaks = body.includes('\n') || lead.length + firstLine.length > lengthThresh;
    if (!body || breaks) {
      if (culprit) {
        body = body ? `${culprit}:\n${indent(body)}` : `${culprit}:`;
      } else {
        header = header.trimEnd();
        body = body ? `\n${indent(body)}` : '';
      }
    } else if (culprit) {
      body = `${culprit}: ${body}`;
    }
  }

  if (codicils.length > 0) {
    const stops = input.header ? 1 : 0;
    body += '\n' + codicils.map((codicil) => indent(codicil, stops)).join('\n');
  }
  return { header, body };
}

export interface ComposeOptions extends FormatOptions {
  culprit?: Culprit | null;
  culpritSep?: string;
  codicil?: Codicil;
  header?: string;
  lengthThresh?: number;
}

/** The full pipeline: body, layout, then `end`. */
export function compose(
  args: readonly unknown[],
  named: Readonly<Record<string, unknown>> = {},
  options: ComposeOptions = {},
): string {
  const layout = layoutMessage({
    header: options.header ?? '',
    culprit: joinCulprit(options.culprit, options.culpritSep),
    body: join(args, named, options),
    codicils: renderCodicils(options.codicil, options.wrap),
    lengthThresh: options.lengthThresh ?? DEFAULT_LENGTH_THRESH,
  });
  return layout.header + layout.body + (options.end ?? '\n');
}

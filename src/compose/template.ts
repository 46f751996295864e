/**
 * Brace templates: `{}`, `{0}`, `{name}`, `{v[0]}`, `{v.attr}`, optional
 * `!s`/`!r` conversion and a format spec subset after `:`.
 *
 * Templates are parsed once into parts so the composer can ask which fields
 * a candidate references before deciding to fill it.
 */

import { TemplateError } from '../errors/index.js';
import { stringify } from '../utils/index.js';

type Accessor =
  | { kind: 'attr'; name: string }
  | { kind: 'index'; key: string | number };

interface FieldPart {
  kind: 'field';
  arg: number | string;
  accessors: Accessor[];
  conversion?: 's' | 'r';
  spec: string;
}

type TemplatePart = { kind: 'text'; text: string } | FieldPart;

export interface ParsedTemplate {
  readonly source: string;
  readonly parts: readonly TemplatePart[];
  /** Positional indices referenced, in order of first use. */
  readonly positional: readonly number[];
  /** Named values referenced, in order of first use. */
  readonly named: readonly string[];
}

const cache = new Map<string, ParsedTemplate>();

export function parseTemplate(source: string): ParsedTemplate {
  const cached = cache.get(source);
  if (cached) return cached;

  const parts: TemplatePart[] = [];
  const positional: number[] = [];
  const named: string[] = [];
  let text = '';
  let autoIndex = 0;
  let numbering: 'auto' | 'manual' | undefined;

  for (let i = 0; i < source.length; i++) {
    const ch = source.charAt(i);
    if (ch === '}') {
      if (source.charAt(i + 1) === '}') {
        text += '}';
        i++;
        continue;
      }
      throw new TemplateError(`Single '}' encountered in template.`, {
        culprit: source,
      });
    }
    if (ch !== '{') {
      text += ch;
      continue;
    }
    if (source.charAt(i + 1) === '{') {
      text += '{';
      i++;
      continue;
    }

    const close = source.indexOf('}', i + 1);
    const nested = source.indexOf('{', i + 1);
    if (close === -1 || (nested !== -1 && nested < close)) {
      throw new TemplateError(`Unmatched '{' in template.`, { culprit: source });
    }
    if (text) parts.push({ kind: 'text', text });
    text = '';

    const field = parseField(source.slice(i + 1, close), source);
    if (field.arg === '') {
      if (numbering === 'manual') throw numberingError(source);
      numbering = 'auto';
      field.arg = autoIndex++;
    } else if (typeof field.arg === 'number') {
      if (numbering === 'auto') throw numberingError(source);
      numbering = 'manual';
    }

    if (typeof field.arg === 'number') {
      if (!positional.includes(field.arg)) positional.push(field.arg);
    } else if (!named.includes(field.arg)) {
      named.push(field.arg);
    }
    parts.push(field);
    i = close;
  }
  if (text) parts.push({ kind: 'text', text });

  const parsed: ParsedTemplate = { source, parts, positional, named };
  cache.set(source, parsed);
  return parsed;
}

function numberingError(source: string): TemplateError {
  return new TemplateError(
    'Cannot switch between automatic and manual field numbering.',
    { culprit: source },
  );
}

const FIELD_PATTERN = /^([^.[!:]*)((?:\.[^.[!:]+|\[[^\]]+\])*)(?:!([sr]))?(?::(.*))?$/s;
const ACCESSOR_PATTERN = /\.([^.[]+)|\[([^\]]+)\]/g;

function parseField(body: string, source: string): FieldPart {
  const match = FIELD_PATTERN.exec(body);
  if (!match) {
    throw new TemplateError(`Invalid field '{${body}}'.`, { culprit: source });
  }
  const [, name = '', path = '', conversion, spec = ''] = match;

  const accessors: Accessor[] = [];
  for (const access of path.matchAll(ACCESSOR_PATTERN)) {
    const [, attr, key] = access;
    if (attr !== undefined) {
      accessors.push({ kind: 'attr', name: attr });
    } else if (key !== undefined) {
      accessors.push({ kind: 'index', key: /^\d+$/.test(key) ? Number(key) : key });
    }
  }

  return {
    kind: 'field',
    arg: /^\d+$/.test(name) ? Number(name) : name,
    accessors,
    conversion: conversion === 's' || conversion === 'r' ? conversion : undefined,
    spec,
  };
}

/**
 * Fill a parsed template. Missing values raise unless `lenient`, in which
 * case they render empty.
 */
export function fillTemplate(
  template: ParsedTemplate,
  args: readonly unknown[],
  named: Readonly<Record<string, unknown>>,
  lenient = false,
): string {
  let result = '';
  for (const part of template.parts) {
    if (part.kind === 'text') {
      result += part.text;
      continue;
    }

    const present =
      typeof part.arg === 'number'
        ? part.arg < args.length
        : Object.prototype.hasOwnProperty.call(named, part.arg);
    if (!present) {
      if (lenient) continue;
      throw new TemplateError(`Missing value for '{${String(part.arg)}}'.`, {
        culprit: template.source,
      });
    }

    let value: unknown = typeof part.arg === 'number' ? args[part.arg] : named[part.arg];
    for (const accessor of part.accessors) {
      value = access(value, accessor);
    }
    result += formatValue(value, part.conversion, part.spec, template.source);
  }
  return result;
}

function access(value: unknown, accessor: Accessor): unknown {
  if (value === null || value === undefined) return undefined;
  const key = accessor.kind === 'attr' ? accessor.name : accessor.key;
  if (value instanceof Map) return value.get(key);
  return Reflect.get(Object(value), key);
}

// [[fill]align][sign][#][0][width][,][.precision][type]
const SPEC_PATTERN =
  /^(?:(.)?([<>^=]))?([+\- ])?(#)?(0)?(\d+)?(,)?(?:\.(\d+))?([bdeEfFgGosxX%])?$/s;

function formatValue(
  value: unknown,
  conversion: 's' | 'r' | undefined,
  spec: string,
  source: string,
): string {
  let subject: unknown = value;
  if (conversion === 'r') {
    subject = typeof value === 'string' ? `'${value}'` : stringify(value);
  } else if (conversion === 's') {
    subject = stringify(value);
  }
  if (!spec) return subject === undefined ? '' : stringify(subject);

  const match = SPEC_PATTERN.exec(spec);
  if (!match) {
    throw new TemplateError(`Invalid format specifier '${spec}'.`, { culprit: source });
  }
  const [, fillChar, alignChar, sign, alternate, zero, widthText, grouping, precisionText, type] =
    match;
  const width = widthText === undefined ? 0 : Number(widthText);
  const precision = precisionText === undefined ? undefined : Number(precisionText);

  let text: string;
  let numeric = false;
  if (type !== undefined && type !== 's') {
    const number = Number(subject);
    if (Number.isNaN(number) && typeof subject !== 'number') {
      throw new TemplateError(
        `Cannot format '${stringify(subject)}' as a number.`,
        { culprit: source },
      );
    }
    numeric = true;
    text = formatNumber(Math.abs(number), type, precision, alternate !== undefined);
    if (grouping) text = groupThousands(text);
    const signText = number < 0 ? '-' : sign === '+' ? '+' : sign === ' ' ? ' ' : '';
    text = signText + text;
  } else if (typeof subject === 'number') {
    numeric = true;
    text = precision === undefined ? String(subject) : subject.toPrecision(precision);
    if (grouping) text = groupThousands(text);
    if (sign === '+' && subject >= 0) text = '+' + text;
  } else {
    text = subject === undefined ? '' : stringify(subject);
    if (precision !== undefined) text = text.slice(0, precision);
  }

  const align = alignChar ?? (zero && numeric ? '=' : numeric ? '>' : '<');
  const fill = fillChar ?? (zero && !alignChar ? '0' : ' ');
  return pad(text, width, align, fill);
}

function formatNumber(
  number: number,
  type: string,
  precision: number | undefined,
  alternate: boolean,
): string {
  switch (type) {
    case 'd':
      return String(Math.trunc(number));
    case 'f':
    case 'F':
      return number.toFixed(precision ?? 6);
    case 'e':
    case 'E': {
      const text = number
        .toExponential(precision ?? 6)
        .replace(/e([+-])(\d)$/, 'e$10$2');
      return type === 'E' ? text.toUpperCase() : text;
    }
    case 'g':
    case 'G': {
      const text = String(Number(number.toPrecision(precision || 6)));
      return type === 'G' ? text.toUpperCase() : text;
    }
    case 'x':
    case 'X': {
      const text = (alternate ? '0x' : '') + Math.trunc(number).toString(16);
      return type === 'X' ? text.toUpperCase() : text;
    }
    case 'o':
      return (alternate ? '0o' : '') + Math.trunc(number).toString(8);
    case 'b':
      return (alternate ? '0b' : '') + Math.trunc(number).toString(2);
    case '%':
      return (number * 100).toFixed(precision ?? 6) + '%';
    default:
      return String(number);
  }
}

function groupThousands(text: string): string {
  const [whole = '', fraction] = text.split('.');
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return fraction === undefined ? grouped : `${grouped}.${fraction}`;
}

function pad(text: string, width: number, align: string, fill: string): string {
  const missing = width - text.length;
  if (missing <= 0) return text;
  switch (align) {
    case '>':
      return fill.repeat(missing) + text;
    case '^': {
      const left = Math.floor(missing / 2);
      return fill.repeat(left) + text + fill.repeat(missing - left);
    }
    case '=': {
      const signMatch = /^[+\- ]/.exec(text);
      const signText = signMatch ? signMatch[0] : '';
      return signText + fill.repeat(missing) + text.slice(signText.length);
    }
    default:
      return text + fill.repeat(missing);
  }
}

// Message descriptor types: the trailing options object of an informant call

import { z } from 'zod';
import type { NotificationUrgency } from './notification.js';
import type { OutputStream } from './output.js';

export type CulpritPart = string | number;

/** A single label, or an ordered tuple of labels. Nullish parts are dropped. */
export type Culprit = CulpritPart | ReadonlyArray<CulpritPart | null | undefined>;

export type Codicil = string | readonly string[];

/**
 * Defines which named values count as unavailable when choosing a template:
 * a predicate, a single literal, or a collection of literals.
 */
export type RemovePolicy =
  | ((value: unknown) => boolean)
  | ReadonlyArray<unknown>
  | ReadonlySet<unknown>
  | string
  | number
  | boolean
  | null
  | undefined;

export type Template = string | readonly string[];

/** Options that shape the message text. */
export interface FormatOptions {
  sep?: string;
  end?: string;
  template?: Template;
  remove?: RemovePolicy;
  wrap?: boolean | number;
}

/**
 * Options accepted in the trailing plain object of an informant call.
 * Keys that are not options are named values for templates.
 */
export interface MessageOptions extends FormatOptions {
  culprit?: Culprit | null;
  codicil?: Codicil;
  file?: OutputStream;
  flush?: boolean;
  urgency?: NotificationUrgency;
  [name: string]: unknown;
}

export const OPTION_KEYS: ReadonlySet<string> = new Set([
  'sep',
  'end',
  'template',
  'remove',
  'wrap',
  'culprit',
  'codicil',
  'file',
  'flush',
  'urgency',
  'informant',
]);

function isOutputStream(value: unknown): value is OutputStream {
  return (
    typeof value === 'object' &&
    value !== null &&
    'write' in value &&
    typeof value.write === 'function'
  );
}

const CulpritPartSchema = z.union([z.string(), z.number()]);

/**
 * Validates the options half of a trailing plain object. Unknown keys pass
 * through untouched: they are the named values.
 */
export const MessageOptionsSchema = z
  .object({
    sep: z.string().optional(),
    end: z.string().optional(),
    template: z.union([z.string(), z.array(z.string()).min(1)]).optional(),
    remove: z.custom<RemovePolicy>().optional(),
    wrap: z.union([z.boolean(), z.number().int().positive()]).optional(),
    culprit: z
      .union([CulpritPartSchema, z.array(CulpritPartSchema.nullish())])
      .nullish(),
    codicil: z.union([z.string(), z.array(z.string())]).optional(),
    file: z.custom<OutputStream>(isOutputStream, 'expected a writable stream').optional(),
    flush: z.boolean().optional(),
    urgency: z.enum(['low', 'normal', 'critical']).optional(),
  })
  .passthrough();

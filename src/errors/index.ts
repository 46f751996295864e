/**
 * HeraldError: an exception that carries its message arguments and composes
 * them only when asked.
 *
 * Arguments mirror an informant call: positionals followed by an optional
 * plain object of options and named values. The error can then be rendered
 * into text, reported through an informant, or rethrown with more context.
 */

import { join, namedValues, parseOptions } from '../compose/index.js';
import { culpritParts, joinCulprit } from '../culprit/index.js';
import {
  ERROR,
  descriptorOf,
  isDescriptor,
  type InformantDescriptor,
} from '../informant/descriptor.js';
import { getInformer } from '../session/stack.js';
import type { Codicil, Culprit, CulpritPart, MessageOptions, Template } from '../types/message.js';
import { isPlainObject } from '../utils/index.js';

export class HeraldError extends Error {
  readonly args: readonly unknown[];
  readonly kwargs: Readonly<Record<string, unknown>>;

  constructor(...args: unknown[]) {
    super();
    const last = args[args.length - 1];
    if (isPlainObject(last)) {
      this.args = args.slice(0, -1);
      this.kwargs = { ...last };
    } else {
      this.args = args;
      this.kwargs = {};
    }
    this.name = new.target.name;
    // Composed on access so the text reflects the arguments, not a snapshot.
    Object.defineProperty(this, 'message', {
      get: () => this.render(),
      configurable: true,
      enumerable: false,
    });
  }

  /** Template chain of the error kind; used when no template is given. */
  protected defaultTemplate(): Template | undefined {
    return undefined;
  }

  protected defaultInformant(): InformantDescriptor {
    return ERROR;
  }

  private options(): MessageOptions {
    return parseOptions(this.kwargs);
  }

  private informant(kwargs: Readonly<Record<string, unknown>>): InformantDescriptor {
    const informant = kwargs['informant'];
    return isDescriptor(informant) ? informant : this.defaultInformant();
  }

  /** Value of a named argument, `undefined` when absent. */
  get(name: string): unknown {
    return this.kwargs[name];
  }

  /** The message body without the culprit. */
  getMessage(template?: Template): string {
    const options = this.options();
    return join(this.args, namedValues(options), {
      ...options,
      template: template ?? options.template ?? this.defaultTemplate(),
    });
  }

  /** The message prefixed by the culprit, as the informants would show it. */
  render(template?: Template): string {
    const message = this.getMessage(template);
    const culprit = joinCulprit(this.getCulprit());
    return culprit ? `${culprit}: ${message}` : message;
  }

  override toString(): string {
    return this.render();
  }

  /** The culprit as an array, with `extra` in front. */
  getCulprit(extra?: Culprit | null): CulpritPart[] {
    return [...culpritParts(extra), ...culpritParts(this.options().culprit)];
  }

  /** The codicils as an array, with `extra` at the end. */
  getCodicil(extra?: Codicil): string[] {
    const own = this.options().codicil;
    return [...toLines(own), ...toLines(extra)];
  }

  /** Send the error through its informant (`error` unless one is bound). */
  report(overrides: Record<string, unknown> = {}): void {
    const kwargs = this.dispatchKwargs(overrides);
    getInformer().report(this.informant(kwargs), [...this.args, kwargs]);
  }

  /** Report and terminate; the informant's exit status, else 1. */
  terminate(overrides: Record<string, unknown> = {}): void {
    const kwargs = this.dispatchKwargs(overrides);
    const informant = this.informant(kwargs);
    getInformer().report(
      { ...descriptorOf(informant), terminate: informant.terminate === false ? 1 : informant.terminate },
      [...this.args, kwargs],
    );
  }

  /**
   * Throw a new error of the same kind. An override culprit goes in front of
   * the existing one and an override codicil after; other keys replace.
   */
  reraise(overrides: Record<string, unknown> = {}): never {
    const extra = parseOptions(overrides);
    const kwargs: Record<string, unknown> = { ...this.kwargs, ...overrides };
    if (extra.culprit !== undefined) kwargs['culprit'] = this.getCulprit(extra.culprit);
    if (extra.codicil !== undefined) kwargs['codicil'] = this.getCodicil(extra.codicil);

    const error: unknown = Reflect.construct(this.constructor, [...this.args, kwargs]);
    if (error instanceof Error) error.cause = this;
    throw error;
  }

  private dispatchKwargs(overrides: Record<string, unknown>): Record<string, unknown> {
    const kwargs: Record<string, unknown> = { ...this.kwargs, ...overrides };
    const template = this.defaultTemplate();
    if (kwargs['template'] === undefined && template !== undefined) kwargs['template'] = template;
    return kwargs;
  }
}

function toLines(codicil: Codicil | undefined): string[] {
  if (codicil === undefined) return [];
  return typeof codicil === 'string' ? [codicil] : [...codicil];
}

/** A malformed brace template. */
export class TemplateError extends HeraldError {}

export interface ErrorKindOptions {
  name: string;
  template?: Template;
  informant?: InformantDescriptor;
  base?: typeof HeraldError;
}

/** Create an error subclass with its own template chain and informant. */
export function defineErrorKind(options: ErrorKindOptions): typeof HeraldError {
  const Base = options.base ?? HeraldError;
  class Kind extends Base {
    protected override defaultTemplate(): Template | undefined {
      return options.template ?? super.defaultTemplate();
    }

    protected override defaultInformant(): InformantDescriptor {
      return options.informant ?? super.defaultInformant();
    }
  }
  Object.defineProperty(Kind, 'name', { value: options.name });
  return Kind;
}

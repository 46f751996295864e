/**
 * Informants: callable message kinds.
 *
 * Each informant is a function that dispatches its arguments to the active
 * session, carrying its descriptor fields as mutable properties:
 *
 *   warn('file not found.', { culprit: 'data.in' });
 *   warn.headerColor = 'magenta';
 *   const shout = display.with({ messageColor: 'red' });
 */

import { getInformer } from '../session/stack.js';
import * as descriptors from './descriptor.js';
import { descriptorOf, type DescriptorOverrides, type InformantDescriptor } from './descriptor.js';

export interface Informant extends InformantDescriptor {
  (...args: unknown[]): void;
  /** A new informant with some descriptor fields replaced. */
  with(overrides: DescriptorOverrides): Informant;
}

export function createInformant(descriptor: InformantDescriptor): Informant {
  const call = (...args: unknown[]): void => {
    getInformer().report(informant, args);
  };
  const informant: Informant = Object.assign(call, descriptorOf(descriptor), {
    with: (overrides: DescriptorOverrides): Informant =>
      createInformant({ ...descriptorOf(informant), ...overrides }),
  });
  return informant;
}

/** Logfile only. */
export const log = createInformant(descriptors.LOG);
/** Shown in verbose mode. */
export const comment = createInformant(descriptors.COMMENT);
/** Continues the previous message, with its destinations and indent. */
export const codicil = createInformant(descriptors.CODICIL);
/** Shown in narrate mode. */
export const narrate = createInformant(descriptors.NARRATE);
/** Shown unless quiet or muted. */
export const display = createInformant(descriptors.DISPLAY);
/** Shown unless muted. */
export const output = createInformant(descriptors.OUTPUT);
/** Shown and sent as a desktop notification. */
export const notify = createInformant(descriptors.NOTIFY);
/** Always shown, with a `DEBUG` header. */
export const debug = createInformant(descriptors.DEBUG);
export const warn = createInformant(descriptors.WARN);
/** Counted toward `errorsAccrued`. */
export const error = createInformant(descriptors.ERROR);
/** Reports an error and terminates with status 1. */
export const fatal = createInformant(descriptors.FATAL);
/** An internal failure; always shown, terminates with status 3. */
export const panic = createInformant(descriptors.PANIC);

export { defineDescriptor, resolveGate, isDescriptor } from './descriptor.js';
export type { Gate, InformantDescriptor, DescriptorOverrides } from './descriptor.js';

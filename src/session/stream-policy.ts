// Stream policies decide whether a message goes to stdout or stderr.

import { HeraldError } from '../errors/index.js';
import type { InformantDescriptor } from '../informant/descriptor.js';
import { StreamPolicyNameSchema, type StreamPolicyName } from '../types/config.js';
import type { OutputStream } from '../types/output.js';

export type StreamPolicyFn = (
  informant: InformantDescriptor,
  stdout: OutputStream,
  stderr: OutputStream,
) => OutputStream;

export type StreamPolicy = StreamPolicyName | StreamPolicyFn;

export const STREAM_POLICY_FNS: Record<StreamPolicyName, StreamPolicyFn> = {
  // Only terminating messages go to stderr.
  termination: (informant, stdout, stderr) => (informant.terminate !== false ? stderr : stdout),
  // Anything with a severity header goes to stderr.
  header: (informant, stdout, stderr) => (informant.severity ? stderr : stdout),
  errors: (informant, stdout, stderr) => (informant.isError ? stderr : stdout),
  all: (_informant, _stdout, stderr) => stderr,
};

export function resolveStreamPolicy(policy: string | StreamPolicyFn): StreamPolicyFn {
  if (typeof policy === 'function') return policy;
  const parsed = StreamPolicyNameSchema.safeParse(policy);
  if (!parsed.success) throw new HeraldError(`${policy}: unknown stream policy.`);
  return STREAM_POLICY_FNS[parsed.data];
}

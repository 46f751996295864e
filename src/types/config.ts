// Session settings schema: the serializable subset of session options.
// Config sources: .herald.json, HERALD_* environment variables, CLI flags.

import { z } from 'zod';

export const COLORSCHEMES = ['none', 'light', 'dark'] as const;
export const STREAM_POLICIES = ['termination', 'header', 'errors', 'all'] as const;
export const DIAGNOSTICS_LEVELS = [
  'silent',
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
] as const;

export const ColorschemeSchema = z.enum(COLORSCHEMES);
export const StreamPolicyNameSchema = z.enum(STREAM_POLICIES);

export const SessionSettingsSchema = z.object({
  // Verbosity
  mute: z.boolean().default(false),
  quiet: z.boolean().default(false),
  verbose: z.boolean().default(false),
  narrate: z.boolean().default(false),

  // Identity
  progName: z.union([z.string().min(1), z.boolean()]).default(true),
  version: z.string().optional(),

  // Logfile
  logfile: z.union([z.string().min(1), z.boolean()]).default(false),
  prevLogfileSuffix: z.string().min(1).optional(),
  flush: z.boolean().default(false),

  // Rendering
  colorscheme: ColorschemeSchema.default('dark'),
  streamPolicy: StreamPolicyNameSchema.default('termination'),
  lengthThresh: z.number().int().min(0).default(80),
  culpritSep: z.string().default(', '),

  // Exit status and notifications
  errorStatus: z.number().int().min(1).max(127).default(1),
  notifyIfNoTty: z.boolean().default(false),

  // Library diagnostics (pino level)
  diagnostics: z.enum(DIAGNOSTICS_LEVELS).default('silent'),
});

export type SessionSettings = z.infer<typeof SessionSettingsSchema>;
export type Colorscheme = z.infer<typeof ColorschemeSchema>;
export type StreamPolicyName = z.infer<typeof StreamPolicyNameSchema>;
export type DiagnosticsLevel = (typeof DIAGNOSTICS_LEVELS)[number];

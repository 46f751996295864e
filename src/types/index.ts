// Barrel export for all type definitions
export {
  SessionSettingsSchema,
  ColorschemeSchema,
  StreamPolicyNameSchema,
  COLORSCHEMES,
  STREAM_POLICIES,
  DIAGNOSTICS_LEVELS,
} from './config.js';
export type {
  SessionSettings,
  Colorscheme,
  StreamPolicyName,
  DiagnosticsLevel,
} from './config.js';

export { MessageOptionsSchema, OPTION_KEYS } from './message.js';
export type {
  Culprit,
  CulpritPart,
  Codicil,
  RemovePolicy,
  Template,
  FormatOptions,
  MessageOptions,
} from './message.js';

export type {
  NotificationUrgency,
  DesktopNotification,
  NotificationSink,
} from './notification.js';

export type { OutputStream, LogfileStream } from './output.js';

// Package entry point - re-exports public API
export * from './types/index.js';

export {
  log,
  comment,
  codicil,
  narrate,
  display,
  output,
  notify,
  debug,
  warn,
  error,
  fatal,
  panic,
  createInformant,
  defineDescriptor,
} from './informant/index.js';
export type { Informant, InformantDescriptor, DescriptorOverrides, Gate } from './informant/index.js';

export { Session, LoggingCache, STREAM_POLICY_FNS } from './session/index.js';
export type {
  SessionOptions,
  TerminateOptions,
  ReportOptions,
  LogfileTarget,
  StreamPolicy,
  StreamPolicyFn,
} from './session/index.js';
export {
  getInformer,
  setInformer,
  withSession,
  done,
  terminate,
  terminateIfErrors,
  errorsAccrued,
  getProgName,
  setCulprit,
  addCulprit,
  getCulprit,
  joinCulprit,
} from './session/stack.js';

export { HeraldError, TemplateError, defineErrorKind } from './errors/index.js';
export type { ErrorKindOptions } from './errors/index.js';

export { ProgressBar } from './progress/index.js';
export type { ProgressBarOptions, ProgressMarker, ProgressState } from './progress/index.js';

export { compose, join, indent, wrapText } from './compose/index.js';
export type { ComposeOptions } from './compose/index.js';

export { Color, colorize, stripColors, isTTY } from './output/colors.js';
export type { ColorName } from './output/colors.js';

export { SystemNotifier } from './notifications/index.js';
export { createDiagnostics } from './logger/index.js';
export type { Diagnostics } from './logger/index.js';
export { loadConfig } from './config/index.js';

export { osError, fullStop, cull, isPlainObject } from './utils/index.js';

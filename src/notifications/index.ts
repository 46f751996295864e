export { SystemNotifier } from './system.js';
export type { NodeNotifier } from './system.js';
export type { DesktopNotification, NotificationSink, NotificationUrgency } from '../types/notification.js';

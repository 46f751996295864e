// Desktop notification types

export type NotificationUrgency = 'low' | 'normal' | 'critical';

export interface DesktopNotification {
  title: string;
  body: string;
  urgency: NotificationUrgency;
}

/**
 * Receives notifications from informants whose notify gate is open.
 * Delivery is fire-and-forget: sinks report their own failures.
 */
export interface NotificationSink {
  readonly name: string;
  send(notification: DesktopNotification): void;
}

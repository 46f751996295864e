/**
 * SystemNotifier: OS-native desktop notifications via node-notifier.
 *
 * node-notifier is CJS-only, so it is loaded with createRequire in this ESM
 * package, and only on first use. Delivery is fire-and-forget; failures are
 * written to the diagnostics log.
 */

import { createRequire } from 'node:module';
import type { Diagnostics } from '../logger/index.js';
import type { DesktopNotification, NotificationSink } from '../types/notification.js';

const require = createRequire(import.meta.url);

export interface NodeNotifier {
  notify(opts: Record<string, unknown>, cb?: (err: unknown) => void): void;
}

function loadNodeNotifier(): NodeNotifier {
  const notifier: NodeNotifier = require('node-notifier');
  return notifier;
}

export class SystemNotifier implements NotificationSink {
  readonly name = 'system';

  private notifier: NodeNotifier | null;

  constructor(
    private readonly diagnostics: Diagnostics,
    notifier?: NodeNotifier,
  ) {
    this.notifier = notifier ?? null;
  }

  send(notification: DesktopNotification): void {
    let notifier: NodeNotifier;
    try {
      notifier = this.notifier ??= loadNodeNotifier();
    } catch (err) {
      this.diagnostics.warn({ err }, 'node-notifier unavailable; notification dropped');
      return;
    }

    notifier.notify(
      {
        title: notification.title,
        message: notification.body,
        urgency: notification.urgency,
        sound: notification.urgency === 'critical',
        wait: false,
      },
      (err: unknown) => {
        if (err) this.diagnostics.warn({ err }, 'desktop notification failed');
      },
    );
  }
}

// src/monitor/notify/types.ts
import type { NotificationEvent } from '@/monitor/types';

/** A delivery channel. Resolves false when the mechanism is unavailable. */
export type Notifier = {
  send(event: NotificationEvent): Promise<boolean>;
};

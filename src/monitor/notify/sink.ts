/* src/monitor/notify/sink.ts
 * One delivery per event key for the monitor's lifetime. Desktop delivery
 * degrades to a printed line once the mechanism proves unavailable.
 */
import type { NotificationEvent } from '@/monitor/types';
import { debugTrace } from '@/util/debug';
import { DBG_SCOPE_NOTIFY } from '@/util/debug-scopes';
import type { Log } from '@/util/log';

import type { Notifier } from './types';

export class NotificationSink {
  private readonly sent = new Set<string>();
  private desktop = true;

  constructor(
    private readonly opts: { enabled: boolean; notifier: Notifier; log: Log },
  ) {}

  /** Resolves true when the event was new. */
  async notify(event: NotificationEvent): Promise<boolean> {
    if (this.sent.has(event.key)) return false;
    this.sent.add(event.key);
    if (!this.opts.enabled) return true;
    if (this.desktop && (await this.opts.notifier.send(event))) return true;
    if (this.desktop) {
      this.desktop = false;
      debugTrace(DBG_SCOPE_NOTIFY, 'desktop notifications unavailable; printing');
    }
    this.opts.log.info(`${event.title}: ${event.message}`);
    return true;
  }
}

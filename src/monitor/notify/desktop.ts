/* src/monitor/notify/desktop.ts
 * Desktop notifications through the platform tool (notify-send or osascript).
 */
import {
  CommandSpawnError,
  runCommand,
  type RunCommand,
} from '@/monitor/process/exec';
import type { NotificationEvent } from '@/monitor/types';
import { debugTrace } from '@/util/debug';
import { DBG_SCOPE_NOTIFY } from '@/util/debug-scopes';

import type { Notifier } from './types';

const NOTIFY_TIMEOUT_MS = 5000;

const appleString = (s: string): string =>
  `"${s.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;

export const desktopCommand = (
  event: NotificationEvent,
  platform: NodeJS.Platform,
): { command: string; args: string[] } | undefined => {
  if (platform === 'darwin') {
    return {
      command: 'osascript',
      args: [
        '-e',
        `display notification ${appleString(event.message)} with title ${appleString(event.title)}`,
      ],
    };
  }
  if (platform === 'linux' || platform === 'freebsd' || platform === 'openbsd') {
    return {
      command: 'notify-send',
      args: ['-u', event.urgency, event.title, event.message],
    };
  }
  return undefined;
};

export const createDesktopNotifier = (
  opts: { run?: RunCommand; platform?: NodeJS.Platform } = {},
): Notifier => {
  const run = opts.run ?? runCommand;
  const platform = opts.platform ?? process.platform;
  return {
    async send(event) {
      const cmd = desktopCommand(event, platform);
      if (!cmd) return false;
      try {
        const res = await run(cmd.command, cmd.args, {
          timeoutMs: NOTIFY_TIMEOUT_MS,
        });
        if (res.code !== 0) {
          debugTrace(DBG_SCOPE_NOTIFY, `${cmd.command} exited ${String(res.code)}`);
        }
        return res.code === 0;
      } catch (e) {
        if (!(e instanceof CommandSpawnError)) throw e;
        debugTrace(DBG_SCOPE_NOTIFY, e.message);
        return false;
      }
    },
  };
};

// src/monitor/notify/events.ts
import { fmtDuration } from '@/monitor/format';
import type { UnitTransition } from '@/monitor/model';
import type {
  EngineKind,
  NotificationEvent,
  ProgressSnapshot,
} from '@/monitor/types';

export const unitFailedEvent = (
  engine: EngineKind,
  t: UnitTransition,
): NotificationEvent => {
  const { id, label } = t.unit;
  return {
    key: `failed:${id}`,
    title: `${engine}: ${label} failed`,
    message: label === id ? `${id} failed` : `job ${id} (${label}) failed`,
    urgency: 'critical',
  };
};

export const workflowEvent = (
  engine: EngineKind,
  failed: boolean,
  s: ProgressSnapshot,
): NotificationEvent =>
  failed
    ? {
        key: 'workflow:failed',
        title: `${engine}: workflow failed`,
        message: `${s.counts.failed.toString()} of ${s.total.toString()} units failed after ${fmtDuration(s.elapsedSec)}`,
        urgency: 'critical',
      }
    : {
        key: 'workflow:complete',
        title: `${engine}: workflow complete`,
        message: `${s.counts.completed.toString()}/${s.total.toString()} units completed in ${fmtDuration(s.elapsedSec)}`,
        urgency: 'normal',
      };

/** Events for units that failed during this tick. */
export const deriveNotifications = (
  engine: EngineKind,
  transitions: readonly UnitTransition[],
): NotificationEvent[] =>
  transitions
    .filter((t) => t.to === 'failed')
    .map((t) => unitFailedEvent(engine, t));

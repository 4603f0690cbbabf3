/* src/monitor/render/labels.ts
 * Status labels for dashboard rows; bracketed tokens when colors are off.
 */
import type { UnitState } from '@/monitor/types';
import { error, go, idle, isBoring, ok } from '@/util/color';

const BORING: Record<UnitState, string> = {
  pending: '[WAIT]',
  running: '[RUN]',
  completed: '[OK]',
  failed: '[FAIL]',
};

export const label = (state: UnitState): string => {
  if (isBoring()) return BORING[state];
  switch (state) {
    case 'pending':
      return idle('⏸︎ pending');
    case 'running':
      return go('▶︎ running');
    case 'completed':
      return ok('✔︎ completed');
    case 'failed':
      return error('✖︎ failed');
  }
};

// src/monitor/loop/signals.ts
import { debugTrace } from '@/util/debug';
import { DBG_SCOPE_LOOP } from '@/util/debug-scopes';

const SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Abort `controller` on SIGINT/SIGTERM. A second signal falls through to
 * Node's default handling once the listeners are detached.
 * Returns the detach function.
 */
export const attachTermination = (controller: AbortController): (() => void) => {
  const onSignal = (sig: NodeJS.Signals): void => {
    debugTrace(DBG_SCOPE_LOOP, `received ${sig}; finishing`);
    controller.abort(sig);
    detach();
  };
  const detach = (): void => {
    for (const s of SIGNALS) process.off(s, onSignal);
  };
  for (const s of SIGNALS) process.on(s, onSignal);
  return detach;
};

/**
 * Settle queue: debounced, per-key re-evaluation.
 *
 * The first request for a key arms a timer; requests arriving before it
 * fires share the same run. A request arriving while a run is in flight
 * arms a fresh timer, so writes that land mid-evaluation are always
 * picked up by a later pass. Kept in memory: a restart loses nothing that
 * the next response will not re-trigger.
 */

import { logger } from './logger.js';

interface PendingRun {
  timer: ReturnType<typeof setTimeout>;
  waiters: Array<{ resolve: () => void; reject: (err: unknown) => void }>;
}

export interface SettleQueue {
  /** Resolves once the shared run for `key` has finished. */
  settle(key: string, run: () => Promise<void>): Promise<void>;
  pendingCount(): number;
  /** Drop every armed timer; waiters resolve without running. */
  clear(): void;
}

export function createSettleQueue(delayMs: number): SettleQueue {
  const pending = new Map<string, PendingRun>();

  return {
    settle(key, run) {
      return new Promise<void>((resolve, reject) => {
        const existing = pending.get(key);
        if (existing) {
          existing.waiters.push({ resolve, reject });
          logger.debug({ key, waiters: existing.waiters.length }, 'Joined pending settle run');
          return;
        }

        const entry: PendingRun = {
          waiters: [{ resolve, reject }],
          timer: setTimeout(() => {
            pending.delete(key);
            void run().then(
              () => {
                for (const waiter of entry.waiters) waiter.resolve();
              },
              (err: unknown) => {
                logger.warn({ err, key }, 'Settle run failed');
                for (const waiter of entry.waiters) waiter.reject(err);
              },
            );
          }, delayMs),
        };
        entry.timer.unref?.();
        pending.set(key, entry);
      });
    },

    pendingCount() {
      return pending.size;
    },

    clear() {
      for (const entry of pending.values()) {
        clearTimeout(entry.timer);
        for (const waiter of entry.waiters) waiter.resolve();
      }
      if (pending.size > 0) logger.info({ dropped: pending.size }, 'Cleared pending settle runs');
      pending.clear();
    },
  };
}

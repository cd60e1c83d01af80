/**
 * AllSafe → Normal reset.
 *
 * The only genuinely scheduled work in the engine. A timer fires once per
 * group; on fire it re-reads the group and resets only if the status is
 * still AllSafe, so a check or SOS that arrived during the window simply
 * makes the reset a no-op. Scheduling a group again replaces its timer.
 *
 * Timers are in-process and do not survive a restart; the resolver's own
 * AllSafe window makes the next refresh land on Normal anyway.
 */

import { logger } from '../middleware/logger.js';
import type { GroupStatusService } from './group-status.js';

export interface StatusResetScheduler {
  schedule(groupId: string, delayMinutes: number): void;
  cancel(groupId: string): boolean;
  pendingCount(): number;
  shutdown(): void;
}

export function createStatusResetScheduler(groupStatus: Pick<GroupStatusService, 'resetIfAllSafe'>): StatusResetScheduler {
  const pendingTimers = new Map<string, ReturnType<typeof setTimeout>>();

  function cancel(groupId: string): boolean {
    const timer = pendingTimers.get(groupId);
    if (!timer) return false;
    clearTimeout(timer);
    pendingTimers.delete(groupId);
    return true;
  }

  return {
    schedule(groupId, delayMinutes) {
      if (cancel(groupId)) {
        logger.debug({ groupId }, 'Replacing pending status reset');
      }

      const timer = setTimeout(() => {
        pendingTimers.delete(groupId);
        void groupStatus.resetIfAllSafe(groupId).then(
          (result) => {
            if (!result) logger.debug({ groupId }, 'Status changed during reset window, reset skipped');
          },
          (err: unknown) => {
            logger.error({ err, groupId }, 'Scheduled status reset failed');
          },
        );
      }, delayMinutes * 60_000);
      timer.unref?.();

      pendingTimers.set(groupId, timer);
      logger.info({ groupId, resetIn: `${delayMinutes}m` }, 'Status reset scheduled');
    },

    cancel,

    pendingCount() {
      return pendingTimers.size;
    },

    shutdown() {
      for (const timer of pendingTimers.values()) {
        clearTimeout(timer);
      }
      pendingTimers.clear();
    },
  };
}

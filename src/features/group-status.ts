/**
 * Group status commits.
 *
 * `refresh` is the normal path after any mutation: it re-derives the
 * status from the group's current alerts and checks, writes it, then
 * re-derives until the committed value matches what the records say.
 * `escalate` is the SOS fast path and skips derivation.
 * Every write goes through a compare-and-swap on the group record so a
 * status write can never resurrect a deleted group as a partial record.
 */

import { logger } from '../middleware/logger.js';
import { NotFoundError } from '../core/errors.js';
import { GROUP_STATUSES, type GroupStatus } from '../core/models.js';
import { resolveGroupStatus } from '../core/status-resolver.js';
import { COLLECTIONS, joinPath } from '../store/paths.js';
import { isStoreRecord, type StoreRecord, type StoreValue } from '../store/record-store.js';
import type { Repository } from '../store/repository.js';
import type { Notifier } from './notifications.js';

export interface StatusCommit {
  previous: GroupStatus | undefined;
  status: GroupStatus;
  changed: boolean;
}

export interface GroupStatusService {
  /** Compute without writing. */
  derive(groupId: string): Promise<GroupStatus>;
  /** Derive, commit, and announce a change. */
  refresh(groupId: string): Promise<StatusCommit>;
  /** Write `status` (plus any extra group fields) without deriving. */
  commit(groupId: string, status: GroupStatus, extra?: Record<string, StoreValue>): Promise<StatusCommit>;
  escalate(groupId: string): Promise<StatusCommit>;
  /** Move AllSafe to Normal; any other status is left alone. */
  resetIfAllSafe(groupId: string): Promise<StatusCommit | undefined>;
}

export interface GroupStatusDeps {
  repo: Repository;
  notifier: Notifier;
  resetWindowMs: number;
  clock?: () => number;
}

const MAX_REFRESH_PASSES = 3;

function readStatus(record: StoreRecord): GroupStatus | undefined {
  const value = record.currentStatus;
  return GROUP_STATUSES.find((status) => status === value);
}

export function createGroupStatusService(deps: GroupStatusDeps): GroupStatusService {
  const { repo, notifier } = deps;
  const clock = deps.clock ?? Date.now;

  async function write(
    groupId: string,
    next: (previous: GroupStatus | undefined) => GroupStatus | undefined,
    extra: Record<string, StoreValue> = {},
  ): Promise<StatusCommit | undefined> {
    const outcome: { exists: boolean; previous?: GroupStatus; status?: GroupStatus } = { exists: false };

    await repo.store.transaction(joinPath(COLLECTIONS.groups, groupId), (current) => {
      if (!isStoreRecord(current)) return undefined;
      outcome.exists = true;
      outcome.previous = readStatus(current);
      outcome.status = next(outcome.previous);
      if (outcome.status === undefined) return undefined;
      return { ...current, ...extra, currentStatus: outcome.status };
    });

    const { exists, previous, status } = outcome;
    if (!exists) throw new NotFoundError('group', groupId);
    if (status === undefined) return undefined;
    return { previous, status, changed: previous !== status };
  }

  async function derive(groupId: string): Promise<GroupStatus> {
    const [alerts, checks] = await Promise.all([repo.listActiveAlerts(groupId), repo.listChecks(groupId)]);
    return resolveGroupStatus({ id: groupId }, alerts, checks, clock(), deps.resetWindowMs);
  }

  async function commit(groupId: string, status: GroupStatus, extra?: Record<string, StoreValue>): Promise<StatusCommit> {
    const result = await write(groupId, () => status, extra);
    if (!result) throw new NotFoundError('group', groupId);
    if (result.changed) logger.info({ groupId, from: result.previous, to: status }, 'Group status committed');
    return result;
  }

  return {
    derive,
    commit,

    async refresh(groupId) {
      const first = await commit(groupId, await derive(groupId));
      let latest = first;

      // A concurrent refresh may have committed from older reads; re-derive after our own write.
      for (let pass = 1; pass < MAX_REFRESH_PASSES; pass++) {
        const status = await derive(groupId);
        if (status === latest.status) break;
        latest = await commit(groupId, status);
      }

      const result: StatusCommit = {
        previous: first.previous,
        status: latest.status,
        changed: first.previous !== latest.status,
      };
      if (result.changed) await notifier.statusChanged(groupId, result.status);
      return result;
    },

    escalate(groupId) {
      return commit(groupId, 'emergency');
    },

    async resetIfAllSafe(groupId) {
      const result = await write(groupId, (previous) => (previous === 'allSafe' ? 'normal' : undefined));
      if (result) {
        logger.info({ groupId }, 'Group status reset to normal');
        await notifier.statusChanged(groupId, 'normal');
      }
      return result;
    },
  };
}

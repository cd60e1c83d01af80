/**
 * Safety check completion evaluation.
 *
 * Re-runnable from any client at any time: every pass re-reads the check
 * and the group's current member list and decides from those alone. The
 * terminal status is written by compare-and-swap so it lands exactly once
 * and is never reverted by a pass that raced with it.
 */

import { logger } from '../middleware/logger.js';
import { aggregate, isTerminal, type Aggregate } from '../core/aggregator.js';
import { NotFoundError } from '../core/errors.js';
import type { GroupStatus, SafetyCheckStatus } from '../core/models.js';
import { COLLECTIONS, joinPath } from '../store/paths.js';
import { isStoreRecord } from '../store/record-store.js';
import type { Repository } from '../store/repository.js';
import type { SettleQueue } from '../middleware/settle.js';
import type { GroupStatusService } from './group-status.js';
import type { StatusResetScheduler } from './status-reset.js';

export interface EvaluationResult {
  checkId: string;
  groupId: string;
  /** Check status after this pass */
  status: SafetyCheckStatus;
  /** True when this pass wrote the terminal status */
  finalized: boolean;
  aggregate: Aggregate;
  /** Group status committed by this pass, when it committed one */
  groupStatus?: GroupStatus;
}

export interface CompletionEvaluator {
  evaluate(checkId: string, contextGroupId?: string): Promise<EvaluationResult>;
  /** Evaluate after the settle delay; callers within the window share one pass. */
  evaluateSettled(checkId: string, contextGroupId?: string): Promise<void>;
  pendingCount(): number;
  shutdown(): void;
}

export interface CompletionDeps {
  repo: Repository;
  groupStatus: GroupStatusService;
  scheduler: StatusResetScheduler;
  settle: SettleQueue;
  resetDelayMinutes: number;
  clock?: () => number;
}

export function createCompletionEvaluator(deps: CompletionDeps): CompletionEvaluator {
  const { repo, groupStatus, scheduler, settle } = deps;
  const clock = deps.clock ?? Date.now;

  /** Write `pending` only where no status is recorded yet. */
  async function reassertPending(checkId: string): Promise<SafetyCheckStatus> {
    const result = await repo.store.transaction(joinPath(COLLECTIONS.safetyChecks, checkId), (current) => {
      if (!isStoreRecord(current) || current.status !== undefined) return undefined;
      return { ...current, status: 'pending' };
    });
    return isStoreRecord(result.value) ? readCheckStatus(result.value.status) : 'pending';
  }

  /** Terminal status plus `completedAt`, written once. Returns the status now on record. */
  async function finalize(checkId: string, status: SafetyCheckStatus): Promise<{ status: SafetyCheckStatus; finalized: boolean }> {
    const now = clock();
    const result = await repo.store.transaction(joinPath(COLLECTIONS.safetyChecks, checkId), (current) => {
      if (!isStoreRecord(current)) return undefined;
      if (current.status !== undefined && current.status !== 'pending') return undefined;
      return { ...current, status, completedAt: now };
    });

    if (!isStoreRecord(result.value)) throw new NotFoundError('safetyCheck', checkId);
    return { status: readCheckStatus(result.value.status), finalized: result.committed };
  }

  async function evaluate(checkId: string, contextGroupId?: string): Promise<EvaluationResult> {
    const check = await repo.getCheck(checkId, contextGroupId);
    const group = await repo.getGroup(check.groupId);
    const agg = aggregate(check, group.members);
    const base = { checkId, groupId: group.id, aggregate: agg };

    if (isTerminal(check.status)) {
      return { ...base, status: check.status, finalized: false };
    }

    if (!agg.complete) {
      const status = await reassertPending(checkId);
      const commit = await groupStatus.refresh(group.id);
      logger.debug({ checkId, missing: agg.missing.length }, 'Safety check still pending');
      return { ...base, status, finalized: false, groupStatus: commit.status };
    }

    const { status, finalized } = await finalize(checkId, agg.status);
    if (!finalized) {
      return { ...base, status, finalized };
    }

    logger.info({ checkId, groupId: group.id, status, hasSOS: agg.hasSOS }, 'Safety check completed');

    // Usually Emergency again, unless the check's alert was resolved meanwhile.
    const commit = await groupStatus.refresh(group.id);
    if (status === 'allSafe' && commit.status === 'allSafe') {
      scheduler.schedule(group.id, deps.resetDelayMinutes);
    }
    return { ...base, status, finalized, groupStatus: commit.status };
  }

  return {
    evaluate,

    evaluateSettled(checkId, contextGroupId) {
      return settle.settle(checkId, async () => {
        await evaluate(checkId, contextGroupId);
      });
    },

    pendingCount() {
      return settle.pendingCount();
    },

    shutdown() {
      settle.clear();
    },
  };
}

function readCheckStatus(value: unknown): SafetyCheckStatus {
  return value === 'allSafe' || value === 'emergency' ? value : 'pending';
}

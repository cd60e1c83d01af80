/**
 * Safety check coordinator: start a poll, take responses, drive the check
 * from pending to a terminal status.
 *
 * Each response is merged into the check by a per-record compare-and-swap,
 * so concurrent answers from different members never overwrite each other.
 * Completion is re-derived after every response (see completion.ts); an
 * answer arriving after the check is terminal is recorded but never
 * reverts it.
 */

import { logger } from '../middleware/logger.js';
import { summarize, type ResponseSummary } from '../core/aggregator.js';
import { encodeResponse, encodeSafetyCheck } from '../core/codec.js';
import { canStartSafetyCheck } from '../core/cooldown.js';
import { NotFoundError, PermissionDeniedError, RateLimitedError } from '../core/errors.js';
import {
  isMember,
  type Group,
  type LocationData,
  type SafetyCheck,
  type SafetyCheckStatus,
  type SafetyResponse,
  type SafetyResponseStatus,
} from '../core/models.js';
import { COLLECTIONS, joinPath } from '../store/paths.js';
import { isStoreRecord, type StoreRecord } from '../store/record-store.js';
import type { Repository } from '../store/repository.js';
import type { CompletionEvaluator } from './completion.js';
import type { GroupStatusService } from './group-status.js';
import type { Notifier } from './notifications.js';
import type { SOSAlertCoordinator } from './sos-alert.js';

export interface RespondOptions {
  location?: LocationData;
  message?: string;
  /** The caller's active group, used when the stored check lacks its groupId */
  contextGroupId?: string;
}

export interface RespondAck {
  checkId: string;
  groupId: string;
  response: SafetyResponse;
  /** Alert raised by an SOS answer */
  alertId?: string;
  /** Earlier alerts superseded by a Safe answer */
  resolvedAlertIds: string[];
  /** Check status once the settled evaluation has run */
  checkStatus: SafetyCheckStatus;
}

export interface SafetyCheckCoordinator {
  initiate(groupId: string, initiatorId: string): Promise<SafetyCheck>;
  respond(checkId: string, userId: string, status: SafetyResponseStatus, options?: RespondOptions): Promise<RespondAck>;
  evaluate(checkId: string, contextGroupId?: string): ReturnType<CompletionEvaluator['evaluate']>;
  getCheck(checkId: string, contextGroupId?: string): Promise<SafetyCheck>;
  listChecks(groupId: string): Promise<SafetyCheck[]>;
  summarize(check: SafetyCheck, members: readonly string[]): ResponseSummary;
}

export interface SafetyCheckDeps {
  repo: Repository;
  groupStatus: GroupStatusService;
  completion: CompletionEvaluator;
  alerts: SOSAlertCoordinator;
  notifier: Notifier;
  clock?: () => number;
}

export function createSafetyCheckCoordinator(deps: SafetyCheckDeps): SafetyCheckCoordinator {
  const { repo, groupStatus, completion, alerts, notifier } = deps;
  const clock = deps.clock ?? Date.now;
  const store = repo.store;

  function requireMember(group: Group, userId: string, action: string): void {
    if (!isMember(group, userId)) {
      throw new PermissionDeniedError(`Only group members can ${action}`);
    }
  }

  /** Merge one response into the check; refused when the check no longer exists. */
  async function writeResponse(checkId: string, response: SafetyResponse): Promise<void> {
    const result = await store.transaction(joinPath(COLLECTIONS.safetyChecks, checkId), (current) => {
      if (!isStoreRecord(current)) return undefined;
      const responses: StoreRecord = isStoreRecord(current.responses) ? current.responses : {};
      return { ...current, responses: { ...responses, [response.userId]: encodeResponse(response) } };
    });
    if (!result.committed) throw new NotFoundError('safetyCheck', checkId);
  }

  return {
    async initiate(groupId, initiatorId) {
      const group = await repo.getGroup(groupId);
      requireMember(group, initiatorId, 'start a safety check');

      const now = clock();
      const decision = canStartSafetyCheck(group, now);
      if (!decision.allowed) {
        logger.info({ groupId, remainingMinutes: decision.remainingMinutes }, 'Safety check rate limited');
        throw new RateLimitedError('safety_check', decision.remainingMinutes);
      }

      const check: SafetyCheck = {
        id: store.newId(COLLECTIONS.safetyChecks),
        groupId,
        initiatedBy: initiatorId,
        createdAt: now,
        status: 'pending',
        responses: {},
      };
      await store.set(joinPath(COLLECTIONS.safetyChecks, check.id), encodeSafetyCheck(check));

      // An active SOS is never masked by a new poll.
      const active = await repo.listActiveAlerts(groupId);
      await groupStatus.commit(groupId, active.length > 0 ? 'emergency' : 'checkingStatus', { lastSafetyCheckAt: now });

      logger.info({ groupId, checkId: check.id, initiatorId, activeAlerts: active.length }, 'Safety check started');
      await notifier.safetyCheckStarted(groupId, initiatorId, check.id);
      return check;
    },

    async respond(checkId, userId, status, options = {}) {
      const check = await repo.getCheck(checkId, options.contextGroupId);
      const group = await repo.getGroup(check.groupId);
      requireMember(group, userId, 'respond to a safety check');

      const response: SafetyResponse = {
        userId,
        status,
        timestamp: clock(),
        location: options.location,
        message: options.message,
      };
      await writeResponse(checkId, response);
      logger.info({ checkId, groupId: group.id, userId, status }, 'Safety check response recorded');

      let alertId: string | undefined;
      let resolvedAlertIds: string[] = [];

      if (status === 'sos') {
        await groupStatus.escalate(group.id);
        const alert = await alerts.createFromCheckResponse({
          groupId: group.id,
          userId,
          checkId,
          timestamp: response.timestamp,
          location: options.location,
          message: options.message,
        });
        alertId = alert.id;
      } else if (status === 'safe') {
        resolvedAlertIds = await alerts.autoResolve(userId, group.id, check.createdAt);
      }

      await completion.evaluateSettled(checkId, group.id);
      const settled = await repo.getCheck(checkId, group.id);

      return { checkId, groupId: group.id, response, alertId, resolvedAlertIds, checkStatus: settled.status };
    },

    evaluate(checkId, contextGroupId) {
      return completion.evaluate(checkId, contextGroupId);
    },

    getCheck(checkId, contextGroupId) {
      return repo.getCheck(checkId, contextGroupId);
    },

    listChecks(groupId) {
      return repo.listChecks(groupId);
    },

    summarize,
  };
}

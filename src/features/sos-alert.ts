/**
 * SOS alert coordinator.
 *
 * An SOS always escalates the group straight to Emergency; it is never
 * blocked by the group's current status. Resolution (cancel, auto-resolve)
 * is a compare-and-swap on `isActive`, so resolving twice leaves the first
 * resolvedAt / resolvedReason in place.
 */

import { logger } from '../middleware/logger.js';
import { encodeAlert, decodeAlert } from '../core/codec.js';
import { canSendSOS } from '../core/cooldown.js';
import { NotFoundError, PermissionDeniedError, RateLimitedError } from '../core/errors.js';
import { isMember, type Group, type LocationData, type SOSAlert } from '../core/models.js';
import { COLLECTIONS, joinPath } from '../store/paths.js';
import { isStoreRecord, type StoreRecord } from '../store/record-store.js';
import type { Repository } from '../store/repository.js';
import type { CompletionEvaluator } from './completion.js';
import type { GroupStatusService } from './group-status.js';
import type { LocationProvider, Notifier } from './notifications.js';

export const SUPERSEDED_REASON = 'superseded by later Safe response';
export const CANCELLED_BY_USER_REASON = 'Cancelled by user';
export const CANCELLED_BY_ADMIN_REASON = 'Cancelled by admin';

const CHECK_RESPONSE_LOCATION: LocationData = {
  latitude: 0,
  longitude: 0,
  address: 'Safety check response location',
};

const MS_PER_HOUR = 60 * 60_000;

export type CancelDecision =
  | { allowed: true; asAdmin: boolean }
  | { allowed: false; reason: 'not_owner' }
  | { allowed: false; reason: 'admin_wait'; hoursRemaining: number };

/**
 * Owners may always cancel. The group admin may cancel someone else's
 * alert once it is at least `adminDelayMs` old.
 */
export function canCancel(
  alert: Pick<SOSAlert, 'userId' | 'timestamp'>,
  requesterId: string,
  adminId: string,
  now: number,
  adminDelayMs: number = 24 * MS_PER_HOUR,
): CancelDecision {
  if (requesterId === alert.userId) return { allowed: true, asAdmin: false };
  if (requesterId !== adminId) return { allowed: false, reason: 'not_owner' };

  const remainingMs = adminDelayMs - (now - alert.timestamp);
  if (remainingMs <= 0) return { allowed: true, asAdmin: true };
  return { allowed: false, reason: 'admin_wait', hoursRemaining: Math.ceil(remainingMs / MS_PER_HOUR) };
}

export interface CheckResponseSOS {
  groupId: string;
  userId: string;
  checkId: string;
  timestamp: number;
  location?: LocationData;
  message?: string;
}

export interface SOSAlertCoordinator {
  sendDirect(userId: string, groupId: string, location: LocationData, message?: string): Promise<SOSAlert>;
  createFromCheckResponse(input: CheckResponseSOS): Promise<SOSAlert>;
  cancel(alertId: string, requesterId: string, reason?: string): Promise<SOSAlert>;
  /** Resolve `userId`'s active alerts in the group raised before `checkTimestamp`. Returns resolved ids. */
  autoResolve(userId: string, groupId: string, checkTimestamp: number): Promise<string[]>;
  listActive(groupId: string): Promise<SOSAlert[]>;
  getAlert(alertId: string): Promise<SOSAlert>;
}

export interface SOSAlertDeps {
  repo: Repository;
  groupStatus: GroupStatusService;
  completion: CompletionEvaluator;
  notifier: Notifier;
  location: LocationProvider;
  adminCancelHours: number;
  clock?: () => number;
}

export function createSOSAlertCoordinator(deps: SOSAlertDeps): SOSAlertCoordinator {
  const { repo, groupStatus, completion, notifier } = deps;
  const clock = deps.clock ?? Date.now;
  const store = repo.store;

  async function requireMember(groupId: string, userId: string): Promise<Group> {
    const group = await repo.getGroup(groupId);
    if (!isMember(group, userId)) {
      throw new PermissionDeniedError('Only group members can send an SOS');
    }
    return group;
  }

  async function writeAlert(alert: SOSAlert): Promise<void> {
    await store.set(joinPath(COLLECTIONS.sosAlerts, alert.id), encodeAlert(alert));
  }

  async function escalate(alert: SOSAlert): Promise<SOSAlert> {
    await groupStatus.escalate(alert.groupId);
    logger.warn(
      { alertId: alert.id, groupId: alert.groupId, userId: alert.userId, fromCheck: alert.originSafetyCheckId },
      'SOS alert raised',
    );
    await notifier.sosRaised(alert);
    return alert;
  }

  /** Idempotent: an already-resolved alert comes back unchanged. */
  async function resolve(alertId: string, reason: string, resolvedBy: string): Promise<{ alert: SOSAlert; resolved: boolean }> {
    const now = clock();
    const result = await store.transaction(joinPath(COLLECTIONS.sosAlerts, alertId), (current) => {
      if (!isStoreRecord(current) || current.isActive === false) return undefined;
      return { ...current, isActive: false, resolvedAt: now, resolvedReason: reason, resolvedBy };
    });

    if (result.value === undefined) throw new NotFoundError('sosAlert', alertId);
    return { alert: decodeAlert(alertId, result.value), resolved: result.committed };
  }

  /**
   * Cancelling an SOS raised from a check answer withdraws that answer while
   * the check is still pending. Direct alerts own no answer. Returns the id
   * of the check touched, if any.
   */
  async function retractCheckResponse(alert: SOSAlert): Promise<string | undefined> {
    const checkId = alert.originSafetyCheckId;
    if (checkId === undefined) return undefined;

    const result = await store.transaction(joinPath(COLLECTIONS.safetyChecks, checkId), (current) => {
      if (!isStoreRecord(current) || (current.status !== undefined && current.status !== 'pending')) return undefined;
      const responses: StoreRecord = isStoreRecord(current.responses) ? { ...current.responses } : {};
      const response = responses[alert.userId];
      if (!isStoreRecord(response) || response.status !== 'sos') return undefined;
      delete responses[alert.userId];
      return { ...current, responses };
    });

    return result.committed ? checkId : undefined;
  }

  return {
    async sendDirect(userId, groupId, location, message) {
      const group = await requireMember(groupId, userId);
      const now = clock();

      const decision = canSendSOS(await repo.getLastSOSAt(userId, groupId), group, now);
      if (!decision.allowed) {
        logger.info({ userId, groupId, remainingMinutes: decision.remainingMinutes }, 'SOS rate limited');
        throw new RateLimitedError('sos', decision.remainingMinutes);
      }

      const alert: SOSAlert = {
        id: store.newId(COLLECTIONS.sosAlerts),
        userId,
        groupId,
        timestamp: now,
        location,
        message,
        isActive: true,
      };

      await writeAlert(alert);
      await store.set(joinPath(COLLECTIONS.userSOSTimes, userId, groupId), now);
      return escalate(alert);
    },

    async createFromCheckResponse(input) {
      const location = input.location
        ?? (await deps.location.lastKnownLocation())
        ?? CHECK_RESPONSE_LOCATION;

      const alert: SOSAlert = {
        id: store.newId(COLLECTIONS.sosAlerts),
        userId: input.userId,
        groupId: input.groupId,
        timestamp: input.timestamp,
        location,
        message: input.message,
        isActive: true,
        originSafetyCheckId: input.checkId,
      };

      await writeAlert(alert);
      return escalate(alert);
    },

    async cancel(alertId, requesterId, reason) {
      const alert = await repo.getAlert(alertId);
      const group = await repo.getGroup(alert.groupId);

      const decision = canCancel(alert, requesterId, group.adminId, clock(), deps.adminCancelHours * MS_PER_HOUR);
      if (!decision.allowed) {
        if (decision.reason === 'admin_wait') {
          throw new PermissionDeniedError(
            `Admins can cancel SOS alerts after ${deps.adminCancelHours} hours. ${decision.hoursRemaining} hours remaining.`,
            decision.hoursRemaining,
          );
        }
        throw new PermissionDeniedError('You can only cancel your own SOS alerts.');
      }

      const { alert: resolved, resolved: changed } = await resolve(
        alertId,
        reason ?? (decision.asAdmin ? CANCELLED_BY_ADMIN_REASON : CANCELLED_BY_USER_REASON),
        requesterId,
      );
      if (changed) {
        logger.info({ alertId, groupId: alert.groupId, requesterId, asAdmin: decision.asAdmin }, 'SOS alert cancelled');
      }

      const checkId = await retractCheckResponse(alert);
      if (checkId !== undefined) {
        logger.info({ alertId, checkId, userId: alert.userId }, 'Retracted SOS response from pending safety check');
        await completion.evaluate(checkId, alert.groupId);
      }

      await groupStatus.refresh(alert.groupId);
      return resolved;
    },

    async autoResolve(userId, groupId, checkTimestamp) {
      const stale = (await repo.listActiveAlerts(groupId))
        .filter((alert) => alert.userId === userId && alert.timestamp < checkTimestamp);

      const resolvedIds: string[] = [];
      for (const alert of stale) {
        const { resolved } = await resolve(alert.id, SUPERSEDED_REASON, userId);
        if (resolved) resolvedIds.push(alert.id);
      }

      if (resolvedIds.length > 0) {
        logger.info({ userId, groupId, alertIds: resolvedIds }, 'SOS alerts superseded by Safe response');
        await groupStatus.refresh(groupId);
      }
      return resolvedIds;
    },

    listActive(groupId) {
      return repo.listActiveAlerts(groupId);
    },

    getAlert(alertId) {
      return repo.getAlert(alertId);
    },
  };
}

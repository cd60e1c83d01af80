/**
 * Typed reads over the record store.
 *
 * Group-scoped lists go through the indexed `groupId` equality query; no
 * caller scans a whole collection. Malformed records in a list are logged
 * and skipped so one bad row cannot hide the rest of a group's state.
 * A check read without a `groupId` through a known group gets that group
 * written back, so the group-scoped queries see it from then on.
 */

import { logger } from '../middleware/logger.js';
import {
  decodeAlert,
  decodeAll,
  decodeGroup,
  decodeInvitation,
  decodeSafetyCheck,
  decodeUser,
} from '../core/codec.js';
import { NotFoundError } from '../core/errors.js';
import type { Group, GroupInvitation, SafetyCheck, SOSAlert, UserProfile } from '../core/models.js';
import { COLLECTIONS, joinPath } from './paths.js';
import { isStoreRecord, type RecordStore } from './record-store.js';

export interface Repository {
  readonly store: RecordStore;
  findGroup(groupId: string): Promise<Group | undefined>;
  /** Throws NotFoundError when the group does not exist. */
  getGroup(groupId: string): Promise<Group>;
  getCheck(checkId: string, contextGroupId?: string): Promise<SafetyCheck>;
  /** Newest first. */
  listChecks(groupId: string): Promise<SafetyCheck[]>;
  getAlert(alertId: string): Promise<SOSAlert>;
  /** Newest first. */
  listAlerts(groupId: string): Promise<SOSAlert[]>;
  listActiveAlerts(groupId: string): Promise<SOSAlert[]>;
  getLastSOSAt(userId: string, groupId: string): Promise<number | undefined>;
  findUser(userId: string): Promise<UserProfile | undefined>;
  listInvitations(field: 'groupId' | 'invitedUserId', value: string): Promise<GroupInvitation[]>;
}

function logSkipped(collection: string) {
  return (id: string, err: unknown) => {
    logger.warn({ err, collection, id }, 'Skipping malformed record');
  };
}

export function createRepository(store: RecordStore): Repository {
  const findGroup = async (groupId: string): Promise<Group | undefined> => {
    const raw = await store.get(joinPath(COLLECTIONS.groups, groupId));
    return raw === undefined ? undefined : decodeGroup(groupId, raw);
  };

  const listAlerts = async (groupId: string): Promise<SOSAlert[]> => {
    const records = await store.queryEqual(COLLECTIONS.sosAlerts, 'groupId', groupId);
    return decodeAll(records, decodeAlert, logSkipped(COLLECTIONS.sosAlerts))
      .sort((a, b) => b.timestamp - a.timestamp);
  };

  return {
    store,
    findGroup,

    async getGroup(groupId) {
      const group = await findGroup(groupId);
      if (!group) throw new NotFoundError('group', groupId);
      return group;
    },

    async getCheck(checkId, contextGroupId) {
      const raw = await store.get(joinPath(COLLECTIONS.safetyChecks, checkId));
      if (raw === undefined) throw new NotFoundError('safetyCheck', checkId);
      const check = decodeSafetyCheck(checkId, raw, contextGroupId);

      if (isStoreRecord(raw) && raw.groupId === undefined && (await findGroup(check.groupId))) {
        const result = await store.transaction(joinPath(COLLECTIONS.safetyChecks, checkId), (current) =>
          isStoreRecord(current) && current.groupId === undefined ? { ...current, groupId: check.groupId } : undefined,
        );
        if (result.committed) logger.info({ checkId, groupId: check.groupId }, 'Attached safety check to its group');
      }
      return check;
    },

    async listChecks(groupId) {
      const records = await store.queryEqual(COLLECTIONS.safetyChecks, 'groupId', groupId);
      return decodeAll(records, (id, raw) => decodeSafetyCheck(id, raw, groupId), logSkipped(COLLECTIONS.safetyChecks))
        .sort((a, b) => b.createdAt - a.createdAt);
    },

    async getAlert(alertId) {
      const raw = await store.get(joinPath(COLLECTIONS.sosAlerts, alertId));
      if (raw === undefined) throw new NotFoundError('sosAlert', alertId);
      return decodeAlert(alertId, raw);
    },

    listAlerts,

    async listActiveAlerts(groupId) {
      return (await listAlerts(groupId)).filter((alert) => alert.isActive);
    },

    async getLastSOSAt(userId, groupId) {
      const value = await store.get(joinPath(COLLECTIONS.userSOSTimes, userId, groupId));
      return typeof value === 'number' ? value : undefined;
    },

    async findUser(userId) {
      const raw = await store.get(joinPath(COLLECTIONS.users, userId));
      return raw === undefined ? undefined : decodeUser(userId, raw);
    },

    async listInvitations(field, value) {
      const records = await store.queryEqual(COLLECTIONS.invitations, field, value);
      return decodeAll(records, decodeInvitation, logSkipped(COLLECTIONS.invitations))
        .sort((a, b) => b.timestamp - a.timestamp);
    },
  };
}

/**
 * Group membership: create, invite, join, leave, delete, settings.
 *
 * Every change to a group's member lists runs as a compare-and-swap on the
 * group record, so an accept racing a removal cannot resurrect a member or
 * break the admin ∈ members / members ∩ pending = ∅ invariants. Users'
 * own `groups` lists are a denormalized index and are patched afterwards.
 */

import { logger } from '../middleware/logger.js';
import { decodeGroup, encodeGroup, encodeInvitation } from '../core/codec.js';
import { InvalidArgumentError, NotFoundError, PermissionDeniedError } from '../core/errors.js';
import {
  DEFAULT_SAFETY_CHECK_INTERVAL_MINUTES,
  DEFAULT_SOS_INTERVAL_MINUTES,
  SAFETY_CHECK_INTERVAL_RANGE,
  SOS_INTERVAL_RANGE,
  isMember,
  sortGroupsByPriority,
  type Group,
  type GroupInvitation,
} from '../core/models.js';
import { COLLECTIONS, joinPath } from '../store/paths.js';
import { isStoreRecord, type StoreRecord } from '../store/record-store.js';
import type { Repository } from '../store/repository.js';
import type { CompletionEvaluator } from './completion.js';
import type { Notifier } from './notifications.js';
import type { StatusResetScheduler } from './status-reset.js';

export interface MembershipService {
  createGroup(name: string, userId: string): Promise<Group>;
  inviteUser(groupId: string, invitedUserId: string, inviterId: string): Promise<GroupInvitation>;
  acceptInvitation(groupId: string, userId: string): Promise<Group>;
  declineInvitation(groupId: string, userId: string): Promise<void>;
  cancelInvitation(groupId: string, invitedUserId: string, adminId: string): Promise<void>;
  removeMember(groupId: string, memberId: string, adminId: string): Promise<Group>;
  /** Returns the updated group, or undefined when the last member (the admin) left and the group was deleted. */
  leaveGroup(groupId: string, userId: string): Promise<Group | undefined>;
  deleteGroup(groupId: string, adminId: string): Promise<void>;
  renameGroup(groupId: string, name: string, adminId: string): Promise<Group>;
  updateSafetyCheckInterval(groupId: string, minutes: number, adminId: string): Promise<Group>;
  updateSOSInterval(groupId: string, minutes: number, adminId: string): Promise<Group>;
  getGroup(groupId: string): Promise<Group>;
  listUserGroups(userId: string): Promise<Group[]>;
  listGroupInvitations(groupId: string): Promise<GroupInvitation[]>;
  listUserInvitations(userId: string): Promise<GroupInvitation[]>;
}

export interface MembershipDeps {
  repo: Repository;
  completion: CompletionEvaluator;
  scheduler: StatusResetScheduler;
  notifier: Notifier;
  clock?: () => number;
}

function requireAdmin(group: Group, userId: string, action: string): void {
  if (group.adminId !== userId) {
    throw new PermissionDeniedError(`Only group admin can ${action}`);
  }
}

function requireInRange(value: number, range: { min: number; max: number }, label: string): void {
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new InvalidArgumentError(`${label} must be between ${range.min} and ${range.max} minutes`);
  }
}

function normalizeName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) throw new InvalidArgumentError('Group name cannot be empty');
  return trimmed;
}

export function createMembershipService(deps: MembershipDeps): MembershipService {
  const { repo, completion, scheduler, notifier } = deps;
  const clock = deps.clock ?? Date.now;
  const store = repo.store;

  /**
   * Apply `change` to the group under compare-and-swap. `change` may throw
   * to refuse, or return undefined to leave the record as it is.
   */
  async function mutateGroup(groupId: string, change: (group: Group) => Group | undefined): Promise<Group> {
    const result = await store.transaction(joinPath(COLLECTIONS.groups, groupId), (current) => {
      if (current === undefined) return undefined;
      const next = change(decodeGroup(groupId, current));
      return next ? encodeGroup(next) : undefined;
    });
    if (result.value === undefined) throw new NotFoundError('group', groupId);
    return decodeGroup(groupId, result.value);
  }

  async function patchUserGroups(userId: string, edit: (groups: string[]) => string[]): Promise<void> {
    await store.transaction(joinPath(COLLECTIONS.users, userId), (current) => {
      const record: StoreRecord = isStoreRecord(current) ? current : {};
      const groups = Array.isArray(record.groups)
        ? record.groups.filter((value): value is string => typeof value === 'string')
        : [];
      return { ...record, groups: edit(groups) };
    });
  }

  const addUserGroup = (userId: string, groupId: string) =>
    patchUserGroups(userId, (groups) => (groups.includes(groupId) ? groups : [...groups, groupId]));

  const removeUserGroup = (userId: string, groupId: string) =>
    patchUserGroups(userId, (groups) => groups.filter((id) => id !== groupId));

  async function removeInvitations(groupId: string, invitedUserId: string): Promise<number> {
    const invitations = await repo.listInvitations('groupId', groupId);
    const matching = invitations.filter((invitation) => invitation.invitedUserId === invitedUserId);
    for (const invitation of matching) {
      await store.remove(joinPath(COLLECTIONS.invitations, invitation.id));
    }
    return matching.length;
  }

  /** Membership shrank: a pending check may now have every answer it needs. */
  async function reevaluatePendingChecks(groupId: string): Promise<void> {
    const pending = (await repo.listChecks(groupId)).filter((check) => check.status === 'pending');
    for (const check of pending) {
      await completion.evaluate(check.id, groupId);
    }
  }

  async function deleteGroupCascade(group: Group): Promise<void> {
    await store.remove(joinPath(COLLECTIONS.groups, group.id));
    scheduler.cancel(group.id);

    for (const memberId of group.members) {
      await removeUserGroup(memberId, group.id);
      await store.remove(joinPath(COLLECTIONS.userSOSTimes, memberId, group.id));
    }

    const related = [COLLECTIONS.safetyChecks, COLLECTIONS.sosAlerts, COLLECTIONS.invitations] as const;
    const removed: Record<string, number> = {};
    for (const collection of related) {
      const records = await store.queryEqual(collection, 'groupId', group.id);
      for (const id of Object.keys(records)) {
        await store.remove(joinPath(collection, id));
      }
      removed[collection] = Object.keys(records).length;
    }

    logger.info({ groupId: group.id, removed }, 'Group deleted');
  }

  async function updateSettings(
    groupId: string,
    adminId: string,
    action: string,
    apply: (group: Group) => Group,
  ): Promise<Group> {
    const group = await mutateGroup(groupId, (current) => {
      requireAdmin(current, adminId, action);
      return apply(current);
    });
    logger.info({ groupId, action }, 'Group settings updated');
    return group;
  }

  return {
    async createGroup(name, userId) {
      const group: Group = {
        id: store.newId(COLLECTIONS.groups),
        name: normalizeName(name),
        adminId: userId,
        members: [userId],
        pendingMembers: [],
        safetyCheckIntervalMinutes: DEFAULT_SAFETY_CHECK_INTERVAL_MINUTES,
        sosIntervalMinutesPerUser: DEFAULT_SOS_INTERVAL_MINUTES,
        currentStatus: 'normal',
        createdAt: clock(),
      };

      await store.set(joinPath(COLLECTIONS.groups, group.id), encodeGroup(group));
      await addUserGroup(userId, group.id);
      logger.info({ groupId: group.id, adminId: userId }, 'Group created');
      return group;
    },

    async inviteUser(groupId, invitedUserId, inviterId) {
      const group = await mutateGroup(groupId, (current) => {
        if (!isMember(current, inviterId)) {
          throw new PermissionDeniedError('Only group members can invite');
        }
        if (isMember(current, invitedUserId)) {
          throw new InvalidArgumentError('User is already a member of this group');
        }
        if (current.pendingMembers.includes(invitedUserId)) {
          throw new InvalidArgumentError('User has already been invited to this group');
        }
        return { ...current, pendingMembers: [...current.pendingMembers, invitedUserId] };
      });

      const invitation: GroupInvitation = {
        id: store.newId(COLLECTIONS.invitations),
        groupId,
        groupName: group.name,
        invitedUserId,
        invitedByUserId: inviterId,
        timestamp: clock(),
      };
      await store.set(joinPath(COLLECTIONS.invitations, invitation.id), encodeInvitation(invitation));

      logger.info({ groupId, invitedUserId, inviterId }, 'User invited to group');
      await notifier.invitationSent(invitedUserId, group.name, inviterId);
      return invitation;
    },

    async acceptInvitation(groupId, userId) {
      const group = await mutateGroup(groupId, (current) => {
        if (isMember(current, userId)) return undefined;
        if (!current.pendingMembers.includes(userId)) {
          throw new PermissionDeniedError('No pending invitation for this group');
        }
        return {
          ...current,
          members: [...current.members, userId],
          pendingMembers: current.pendingMembers.filter((id) => id !== userId),
        };
      });

      await addUserGroup(userId, groupId);
      await removeInvitations(groupId, userId);
      logger.info({ groupId, userId }, 'Invitation accepted');
      return group;
    },

    async declineInvitation(groupId, userId) {
      await mutateGroup(groupId, (current) =>
        current.pendingMembers.includes(userId)
          ? { ...current, pendingMembers: current.pendingMembers.filter((id) => id !== userId) }
          : undefined,
      );
      await removeInvitations(groupId, userId);
      logger.info({ groupId, userId }, 'Invitation declined');
    },

    async cancelInvitation(groupId, invitedUserId, adminId) {
      await mutateGroup(groupId, (current) => {
        requireAdmin(current, adminId, 'cancel invitations');
        return current.pendingMembers.includes(invitedUserId)
          ? { ...current, pendingMembers: current.pendingMembers.filter((id) => id !== invitedUserId) }
          : undefined;
      });
      const removed = await removeInvitations(groupId, invitedUserId);
      logger.info({ groupId, invitedUserId, removed }, 'Invitation cancelled');
    },

    async removeMember(groupId, memberId, adminId) {
      const group = await mutateGroup(groupId, (current) => {
        requireAdmin(current, adminId, 'remove members');
        if (memberId === current.adminId) {
          throw new InvalidArgumentError('Cannot remove group admin');
        }
        if (!isMember(current, memberId)) return undefined;
        return { ...current, members: current.members.filter((id) => id !== memberId) };
      });

      await removeUserGroup(memberId, groupId);
      logger.info({ groupId, memberId }, 'Member removed from group');
      await reevaluatePendingChecks(groupId);
      return group;
    },

    async leaveGroup(groupId, userId) {
      const group = await repo.getGroup(groupId);
      if (!isMember(group, userId)) {
        throw new InvalidArgumentError('You are not a member of this group');
      }

      if (group.adminId === userId) {
        if (group.members.length > 1) {
          throw new PermissionDeniedError('The admin can only leave as the last member. Remove the other members or delete the group.');
        }
        await deleteGroupCascade(group);
        return undefined;
      }

      const updated = await mutateGroup(groupId, (current) =>
        isMember(current, userId) ? { ...current, members: current.members.filter((id) => id !== userId) } : undefined,
      );
      await removeUserGroup(userId, groupId);
      logger.info({ groupId, userId }, 'Member left group');
      await reevaluatePendingChecks(groupId);
      return updated;
    },

    async deleteGroup(groupId, adminId) {
      const group = await repo.getGroup(groupId);
      requireAdmin(group, adminId, 'delete the group');
      await deleteGroupCascade(group);
    },

    async renameGroup(groupId, name, adminId) {
      const normalized = normalizeName(name);
      return updateSettings(groupId, adminId, 'edit group name', (group) => ({ ...group, name: normalized }));
    },

    async updateSafetyCheckInterval(groupId, minutes, adminId) {
      requireInRange(minutes, SAFETY_CHECK_INTERVAL_RANGE, 'Safety check interval');
      return updateSettings(groupId, adminId, 'edit safety check interval', (group) => ({
        ...group,
        safetyCheckIntervalMinutes: minutes,
      }));
    },

    async updateSOSInterval(groupId, minutes, adminId) {
      requireInRange(minutes, SOS_INTERVAL_RANGE, 'SOS interval');
      return updateSettings(groupId, adminId, 'edit SOS interval', (group) => ({
        ...group,
        sosIntervalMinutesPerUser: minutes,
      }));
    },

    getGroup(groupId) {
      return repo.getGroup(groupId);
    },

    async listUserGroups(userId) {
      const user = await repo.findUser(userId);
      if (!user) return [];

      const groups: Group[] = [];
      for (const groupId of user.groups) {
        const group = await repo.findGroup(groupId);
        if (group && isMember(group, userId)) groups.push(group);
      }
      return sortGroupsByPriority(groups);
    },

    listGroupInvitations(groupId) {
      return repo.listInvitations('groupId', groupId);
    },

    listUserInvitations(userId) {
      return repo.listInvitations('invitedUserId', userId);
    },
  };
}

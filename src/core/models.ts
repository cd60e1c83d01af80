/**
 * Domain records shared by the coordinators, the resolver and the store codec.
 *
 * Keep this file free of store or runtime imports so the pure modules
 * (cooldown, aggregator, resolver) can be tested in isolation.
 */

export const GROUP_STATUSES = ['normal', 'checkingStatus', 'allSafe', 'emergency'] as const;
export type GroupStatus = (typeof GROUP_STATUSES)[number];

export const CHECK_STATUSES = ['pending', 'allSafe', 'emergency'] as const;
export type SafetyCheckStatus = (typeof CHECK_STATUSES)[number];

export const RESPONSE_STATUSES = ['safe', 'sos', 'noResponse'] as const;
export type SafetyResponseStatus = (typeof RESPONSE_STATUSES)[number];

const STATUS_PRIORITY: Record<GroupStatus, number> = {
  emergency: 4,
  checkingStatus: 3,
  allSafe: 2,
  normal: 1,
};

const STATUS_DISPLAY_NAME: Record<GroupStatus, string> = {
  emergency: 'Emergency',
  checkingStatus: 'Checking Status',
  allSafe: 'All Safe',
  normal: 'Normal',
};

/** Higher = more urgent. Also the precedence the resolver applies. */
export function statusPriority(status: GroupStatus): number {
  return STATUS_PRIORITY[status];
}

export function statusDisplayName(status: GroupStatus): string {
  return STATUS_DISPLAY_NAME[status];
}

export interface LocationData {
  latitude: number;
  longitude: number;
  address?: string;
}

export interface Group {
  id: string;
  name: string;
  adminId: string;
  members: string[];
  pendingMembers: string[];
  safetyCheckIntervalMinutes: number;
  sosIntervalMinutesPerUser: number;
  lastSafetyCheckAt?: number;
  currentStatus: GroupStatus;
  createdAt: number;
}

export interface SafetyResponse {
  userId: string;
  status: SafetyResponseStatus;
  timestamp: number;
  location?: LocationData;
  message?: string;
}

export interface SafetyCheck {
  id: string;
  groupId: string;
  initiatedBy: string;
  createdAt: number;
  status: SafetyCheckStatus;
  responses: Record<string, SafetyResponse>;
  /** Set together with the terminal status */
  completedAt?: number;
}

export interface SOSAlert {
  id: string;
  userId: string;
  groupId: string;
  timestamp: number;
  location: LocationData;
  message?: string;
  isActive: boolean;
  resolvedAt?: number;
  resolvedReason?: string;
  resolvedBy?: string;
  /** Present when the alert was raised by an SOS answer to a safety check */
  originSafetyCheckId?: string;
}

export interface GroupInvitation {
  id: string;
  groupId: string;
  groupName: string;
  invitedUserId: string;
  invitedByUserId: string;
  timestamp: number;
}

export interface UserProfile {
  id: string;
  username?: string;
  fcmToken?: string;
  groups: string[];
}

export const DEFAULT_SAFETY_CHECK_INTERVAL_MINUTES = 30;
export const DEFAULT_SOS_INTERVAL_MINUTES = 5;

export const SAFETY_CHECK_INTERVAL_RANGE = { min: 1, max: 1440 } as const;
export const SOS_INTERVAL_RANGE = { min: 1, max: 60 } as const;

export function isMember(group: Group, userId: string): boolean {
  return group.members.includes(userId);
}

/** Sort groups most urgent first, then by name. */
export function sortGroupsByPriority(groups: readonly Group[]): Group[] {
  return [...groups].sort((a, b) => {
    const byPriority = statusPriority(b.currentStatus) - statusPriority(a.currentStatus);
    if (byPriority !== 0) return byPriority;
    return a.name.localeCompare(b.name);
  });
}

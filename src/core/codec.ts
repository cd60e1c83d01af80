/**
 * Record codec: persisted dictionaries to domain records and back.
 *
 * Decoding is lenient where the store legitimately omits fields (a fresh
 * safety check has no `responses` or `status` yet) and strict where a
 * missing field means the record cannot be used.
 */

import { z } from 'zod';

import {
  CHECK_STATUSES,
  DEFAULT_SAFETY_CHECK_INTERVAL_MINUTES,
  DEFAULT_SOS_INTERVAL_MINUTES,
  GROUP_STATUSES,
  RESPONSE_STATUSES,
  type Group,
  type GroupInvitation,
  type LocationData,
  type SafetyCheck,
  type SafetyResponse,
  type SOSAlert,
  type UserProfile,
} from './models.js';
import { InconsistentRecordError, type EntityKind } from './errors.js';
import type { StoreRecord, StoreValue } from '../store/record-store.js';

const stringList = z
  .union([z.array(z.string()), z.record(z.string())])
  .optional()
  .transform((value) => {
    if (!value) return [];
    return Array.isArray(value) ? value : Object.values(value);
  });

const locationSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
  address: z.string().optional(),
});

const responseSchema = z.object({
  userId: z.string(),
  status: z.enum(RESPONSE_STATUSES),
  timestamp: z.number(),
  location: locationSchema.optional(),
  message: z.string().optional(),
});

const groupSchema = z.object({
  name: z.string(),
  adminId: z.string(),
  members: stringList,
  pendingMembers: stringList,
  safetyCheckIntervalMinutes: z.number().int().default(DEFAULT_SAFETY_CHECK_INTERVAL_MINUTES),
  sosIntervalMinutesPerUser: z.number().int().default(DEFAULT_SOS_INTERVAL_MINUTES),
  lastSafetyCheckAt: z.number().optional(),
  currentStatus: z.enum(GROUP_STATUSES).catch('normal'),
  createdAt: z.number().default(0),
});

const checkSchema = z.object({
  groupId: z.string().min(1).optional(),
  initiatedBy: z.string(),
  createdAt: z.number(),
  status: z.enum(CHECK_STATUSES).default('pending'),
  responses: z.record(z.unknown()).default({}),
  completedAt: z.number().optional(),
});

const alertSchema = z.object({
  userId: z.string(),
  groupId: z.string(),
  timestamp: z.number(),
  location: locationSchema.catch({ latitude: 0, longitude: 0 }),
  message: z.string().optional(),
  isActive: z.boolean().default(true),
  resolvedAt: z.number().optional(),
  resolvedReason: z.string().optional(),
  resolvedBy: z.string().optional(),
  originSafetyCheckId: z.string().optional(),
});

const invitationSchema = z.object({
  groupId: z.string(),
  groupName: z.string().default(''),
  invitedUserId: z.string(),
  invitedByUserId: z.string().default(''),
  timestamp: z.number().default(0),
});

const userSchema = z.object({
  username: z.string().optional(),
  fcmToken: z.string().optional(),
  groups: stringList,
});

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, entity: EntityKind, id: string, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InconsistentRecordError(entity, id, detail);
  }
  return result.data;
}

export function decodeGroup(id: string, raw: unknown): Group {
  const data = parseOrThrow(groupSchema, 'group', id, raw);
  return {
    id,
    ...data,
    members: data.members.includes(data.adminId) ? data.members : [data.adminId, ...data.members],
    pendingMembers: data.pendingMembers.filter((userId) => !data.members.includes(userId)),
  };
}

/**
 * Decode a safety check. A check without `groupId` falls back to the
 * caller's active group when one is known; otherwise it is inconsistent.
 * Individual malformed responses are dropped rather than failing the check.
 */
export function decodeSafetyCheck(id: string, raw: unknown, fallbackGroupId?: string): SafetyCheck {
  const data = parseOrThrow(checkSchema, 'safetyCheck', id, raw);
  const groupId = data.groupId ?? fallbackGroupId;
  if (!groupId) {
    throw new InconsistentRecordError('safetyCheck', id, 'missing groupId');
  }

  const responses: Record<string, SafetyResponse> = {};
  for (const [userId, value] of Object.entries(data.responses)) {
    const parsed = responseSchema.safeParse(value);
    if (parsed.success) responses[userId] = parsed.data;
  }

  return {
    id,
    groupId,
    initiatedBy: data.initiatedBy,
    createdAt: data.createdAt,
    status: data.status,
    responses,
    completedAt: data.completedAt,
  };
}

export function decodeAlert(id: string, raw: unknown): SOSAlert {
  return { id, ...parseOrThrow(alertSchema, 'sosAlert', id, raw) };
}

export function decodeInvitation(id: string, raw: unknown): GroupInvitation {
  return { id, ...parseOrThrow(invitationSchema, 'invitation', id, raw) };
}

export function decodeUser(id: string, raw: unknown): UserProfile {
  return { id, ...parseOrThrow(userSchema, 'user', id, raw) };
}

/** Decode every record of a query result, skipping (not throwing on) bad ones. */
export function decodeAll<T>(
  records: Record<string, StoreValue>,
  decode: (id: string, raw: unknown) => T,
  onError?: (id: string, err: unknown) => void,
): T[] {
  const out: T[] = [];
  for (const [id, raw] of Object.entries(records)) {
    try {
      out.push(decode(id, raw));
    } catch (err) {
      onError?.(id, err);
    }
  }
  return out;
}

// ── Encoding ────────────────────────────────────────────────────────

/** Drop undefined fields: the store has no representation for them. */
function compact(fields: Record<string, StoreValue | undefined>): StoreRecord {
  const out: StoreRecord = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export function encodeLocation(location: LocationData): StoreRecord {
  return compact({ latitude: location.latitude, longitude: location.longitude, address: location.address });
}

export function encodeGroup(group: Group): StoreRecord {
  return compact({
    id: group.id,
    name: group.name,
    adminId: group.adminId,
    members: group.members,
    pendingMembers: group.pendingMembers.length > 0 ? group.pendingMembers : undefined,
    safetyCheckIntervalMinutes: group.safetyCheckIntervalMinutes,
    sosIntervalMinutesPerUser: group.sosIntervalMinutesPerUser,
    lastSafetyCheckAt: group.lastSafetyCheckAt,
    currentStatus: group.currentStatus,
    createdAt: group.createdAt,
  });
}

export function encodeResponse(response: SafetyResponse): StoreRecord {
  return compact({
    userId: response.userId,
    status: response.status,
    timestamp: response.timestamp,
    location: response.location ? encodeLocation(response.location) : undefined,
    message: response.message,
  });
}

export function encodeSafetyCheck(check: SafetyCheck): StoreRecord {
  const responses: StoreRecord = {};
  for (const [userId, response] of Object.entries(check.responses)) {
    responses[userId] = encodeResponse(response);
  }

  return compact({
    id: check.id,
    groupId: check.groupId,
    initiatedBy: check.initiatedBy,
    createdAt: check.createdAt,
    status: check.status,
    responses: Object.keys(responses).length > 0 ? responses : undefined,
    completedAt: check.completedAt,
  });
}

export function encodeAlert(alert: SOSAlert): StoreRecord {
  return compact({
    id: alert.id,
    userId: alert.userId,
    groupId: alert.groupId,
    timestamp: alert.timestamp,
    location: encodeLocation(alert.location),
    message: alert.message,
    isActive: alert.isActive,
    resolvedAt: alert.resolvedAt,
    resolvedReason: alert.resolvedReason,
    resolvedBy: alert.resolvedBy,
    originSafetyCheckId: alert.originSafetyCheckId,
  });
}

export function encodeInvitation(invitation: GroupInvitation): StoreRecord {
  return {
    id: invitation.id,
    groupId: invitation.groupId,
    groupName: invitation.groupName,
    invitedUserId: invitation.invitedUserId,
    invitedByUserId: invitation.invitedByUserId,
    timestamp: invitation.timestamp,
  };
}

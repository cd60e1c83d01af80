/**
 * Notification dispatch.
 *
 * The engine never talks to a push transport. It queues one payload per
 * recipient under `pendingNotifications/{id}` and a separate worker (a
 * cloud function, a cron job) delivers them. Members without a push token
 * are skipped.
 *
 * Dispatch is best-effort: `createNotifier` wraps the dispatcher so a
 * failure is logged and never fails the coordinator call that triggered it.
 */

import { logger } from '../middleware/logger.js';
import { decodeGroup, decodeUser } from '../core/codec.js';
import type { GroupStatus, LocationData, SOSAlert } from '../core/models.js';
import { COLLECTIONS, joinPath } from '../store/paths.js';
import type { RecordStore, StoreRecord } from '../store/record-store.js';

export type NotificationData = Record<string, string>;

export interface SendOptions {
  excludeUserId?: string;
  /** High priority with the emergency sound */
  urgent?: boolean;
}

export interface NotificationDispatcher {
  init(): Promise<void>;
  /** Queue for every group member (minus `excludeUserId`). Returns the number queued. */
  send(groupId: string, title: string, body: string, data: NotificationData, options?: SendOptions): Promise<number>;
  /** Queue for one user. Returns false when the user has no push token. */
  sendToUser(userId: string, title: string, body: string, data: NotificationData, urgent?: boolean): Promise<boolean>;
  shutdown(): Promise<void>;
}

export interface LocationProvider {
  lastKnownLocation(): Promise<LocationData | undefined>;
}

/** For hosts with no position source. */
export const noLocationProvider: LocationProvider = {
  async lastKnownLocation() {
    return undefined;
  },
};

// ── Store-queue dispatcher ──────────────────────────────────────────

export function createStoreDispatcher(store: RecordStore, clock: () => number = Date.now): NotificationDispatcher {
  let ready = false;
  const inFlight = new Set<Promise<unknown>>();

  function track<T>(work: Promise<T>): Promise<T> {
    inFlight.add(work);
    const done = () => {
      inFlight.delete(work);
    };
    void work.then(done, done);
    return work;
  }

  async function queueForUser(
    userId: string,
    title: string,
    body: string,
    data: NotificationData,
    urgent: boolean,
  ): Promise<boolean> {
    const raw = await store.get(joinPath(COLLECTIONS.users, userId));
    const token = raw === undefined ? undefined : decodeUser(userId, raw).fcmToken;
    if (!token) {
      logger.debug({ userId }, 'No push token for user, skipping notification');
      return false;
    }

    const payload: StoreRecord = {
      to: token,
      notification: { title, body, sound: urgent ? 'emergency_sound.wav' : 'default' },
      data: { ...data, userId, timestamp: String(clock()) },
      priority: urgent ? 'high' : 'normal',
      content_available: true,
    };

    await store.set(joinPath(COLLECTIONS.pendingNotifications, store.newId(COLLECTIONS.pendingNotifications)), payload);
    return true;
  }

  return {
    async init() {
      ready = true;
      logger.info('Notification dispatcher ready');
    },

    send(groupId, title, body, data, options = {}) {
      if (!ready) {
        logger.warn({ groupId, title }, 'Notification dispatcher not initialized, dropping notification');
        return Promise.resolve(0);
      }

      return track((async () => {
        const raw = await store.get(joinPath(COLLECTIONS.groups, groupId));
        if (raw === undefined) {
          logger.warn({ groupId }, 'Group missing, notification not sent');
          return 0;
        }

        const recipients = decodeGroup(groupId, raw).members.filter((userId) => userId !== options.excludeUserId);
        let queued = 0;
        for (const userId of recipients) {
          if (await queueForUser(userId, title, body, data, options.urgent ?? false)) queued += 1;
        }

        logger.info({ groupId, type: data.type, queued, recipients: recipients.length }, 'Group notification queued');
        return queued;
      })());
    },

    sendToUser(userId, title, body, data, urgent = false) {
      if (!ready) {
        logger.warn({ userId, title }, 'Notification dispatcher not initialized, dropping notification');
        return Promise.resolve(false);
      }
      return track(queueForUser(userId, title, body, data, urgent));
    },

    async shutdown() {
      ready = false;
      await Promise.allSettled([...inFlight]);
      logger.info('Notification dispatcher stopped');
    },
  };
}

// ── Message templates ───────────────────────────────────────────────

const STATUS_TITLES: Record<GroupStatus, string> = {
  emergency: '🚨 EMERGENCY',
  allSafe: '✅ All Safe',
  checkingStatus: '🔔 Safety Check',
  normal: '📢 Update',
};

const STATUS_MESSAGES: Record<GroupStatus, string> = {
  emergency: 'A group member needs help',
  allSafe: 'Everyone in the group has confirmed they are safe',
  checkingStatus: 'A safety check is in progress',
  normal: 'Group status is back to normal',
};

export function describeLocation(location: LocationData | undefined): string {
  if (!location) return 'Unknown location';
  if (location.address) return location.address;
  return `${location.latitude.toFixed(5)}, ${location.longitude.toFixed(5)}`;
}

export interface Notifier {
  safetyCheckStarted(groupId: string, initiatedBy: string, checkId: string): Promise<void>;
  sosRaised(alert: SOSAlert): Promise<void>;
  statusChanged(groupId: string, status: GroupStatus): Promise<void>;
  invitationSent(invitedUserId: string, groupName: string, inviterId: string): Promise<void>;
}

export function createNotifier(dispatcher: NotificationDispatcher, store: RecordStore): Notifier {
  async function safely(kind: string, work: () => Promise<unknown>): Promise<void> {
    try {
      await work();
    } catch (err) {
      logger.error({ err, kind }, 'Notification dispatch failed');
    }
  }

  async function displayName(userId: string): Promise<string> {
    const raw = await store.get(joinPath(COLLECTIONS.users, userId));
    return (raw === undefined ? undefined : decodeUser(userId, raw).username) ?? 'A group member';
  }

  return {
    safetyCheckStarted(groupId, initiatedBy, checkId) {
      return safely('safety_check', () =>
        dispatcher.send(
          groupId,
          '🔔 Safety Check',
          'Please confirm if you are safe',
          { type: 'safety_check', groupId, initiatedBy, checkId },
          { excludeUserId: initiatedBy },
        ),
      );
    },

    sosRaised(alert) {
      return safely('sos_alert', async () => {
        const locationText = describeLocation(alert.location);
        await dispatcher.send(
          alert.groupId,
          '🚨 SOS ALERT',
          `${await displayName(alert.userId)} needs help! Location: ${locationText}`,
          { type: 'sos_alert', groupId: alert.groupId, userId: alert.userId, alertId: alert.id, location: locationText },
          { excludeUserId: alert.userId, urgent: true },
        );
      });
    },

    statusChanged(groupId, status) {
      return safely('group_status', () =>
        dispatcher.send(groupId, STATUS_TITLES[status], STATUS_MESSAGES[status], {
          type: 'group_status',
          groupId,
          status,
        }),
      );
    },

    invitationSent(invitedUserId, groupName, inviterId) {
      return safely('group_invite', async () => {
        const inviterName = await displayName(inviterId);
        await dispatcher.sendToUser(
          invitedUserId,
          '📨 Group Invitation',
          `${inviterName} invited you to join '${groupName}'`,
          { type: 'group_invite', groupName, inviterName },
        );
      });
    },
  };
}

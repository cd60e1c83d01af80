/**
 * Per-group typed change feed.
 *
 * Wraps the store's push subscriptions so callers receive decoded records
 * for one group (the group itself, its checks, its alerts) instead of raw
 * store values. Check and alert feeds use the indexed `groupId` query
 * rather than watching the whole collection.
 */

import { logger } from '../middleware/logger.js';
import { decodeAlert, decodeAll, decodeGroup, decodeSafetyCheck } from '../core/codec.js';
import type { Group, SafetyCheck, SOSAlert } from '../core/models.js';
import { COLLECTIONS, joinPath } from './paths.js';
import type { RecordStore, Unsubscribe } from './record-store.js';

export interface GroupChannelListeners {
  /** `undefined` once the group is deleted */
  group?: (group: Group | undefined) => void;
  /** Newest first */
  checks?: (checks: SafetyCheck[]) => void;
  /** Newest first, resolved alerts included */
  alerts?: (alerts: SOSAlert[]) => void;
}

export interface GroupChannel {
  readonly groupId: string;
  close(): void;
}

export function openGroupChannel(store: RecordStore, groupId: string, listeners: GroupChannelListeners): GroupChannel {
  const subscriptions: Unsubscribe[] = [];
  const onError = (collection: string) => (id: string, err: unknown) => {
    logger.warn({ err, groupId, collection, id }, 'Dropping undecodable record from group channel');
  };

  const { group, checks, alerts } = listeners;

  if (group) {
    subscriptions.push(
      store.subscribe(joinPath(COLLECTIONS.groups, groupId), (raw) => {
        if (raw === undefined) {
          group(undefined);
          return;
        }
        try {
          group(decodeGroup(groupId, raw));
        } catch (err) {
          onError(COLLECTIONS.groups)(groupId, err);
        }
      }),
    );
  }

  if (checks) {
    subscriptions.push(
      store.subscribeQuery(COLLECTIONS.safetyChecks, 'groupId', groupId, (records) => {
        const decoded = decodeAll(records, (id, raw) => decodeSafetyCheck(id, raw, groupId), onError(COLLECTIONS.safetyChecks));
        checks(decoded.sort((a, b) => b.createdAt - a.createdAt));
      }),
    );
  }

  if (alerts) {
    subscriptions.push(
      store.subscribeQuery(COLLECTIONS.sosAlerts, 'groupId', groupId, (records) => {
        const decoded = decodeAll(records, decodeAlert, onError(COLLECTIONS.sosAlerts));
        alerts(decoded.sort((a, b) => b.timestamp - a.timestamp));
      }),
    );
  }

  return {
    groupId,
    close() {
      for (const unsubscribe of subscriptions.splice(0)) unsubscribe();
    },
  };
}

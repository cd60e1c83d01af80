/**
 * Engine wiring.
 *
 * Builds every coordinator around one record store and one notification
 * dispatcher, and owns their lifecycle: `init` before the first call,
 * `shutdown` once at exit (timers, settle queue, dispatcher, then store).
 */

import { logger } from './middleware/logger.js';
import { createSettleQueue } from './middleware/settle.js';
import type { HealthSource } from './middleware/health.js';
import { createCompletionEvaluator, type CompletionEvaluator } from './features/completion.js';
import { createGroupStatusService, type GroupStatusService } from './features/group-status.js';
import { createMembershipService, type MembershipService } from './features/membership.js';
import {
  createNotifier,
  createStoreDispatcher,
  noLocationProvider,
  type LocationProvider,
  type NotificationDispatcher,
} from './features/notifications.js';
import { createSafetyCheckCoordinator, type SafetyCheckCoordinator } from './features/safety-check.js';
import { createSOSAlertCoordinator, type SOSAlertCoordinator } from './features/sos-alert.js';
import { createStatusResetScheduler, type StatusResetScheduler } from './features/status-reset.js';
import { openGroupChannel, type GroupChannel, type GroupChannelListeners } from './store/channels.js';
import { createRecordStore, type StoreOptions } from './store/index.js';
import type { RecordStore } from './store/record-store.js';
import { createRepository, type Repository } from './store/repository.js';

export interface EngineOptions {
  store: RecordStore;
  /** Defaults to queueing under `pendingNotifications` in the same store */
  dispatcher?: NotificationDispatcher;
  location?: LocationProvider;
  settleDelayMs?: number;
  statusResetMinutes?: number;
  adminCancelHours?: number;
  clock?: () => number;
}

export interface SafetyEngine {
  readonly store: RecordStore;
  readonly repo: Repository;
  readonly checks: SafetyCheckCoordinator;
  readonly alerts: SOSAlertCoordinator;
  readonly membership: MembershipService;
  readonly groupStatus: GroupStatusService;
  readonly completion: CompletionEvaluator;
  readonly scheduler: StatusResetScheduler;
  readonly dispatcher: NotificationDispatcher;
  readonly health: HealthSource;
  openGroupChannel(groupId: string, listeners: GroupChannelListeners): GroupChannel;
  init(): Promise<void>;
  shutdown(): Promise<void>;
}

export const DEFAULT_SETTLE_DELAY_MS = 500;
export const DEFAULT_STATUS_RESET_MINUTES = 60;
export const DEFAULT_ADMIN_CANCEL_HOURS = 24;

export function createSafetyEngine(options: EngineOptions): SafetyEngine {
  const { store } = options;
  const clock = options.clock ?? Date.now;
  const statusResetMinutes = options.statusResetMinutes ?? DEFAULT_STATUS_RESET_MINUTES;

  const repo = createRepository(store);
  const dispatcher = options.dispatcher ?? createStoreDispatcher(store, clock);
  const notifier = createNotifier(dispatcher, store);

  const groupStatus = createGroupStatusService({
    repo,
    notifier,
    resetWindowMs: statusResetMinutes * 60_000,
    clock,
  });
  const scheduler = createStatusResetScheduler(groupStatus);
  const completion = createCompletionEvaluator({
    repo,
    groupStatus,
    scheduler,
    settle: createSettleQueue(options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS),
    resetDelayMinutes: statusResetMinutes,
    clock,
  });
  const alerts = createSOSAlertCoordinator({
    repo,
    groupStatus,
    completion,
    notifier,
    location: options.location ?? noLocationProvider,
    adminCancelHours: options.adminCancelHours ?? DEFAULT_ADMIN_CANCEL_HOURS,
    clock,
  });
  const checks = createSafetyCheckCoordinator({ repo, groupStatus, completion, alerts, notifier, clock });
  const membership = createMembershipService({ repo, completion, scheduler, notifier, clock });

  let stopped = false;

  return {
    store,
    repo,
    checks,
    alerts,
    membership,
    groupStatus,
    completion,
    scheduler,
    dispatcher,

    health: {
      dialect: store.dialect,
      pendingResets: () => scheduler.pendingCount(),
      pendingEvaluations: () => completion.pendingCount(),
    },

    openGroupChannel(groupId, listeners) {
      return openGroupChannel(store, groupId, listeners);
    },

    async init() {
      await dispatcher.init();
      logger.info({ dialect: store.dialect, statusResetMinutes }, 'Safety engine ready');
    },

    async shutdown() {
      if (stopped) return;
      stopped = true;

      scheduler.shutdown();
      completion.shutdown();
      await dispatcher.shutdown();
      await store.close();
      logger.info('Safety engine stopped');
    },
  };
}

export interface EngineConfig extends StoreOptions {
  SETTLE_DELAY_MS: number;
  STATUS_RESET_MINUTES: number;
  ADMIN_CANCEL_HOURS: number;
}

/** Open the configured store and build an initialized engine over it. */
export async function startSafetyEngine(
  config: EngineConfig,
  extras: Pick<EngineOptions, 'dispatcher' | 'location'> = {},
): Promise<SafetyEngine> {
  const store = await createRecordStore(config);
  const engine = createSafetyEngine({
    store,
    ...extras,
    settleDelayMs: config.SETTLE_DELAY_MS,
    statusResetMinutes: config.STATUS_RESET_MINUTES,
    adminCancelHours: config.ADMIN_CANCEL_HOURS,
  });
  await engine.init();
  return engine;
}

export { describeError, isCoordinationError } from './core/errors.js';
export type { Group, GroupStatus, SafetyCheck, SafetyResponse, SOSAlert, LocationData } from './core/models.js';

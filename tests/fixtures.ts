import { createSafetyEngine, type EngineOptions, type SafetyEngine } from '../src/engine.js';
import type { Group } from '../src/core/models.js';
import { createMemoryStore } from '../src/store/memory-store.js';
import { isStoreRecord, type StoreRecord } from '../src/store/record-store.js';

export const T0 = 1_700_000_000_000;
export const MINUTE = 60_000;
export const HOUR = 60 * MINUTE;

export interface TestClock {
  now: number;
  advance(ms: number): void;
}

export interface TestEngine {
  engine: SafetyEngine;
  clock: TestClock;
}

export async function startTestEngine(options: Partial<EngineOptions> = {}): Promise<TestEngine> {
  const clock: TestClock = {
    now: T0,
    advance(ms) {
      this.now += ms;
    },
  };
  const engine = createSafetyEngine({
    store: createMemoryStore(),
    settleDelayMs: 0,
    clock: () => clock.now,
    ...options,
  });
  await engine.init();
  return { engine, clock };
}

/** Group administered by the first user with every other user already joined. */
export async function createGroupWith(engine: SafetyEngine, userIds: string[], name = 'Hikers'): Promise<Group> {
  const [adminId, ...others] = userIds;
  const group = await engine.membership.createGroup(name, adminId);
  for (const userId of others) {
    await engine.membership.inviteUser(group.id, userId, adminId);
    await engine.membership.acceptInvitation(group.id, userId);
  }
  return engine.membership.getGroup(group.id);
}

export async function registerUser(engine: SafetyEngine, userId: string, username: string): Promise<void> {
  await engine.store.set(`users/${userId}`, { username, fcmToken: `test-token-${userId}`, groups: [] });
}

export async function queuedNotifications(engine: SafetyEngine, type?: string): Promise<StoreRecord[]> {
  const all = await engine.store.get('pendingNotifications');
  if (!isStoreRecord(all)) return [];
  return Object.values(all)
    .filter(isStoreRecord)
    .filter((payload) => type === undefined || (isStoreRecord(payload.data) && payload.data.type === type));
}

export async function captureError(work: Promise<unknown>): Promise<unknown> {
  try {
    await work;
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to fail');
}

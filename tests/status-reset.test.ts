import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createStatusResetScheduler } from '../src/features/status-reset.js';
import type { StatusCommit } from '../src/features/group-status.js';
import type { SafetyEngine } from '../src/engine.js';
import { MINUTE, createGroupWith, startTestEngine } from './fixtures.js';

describe('Status reset scheduler', () => {
  const resetIfAllSafe = vi.fn(async (_groupId: string): Promise<StatusCommit | undefined> => undefined);

  beforeEach(() => {
    vi.useFakeTimers();
    resetIfAllSafe.mockClear();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resets the group once the delay has passed', async () => {
    const scheduler = createStatusResetScheduler({ resetIfAllSafe });
    scheduler.schedule('g1', 60);

    await vi.advanceTimersByTimeAsync(59 * MINUTE);
    expect(resetIfAllSafe).not.toHaveBeenCalled();
    expect(scheduler.pendingCount()).toBe(1);

    await vi.advanceTimersByTimeAsync(MINUTE);
    expect(resetIfAllSafe).toHaveBeenCalledTimes(1);
    expect(resetIfAllSafe).toHaveBeenCalledWith('g1');
    expect(scheduler.pendingCount()).toBe(0);
  });

  it('replaces the timer when the same group is scheduled again', async () => {
    const scheduler = createStatusResetScheduler({ resetIfAllSafe });
    scheduler.schedule('g1', 60);
    await vi.advanceTimersByTimeAsync(30 * MINUTE);
    scheduler.schedule('g1', 60);

    await vi.advanceTimersByTimeAsync(45 * MINUTE);
    expect(resetIfAllSafe).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(15 * MINUTE);
    expect(resetIfAllSafe).toHaveBeenCalledTimes(1);
  });

  it('keeps separate timers per group', async () => {
    const scheduler = createStatusResetScheduler({ resetIfAllSafe });
    scheduler.schedule('g1', 10);
    scheduler.schedule('g2', 20);
    expect(scheduler.pendingCount()).toBe(2);

    await vi.advanceTimersByTimeAsync(20 * MINUTE);
    expect(resetIfAllSafe.mock.calls.map(([groupId]) => groupId)).toEqual(['g1', 'g2']);
  });

  it('drops a cancelled reset', async () => {
    const scheduler = createStatusResetScheduler({ resetIfAllSafe });
    scheduler.schedule('g1', 10);

    expect(scheduler.cancel('g1')).toBe(true);
    expect(scheduler.cancel('g1')).toBe(false);
    await vi.advanceTimersByTimeAsync(10 * MINUTE);
    expect(resetIfAllSafe).not.toHaveBeenCalled();
  });

  it('survives a failing reset', async () => {
    const failing = vi.fn(async (): Promise<StatusCommit | undefined> => {
      throw new Error('store offline');
    });
    const scheduler = createStatusResetScheduler({ resetIfAllSafe: failing });
    scheduler.schedule('g1', 1);

    await vi.advanceTimersByTimeAsync(MINUTE);
    expect(failing).toHaveBeenCalledTimes(1);
    expect(scheduler.pendingCount()).toBe(0);
  });

  it('clears everything on shutdown', async () => {
    const scheduler = createStatusResetScheduler({ resetIfAllSafe });
    scheduler.schedule('g1', 1);
    scheduler.schedule('g2', 1);
    scheduler.shutdown();

    await vi.advanceTimersByTimeAsync(MINUTE);
    expect(resetIfAllSafe).not.toHaveBeenCalled();
    expect(scheduler.pendingCount()).toBe(0);
  });
});

describe('Group status reset', () => {
  let engine: SafetyEngine;

  beforeEach(async () => {
    ({ engine } = await startTestEngine());
  });

  afterEach(async () => {
    await engine.shutdown();
  });

  it('moves allSafe back to normal', async () => {
    const group = await createGroupWith(engine, ['u1', 'u2']);
    const check = await engine.checks.initiate(group.id, 'u1');
    await engine.checks.respond(check.id, 'u1', 'safe');
    await engine.checks.respond(check.id, 'u2', 'safe');

    expect(await engine.groupStatus.resetIfAllSafe(group.id)).toEqual({
      previous: 'allSafe',
      status: 'normal',
      changed: true,
    });
    expect((await engine.membership.getGroup(group.id)).currentStatus).toBe('normal');
  });

  it('leaves any other status alone', async () => {
    const group = await createGroupWith(engine, ['u1', 'u2']);
    await engine.checks.initiate(group.id, 'u1');

    expect(await engine.groupStatus.resetIfAllSafe(group.id)).toBeUndefined();
    expect((await engine.membership.getGroup(group.id)).currentStatus).toBe('checkingStatus');
  });

  it('never writes to a deleted group', async () => {
    const group = await createGroupWith(engine, ['u1']);
    await engine.membership.deleteGroup(group.id, 'u1');

    await expect(engine.groupStatus.resetIfAllSafe(group.id)).rejects.toThrow(`group ${group.id} not found`);
    expect(await engine.store.get(`groups/${group.id}`)).toBeUndefined();
  });
});

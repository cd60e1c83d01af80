import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PermissionDeniedError, RateLimitedError, describeError } from '../src/core/errors.js';
import type { Group } from '../src/core/models.js';
import type { SafetyEngine } from '../src/engine.js';
import { canCancel } from '../src/features/sos-alert.js';
import { HOUR, MINUTE, T0, captureError, createGroupWith, startTestEngine, type TestClock } from './fixtures.js';

const HARBOUR = { latitude: 51.5, longitude: -0.12, address: 'Harbour steps' };

describe('canCancel', () => {
  const alert = { userId: 'u2', timestamp: T0 };

  it('always lets the owner cancel', () => {
    expect(canCancel(alert, 'u2', 'u1', T0)).toEqual({ allowed: true, asAdmin: false });
  });

  it('makes the admin wait out the delay', () => {
    expect(canCancel(alert, 'u1', 'u1', T0 + HOUR)).toEqual({ allowed: false, reason: 'admin_wait', hoursRemaining: 23 });
    expect(canCancel(alert, 'u1', 'u1', T0 + 23 * HOUR + MINUTE)).toEqual({
      allowed: false,
      reason: 'admin_wait',
      hoursRemaining: 1,
    });
    expect(canCancel(alert, 'u1', 'u1', T0 + 24 * HOUR)).toEqual({ allowed: true, asAdmin: true });
  });

  it('refuses everyone else', () => {
    expect(canCancel(alert, 'u3', 'u1', T0 + 48 * HOUR)).toEqual({ allowed: false, reason: 'not_owner' });
  });
});

describe('SOS alerts', () => {
  let engine: SafetyEngine;
  let clock: TestClock;
  let group: Group;

  beforeEach(async () => {
    ({ engine, clock } = await startTestEngine());
    group = await createGroupWith(engine, ['u1', 'u2', 'u3']);
  });

  afterEach(async () => {
    await engine.shutdown();
  });

  it('raises an active alert, escalates the group and stamps the cooldown', async () => {
    const alert = await engine.alerts.sendDirect('u1', group.id, HARBOUR, 'need help');

    expect(alert).toMatchObject({ userId: 'u1', groupId: group.id, timestamp: T0, isActive: true, message: 'need help' });
    expect((await engine.membership.getGroup(group.id)).currentStatus).toBe('emergency');
    expect(await engine.store.get(`userSOSTimes/u1/${group.id}`)).toBe(T0);
  });

  it('rate limits a second SOS two minutes later with three minutes left', async () => {
    await engine.alerts.sendDirect('u1', group.id, HARBOUR);
    clock.advance(2 * MINUTE);

    const err = await captureError(engine.alerts.sendDirect('u1', group.id, HARBOUR));

    expect(err).toBeInstanceOf(RateLimitedError);
    expect(err).toMatchObject({ action: 'sos', remainingMinutes: 3 });
    expect(describeError(err)).toBe('Wait 3 more minutes for another SOS.');
  });

  it('keeps cooldowns per user', async () => {
    await engine.alerts.sendDirect('u1', group.id, HARBOUR);
    await expect(engine.alerts.sendDirect('u2', group.id, HARBOUR)).resolves.toMatchObject({ userId: 'u2' });
    clock.advance(5 * MINUTE);
    await expect(engine.alerts.sendDirect('u1', group.id, HARBOUR)).resolves.toMatchObject({ userId: 'u1' });
  });

  it('refuses an SOS from outside the group', async () => {
    await expect(engine.alerts.sendDirect('stranger', group.id, HARBOUR)).rejects.toThrow(
      'Only group members can send an SOS',
    );
  });

  it('lets the admin cancel someone else’s alert only after 24 hours', async () => {
    const alert = await engine.alerts.sendDirect('u2', group.id, HARBOUR);
    clock.advance(2 * HOUR);

    const err = await captureError(engine.alerts.cancel(alert.id, 'u1'));
    expect(err).toBeInstanceOf(PermissionDeniedError);
    expect(err).toMatchObject({
      message: 'Admins can cancel SOS alerts after 24 hours. 22 hours remaining.',
      hoursRemaining: 22,
    });

    clock.advance(23 * HOUR);
    const cancelled = await engine.alerts.cancel(alert.id, 'u1');
    expect(cancelled).toMatchObject({
      isActive: false,
      resolvedAt: T0 + 25 * HOUR,
      resolvedReason: 'Cancelled by admin',
      resolvedBy: 'u1',
    });
  });

  it('refuses a member cancelling another member’s alert', async () => {
    const alert = await engine.alerts.sendDirect('u2', group.id, HARBOUR);
    clock.advance(48 * HOUR);

    await expect(engine.alerts.cancel(alert.id, 'u3')).rejects.toThrow('You can only cancel your own SOS alerts.');
  });

  it('keeps the first resolution when cancelled twice', async () => {
    const alert = await engine.alerts.sendDirect('u2', group.id, HARBOUR);
    await engine.alerts.cancel(alert.id, 'u2', 'False alarm');
    clock.advance(HOUR);

    const again = await engine.alerts.cancel(alert.id, 'u2');

    expect(again).toMatchObject({ isActive: false, resolvedAt: T0, resolvedReason: 'False alarm', resolvedBy: 'u2' });
  });

  it('returns the group to normal when its only alert is cancelled', async () => {
    const alert = await engine.alerts.sendDirect('u2', group.id, HARBOUR);
    await engine.alerts.cancel(alert.id, 'u2');

    expect(await engine.alerts.listActive(group.id)).toEqual([]);
    expect((await engine.membership.getGroup(group.id)).currentStatus).toBe('normal');
  });

  it('stays in emergency while another alert is active', async () => {
    const first = await engine.alerts.sendDirect('u2', group.id, HARBOUR);
    await engine.alerts.sendDirect('u3', group.id, HARBOUR);
    await engine.alerts.cancel(first.id, 'u2');

    expect((await engine.membership.getGroup(group.id)).currentStatus).toBe('emergency');
  });

  it('withdraws the owner’s SOS answer from a pending check on cancel', async () => {
    const check = await engine.checks.initiate(group.id, 'u1');
    const sos = await engine.checks.respond(check.id, 'u2', 'sos');
    await engine.checks.respond(check.id, 'u1', 'safe');

    await engine.alerts.cancel(sos.alertId ?? '', 'u2');

    const stored = await engine.checks.getCheck(check.id);
    expect(Object.keys(stored.responses)).toEqual(['u1']);
    expect(stored.status).toBe('pending');
    expect((await engine.membership.getGroup(group.id)).currentStatus).toBe('checkingStatus');
  });

  it('keeps check answers when a direct alert is cancelled', async () => {
    const direct = await engine.alerts.sendDirect('u2', group.id, HARBOUR);
    const check = await engine.checks.initiate(group.id, 'u1');
    const sos = await engine.checks.respond(check.id, 'u2', 'sos');

    await engine.alerts.cancel(direct.id, 'u2');

    const stored = await engine.checks.getCheck(check.id);
    expect(stored.responses.u2?.status).toBe('sos');
    expect(await engine.alerts.getAlert(sos.alertId ?? '')).toMatchObject({ isActive: true });
    expect((await engine.membership.getGroup(group.id)).currentStatus).toBe('emergency');
  });

  it('does not apply the direct SOS cooldown to check answers', async () => {
    await engine.alerts.sendDirect('u2', group.id, HARBOUR);
    const check = await engine.checks.initiate(group.id, 'u1');

    const ack = await engine.checks.respond(check.id, 'u2', 'sos');

    expect(ack.alertId).toBeDefined();
    expect(await engine.alerts.listActive(group.id)).toHaveLength(2);
  });

  it('only supersedes alerts raised before the check', async () => {
    const alert = await engine.alerts.sendDirect('u2', group.id, HARBOUR);

    expect(await engine.alerts.autoResolve('u2', group.id, T0)).toEqual([]);
    expect(await engine.alerts.autoResolve('u3', group.id, T0 + MINUTE)).toEqual([]);
    expect(await engine.alerts.autoResolve('u2', group.id, T0 + MINUTE)).toEqual([alert.id]);
    expect(await engine.alerts.autoResolve('u2', group.id, T0 + MINUTE)).toEqual([]);
  });
});

describe('SOS answers with a location source', () => {
  it('falls back to the last known position when the answer has none', async () => {
    const { engine } = await startTestEngine({
      location: {
        lastKnownLocation: async () => ({ latitude: 40.7128, longitude: -74.006 }),
      },
    });
    const group = await createGroupWith(engine, ['u1', 'u2']);
    const check = await engine.checks.initiate(group.id, 'u1');

    const ack = await engine.checks.respond(check.id, 'u2', 'sos');

    const alert = await engine.alerts.getAlert(ack.alertId ?? '');
    expect(alert.location).toEqual({ latitude: 40.7128, longitude: -74.006 });
    await engine.shutdown();
  });
});

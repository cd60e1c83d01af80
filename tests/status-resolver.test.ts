import { describe, it, expect } from 'vitest';
import { DEFAULT_RESET_WINDOW_MS, latestCompletedCheck, resolveGroupStatus } from '../src/core/status-resolver.js';
import type { SafetyCheck, SafetyCheckStatus, SafetyResponseStatus, SOSAlert } from '../src/core/models.js';

const NOW = 1_700_000_000_000;
const MINUTE = 60_000;
const GROUP = { id: 'g1' };

function check(
  id: string,
  status: SafetyCheckStatus,
  fields: { createdAt?: number; completedAt?: number; groupId?: string; responses?: Record<string, SafetyResponseStatus> } = {},
): SafetyCheck {
  return {
    id,
    groupId: fields.groupId ?? 'g1',
    initiatedBy: 'u1',
    createdAt: fields.createdAt ?? NOW - 10 * MINUTE,
    status,
    completedAt: fields.completedAt,
    responses: Object.fromEntries(
      Object.entries(fields.responses ?? {}).map(([userId, s]) => [userId, { userId, status: s, timestamp: NOW }]),
    ),
  };
}

function alert(id: string, isActive: boolean, groupId = 'g1'): SOSAlert {
  return {
    id,
    userId: 'u2',
    groupId,
    timestamp: NOW - MINUTE,
    location: { latitude: 1, longitude: 2 },
    isActive,
  };
}

describe('resolveGroupStatus', () => {
  it('is normal with no records', () => {
    expect(resolveGroupStatus(GROUP, [], [], NOW)).toBe('normal');
  });

  it('puts an active alert above a pending check', () => {
    expect(resolveGroupStatus(GROUP, [alert('a1', true)], [check('c1', 'pending')], NOW)).toBe('emergency');
  });

  it('ignores resolved alerts and alerts of other groups', () => {
    expect(resolveGroupStatus(GROUP, [alert('a1', false), alert('a2', true, 'g2')], [], NOW)).toBe('normal');
  });

  it('is emergency for a pending check that already holds an SOS answer', () => {
    const pending = check('c1', 'pending', { responses: { u2: 'sos' } });
    expect(resolveGroupStatus(GROUP, [], [pending], NOW)).toBe('emergency');
  });

  it('is checkingStatus while a check is pending', () => {
    const checks = [check('c1', 'pending'), check('c0', 'allSafe', { completedAt: NOW - MINUTE })];
    expect(resolveGroupStatus(GROUP, [], checks, NOW)).toBe('checkingStatus');
  });

  it('is allSafe inside the reset window of the latest completed check', () => {
    const checks = [check('c1', 'allSafe', { completedAt: NOW - 59 * MINUTE })];
    expect(resolveGroupStatus(GROUP, [], checks, NOW)).toBe('allSafe');
  });

  it('falls back to normal once the window has passed', () => {
    const checks = [check('c1', 'allSafe', { completedAt: NOW - DEFAULT_RESET_WINDOW_MS })];
    expect(resolveGroupStatus(GROUP, [], checks, NOW)).toBe('normal');
    expect(resolveGroupStatus(GROUP, [], checks, NOW, 2 * DEFAULT_RESET_WINDOW_MS)).toBe('allSafe');
  });

  it('is normal when the latest completed check ended in emergency', () => {
    const checks = [
      check('c0', 'allSafe', { completedAt: NOW - 20 * MINUTE }),
      check('c1', 'emergency', { completedAt: NOW - 5 * MINUTE }),
    ];
    expect(resolveGroupStatus(GROUP, [], checks, NOW)).toBe('normal');
  });

  it('only looks at checks of the group being resolved', () => {
    expect(resolveGroupStatus(GROUP, [], [check('c1', 'pending', { groupId: 'g2' })], NOW)).toBe('normal');
  });
});

describe('latestCompletedCheck', () => {
  it('skips pending checks and falls back to createdAt without completedAt', () => {
    const checks = [
      check('pending', 'pending', { createdAt: NOW }),
      check('legacy', 'emergency', { createdAt: NOW - 2 * MINUTE }),
      check('older', 'allSafe', { createdAt: NOW - 30 * MINUTE, completedAt: NOW - 3 * MINUTE }),
    ];
    expect(latestCompletedCheck(checks)?.id).toBe('legacy');
  });

  it('returns undefined when nothing is complete', () => {
    expect(latestCompletedCheck([check('c1', 'pending')])).toBeUndefined();
  });
});

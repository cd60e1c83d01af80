/**
 * Group status resolution.
 *
 * Total over whatever records are currently visible: two clients that race
 * on different writes converge once both writes are readable, because each
 * recomputes from the full record set rather than applying a delta.
 * Precedence follows `statusPriority`: Emergency > CheckingStatus >
 * AllSafe > Normal.
 */

import type { Group, GroupStatus, SafetyCheck, SOSAlert } from './models.js';

export const DEFAULT_RESET_WINDOW_MS = 60 * 60_000;

function hasSOSResponse(check: SafetyCheck): boolean {
  return Object.values(check.responses).some((response) => response.status === 'sos');
}

/** Most recently completed check; falls back to creation time for legacy records without `completedAt`. */
export function latestCompletedCheck(checks: readonly SafetyCheck[]): SafetyCheck | undefined {
  let latest: SafetyCheck | undefined;
  for (const check of checks) {
    if (check.status === 'pending') continue;
    if (!latest || (check.completedAt ?? check.createdAt) > (latest.completedAt ?? latest.createdAt)) {
      latest = check;
    }
  }
  return latest;
}

export function resolveGroupStatus(
  group: Pick<Group, 'id'>,
  alerts: readonly SOSAlert[],
  checks: readonly SafetyCheck[],
  now: number,
  resetWindowMs: number = DEFAULT_RESET_WINDOW_MS,
): GroupStatus {
  const own = checks.filter((check) => check.groupId === group.id);
  const pending = own.filter((check) => check.status === 'pending');

  if (alerts.some((alert) => alert.isActive && alert.groupId === group.id)) return 'emergency';
  if (pending.some(hasSOSResponse)) return 'emergency';
  if (pending.length > 0) return 'checkingStatus';

  const latest = latestCompletedCheck(own);
  if (latest?.status === 'allSafe' && now - (latest.completedAt ?? latest.createdAt) < resetWindowMs) {
    return 'allSafe';
  }

  return 'normal';
}

/**
 * Cooldown guard for per-group safety checks and per-(user, group) SOS.
 *
 * Pure predicates over already-read state. Two callers racing past the
 * guard at the same instant can both be allowed; the coordinators tolerate
 * that instead of locking.
 */

import type { Group } from './models.js';

const MS_PER_MINUTE = 60_000;

export type CooldownDecision =
  | { allowed: true }
  | { allowed: false; remainingMinutes: number };

/** Whole minutes left, rounded up so the caller never retries too early. */
export function remainingMinutes(remainingMs: number): number {
  return Math.ceil(remainingMs / MS_PER_MINUTE);
}

function evaluate(lastAt: number | undefined, intervalMinutes: number, now: number): CooldownDecision {
  if (lastAt === undefined) return { allowed: true };

  const remainingMs = intervalMinutes * MS_PER_MINUTE - (now - lastAt);
  if (remainingMs <= 0) return { allowed: true };

  return { allowed: false, remainingMinutes: remainingMinutes(remainingMs) };
}

export function canStartSafetyCheck(group: Group, now: number): CooldownDecision {
  return evaluate(group.lastSafetyCheckAt, group.safetyCheckIntervalMinutes, now);
}

export function canSendSOS(lastSOSAt: number | undefined, group: Group, now: number): CooldownDecision {
  return evaluate(lastSOSAt, group.sosIntervalMinutesPerUser, now);
}

import type { SafetyCheck, SafetyCheckStatus } from './models.js';

export interface Aggregate {
  /** Every current member has a response on the check */
  complete: boolean;
  hasSOS: boolean;
  /** Terminal status to write once complete; `pending` otherwise */
  status: SafetyCheckStatus;
  missing: string[];
}

export interface ResponseSummary {
  safe: number;
  sos: number;
  noResponse: number;
  /** Members with no response recorded at all */
  missing: number;
  total: number;
}

/**
 * Completion is judged against the member list passed in, which callers
 * re-read at evaluation time. Responses from users who have since left
 * the group still count towards `hasSOS`.
 */
export function aggregate(check: SafetyCheck, members: readonly string[]): Aggregate {
  const missing = members.filter((userId) => !(userId in check.responses));
  const hasSOS = Object.values(check.responses).some((response) => response.status === 'sos');
  const complete = missing.length === 0;

  return {
    complete,
    hasSOS,
    status: complete ? (hasSOS ? 'emergency' : 'allSafe') : 'pending',
    missing,
  };
}

export function summarize(check: SafetyCheck, members: readonly string[]): ResponseSummary {
  const summary: ResponseSummary = { safe: 0, sos: 0, noResponse: 0, missing: 0, total: members.length };

  for (const userId of members) {
    const response = check.responses[userId];
    if (!response) {
      summary.missing += 1;
      continue;
    }
    if (response.status === 'safe') summary.safe += 1;
    else if (response.status === 'sos') summary.sos += 1;
    else summary.noResponse += 1;
  }

  return summary;
}

export function isTerminal(status: SafetyCheckStatus): boolean {
  return status !== 'pending';
}

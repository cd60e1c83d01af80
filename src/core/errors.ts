/**
 * Error taxonomy for coordinator calls.
 *
 * Every failure is per-call: nothing here is fatal to the process. The
 * `kind` discriminant lets callers switch without instanceof chains.
 */

export type CoordinationErrorKind =
  | 'rate_limited'
  | 'permission_denied'
  | 'not_found'
  | 'inconsistent_record'
  | 'invalid_argument'
  | 'store_error';

export abstract class CoordinationError extends Error {
  abstract readonly kind: CoordinationErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type RateLimitedAction = 'safety_check' | 'sos';

export class RateLimitedError extends CoordinationError {
  readonly kind = 'rate_limited' as const;

  constructor(
    readonly action: RateLimitedAction,
    readonly remainingMinutes: number,
  ) {
    super(`${action === 'sos' ? 'SOS' : 'Safety check'} rate limited for ${remainingMinutes} more minute(s)`);
  }
}

export class PermissionDeniedError extends CoordinationError {
  readonly kind = 'permission_denied' as const;

  constructor(
    message: string,
    /** Hours until an admin override opens up, when that is what blocked the call */
    readonly hoursRemaining?: number,
  ) {
    super(message);
  }
}

export type EntityKind = 'group' | 'safetyCheck' | 'sosAlert' | 'invitation' | 'user';

export class NotFoundError extends CoordinationError {
  readonly kind = 'not_found' as const;

  constructor(
    readonly entity: EntityKind,
    readonly id: string,
  ) {
    super(`${entity} ${id} not found`);
  }
}

export class InconsistentRecordError extends CoordinationError {
  readonly kind = 'inconsistent_record' as const;

  constructor(
    readonly entity: EntityKind,
    readonly id: string,
    detail: string,
  ) {
    super(`${entity} ${id} is inconsistent: ${detail}`);
  }
}

export class InvalidArgumentError extends CoordinationError {
  readonly kind = 'invalid_argument' as const;
}

export class StoreError extends CoordinationError {
  readonly kind = 'store_error' as const;

  constructor(
    readonly operation: string,
    readonly path: string,
    cause: unknown,
  ) {
    super(`Store ${operation} failed at ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export function isCoordinationError(err: unknown): err is CoordinationError {
  return err instanceof CoordinationError;
}

/** User-facing message for a failed call. */
export function describeError(err: unknown): string {
  if (!isCoordinationError(err)) return 'Something went wrong. Please try again.';

  switch (err.kind) {
    case 'rate_limited':
      if (err instanceof RateLimitedError && err.action === 'sos') {
        return `Wait ${err.remainingMinutes} more minutes for another SOS.`;
      }
      return `Wait ${err instanceof RateLimitedError ? err.remainingMinutes : 0} more minutes.`;
    case 'permission_denied':
    case 'invalid_argument':
      return err.message;
    case 'not_found':
      return err instanceof NotFoundError ? `That ${err.entity} no longer exists.` : err.message;
    case 'inconsistent_record':
      return 'The record is incomplete. Refresh and try again.';
    case 'store_error':
      return 'Could not reach the server. Please try again.';
  }
}

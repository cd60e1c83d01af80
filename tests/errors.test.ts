import { describe, it, expect } from 'vitest';
import {
  InconsistentRecordError,
  InvalidArgumentError,
  NotFoundError,
  PermissionDeniedError,
  RateLimitedError,
  StoreError,
  describeError,
  isCoordinationError,
} from '../src/core/errors.js';

describe('Coordination errors', () => {
  it('carries a kind and the class name', () => {
    const err = new NotFoundError('safetyCheck', 'c1');
    expect(err.kind).toBe('not_found');
    expect(err.name).toBe('NotFoundError');
    expect(err.message).toBe('safetyCheck c1 not found');
    expect(isCoordinationError(err)).toBe(true);
    expect(isCoordinationError(new Error('plain'))).toBe(false);
  });

  it('keeps the store failure as the cause', () => {
    const cause = new Error('disk full');
    const err = new StoreError('set', 'groups/g1', cause);
    expect(err.message).toBe('Store set failed at groups/g1: disk full');
    expect(err.cause).toBe(cause);
  });
});

describe('describeError', () => {
  it('words each failure for the user', () => {
    expect(describeError(new RateLimitedError('sos', 3))).toBe('Wait 3 more minutes for another SOS.');
    expect(describeError(new RateLimitedError('safety_check', 20))).toBe('Wait 20 more minutes.');
    expect(describeError(new PermissionDeniedError('You can only cancel your own SOS alerts.'))).toBe(
      'You can only cancel your own SOS alerts.',
    );
    expect(describeError(new InvalidArgumentError('Group name cannot be empty'))).toBe('Group name cannot be empty');
    expect(describeError(new NotFoundError('group', 'g1'))).toBe('That group no longer exists.');
    expect(describeError(new InconsistentRecordError('safetyCheck', 'c1', 'missing groupId'))).toBe(
      'The record is incomplete. Refresh and try again.',
    );
    expect(describeError(new StoreError('get', 'groups', new Error('timeout')))).toBe(
      'Could not reach the server. Please try again.',
    );
    expect(describeError('boom')).toBe('Something went wrong. Please try again.');
  });
});

import { describe, it, expect } from 'vitest';
import { aggregate, isTerminal, summarize } from '../src/core/aggregator.js';
import type { SafetyCheck, SafetyResponseStatus } from '../src/core/models.js';

function check(responses: Record<string, SafetyResponseStatus>): SafetyCheck {
  return {
    id: 'c1',
    groupId: 'g1',
    initiatedBy: 'u1',
    createdAt: 1000,
    status: 'pending',
    responses: Object.fromEntries(
      Object.entries(responses).map(([userId, status]) => [userId, { userId, status, timestamp: 2000 }]),
    ),
  };
}

const MEMBERS = ['u1', 'u2', 'u3'];

describe('aggregate', () => {
  it('stays pending while a member has not answered', () => {
    expect(aggregate(check({ u1: 'safe', u2: 'safe' }), MEMBERS)).toEqual({
      complete: false,
      hasSOS: false,
      status: 'pending',
      missing: ['u3'],
    });
  });

  it('completes as allSafe when every member answered without an SOS', () => {
    const result = aggregate(check({ u1: 'safe', u2: 'safe', u3: 'safe' }), MEMBERS);
    expect(result.complete).toBe(true);
    expect(result.status).toBe('allSafe');
  });

  it('completes as emergency when any answer is an SOS', () => {
    const result = aggregate(check({ u1: 'sos', u2: 'safe', u3: 'safe' }), MEMBERS);
    expect(result).toMatchObject({ complete: true, hasSOS: true, status: 'emergency' });
  });

  it('counts noResponse as an answer', () => {
    const result = aggregate(check({ u1: 'safe', u2: 'noResponse', u3: 'safe' }), MEMBERS);
    expect(result.status).toBe('allSafe');
  });

  it('judges completion against the members passed in', () => {
    const answered = check({ u1: 'safe', u2: 'safe' });
    expect(aggregate(answered, ['u1', 'u2']).complete).toBe(true);
    expect(aggregate(answered, [...MEMBERS, 'u4']).missing).toEqual(['u3', 'u4']);
  });

  it('keeps an SOS from a user who has since left', () => {
    const result = aggregate(check({ u1: 'safe', u2: 'safe', gone: 'sos' }), ['u1', 'u2']);
    expect(result).toMatchObject({ complete: true, hasSOS: true, status: 'emergency' });
  });
});

describe('summarize', () => {
  it('tallies each answer and the members with none', () => {
    expect(summarize(check({ u1: 'safe', u2: 'sos', outsider: 'safe' }), MEMBERS)).toEqual({
      safe: 1,
      sos: 1,
      noResponse: 0,
      missing: 1,
      total: 3,
    });
  });
});

describe('isTerminal', () => {
  it('treats only pending as non-terminal', () => {
    expect(isTerminal('pending')).toBe(false);
    expect(isTerminal('allSafe')).toBe(true);
    expect(isTerminal('emergency')).toBe(true);
  });
});

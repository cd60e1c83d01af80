import { describe, it, expect } from 'vitest';
import {
  decodeAlert,
  decodeAll,
  decodeGroup,
  decodeSafetyCheck,
  decodeUser,
  encodeGroup,
  encodeSafetyCheck,
} from '../src/core/codec.js';
import { InconsistentRecordError } from '../src/core/errors.js';

describe('decodeGroup', () => {
  it('fills interval defaults and keeps the admin among the members', () => {
    const group = decodeGroup('g1', { name: 'Hikers', adminId: 'u1', members: ['u2'] });
    expect(group).toEqual({
      id: 'g1',
      name: 'Hikers',
      adminId: 'u1',
      members: ['u1', 'u2'],
      pendingMembers: [],
      safetyCheckIntervalMinutes: 30,
      sosIntervalMinutesPerUser: 5,
      lastSafetyCheckAt: undefined,
      currentStatus: 'normal',
      createdAt: 0,
    });
  });

  it('accepts member lists stored as keyed maps', () => {
    const group = decodeGroup('g1', { name: 'Hikers', adminId: 'u1', members: { a: 'u1', b: 'u2' } });
    expect(group.members).toEqual(['u1', 'u2']);
  });

  it('drops pending entries that are already members', () => {
    const group = decodeGroup('g1', { name: 'Hikers', adminId: 'u1', members: ['u1', 'u2'], pendingMembers: ['u2', 'u3'] });
    expect(group.pendingMembers).toEqual(['u3']);
  });

  it('reads an unknown status as normal', () => {
    expect(decodeGroup('g1', { name: 'Hikers', adminId: 'u1', currentStatus: 'panic' }).currentStatus).toBe('normal');
  });

  it('rejects a group without an admin', () => {
    expect(() => decodeGroup('g1', { name: 'Hikers' })).toThrow(InconsistentRecordError);
  });
});

describe('decodeSafetyCheck', () => {
  it('treats a fresh check without status or responses as pending', () => {
    const check = decodeSafetyCheck('c1', { groupId: 'g1', initiatedBy: 'u1', createdAt: 5 });
    expect(check.status).toBe('pending');
    expect(check.responses).toEqual({});
  });

  it('uses the context group when the record lacks one', () => {
    expect(decodeSafetyCheck('c1', { initiatedBy: 'u1', createdAt: 5 }, 'g9').groupId).toBe('g9');
  });

  it('fails without any group to attach to', () => {
    expect(() => decodeSafetyCheck('c1', { initiatedBy: 'u1', createdAt: 5 })).toThrow(
      'safetyCheck c1 is inconsistent: missing groupId',
    );
  });

  it('drops malformed responses and keeps the rest', () => {
    const check = decodeSafetyCheck('c1', {
      groupId: 'g1',
      initiatedBy: 'u1',
      createdAt: 5,
      responses: {
        u1: { userId: 'u1', status: 'safe', timestamp: 6 },
        u2: { userId: 'u2', status: 'maybe', timestamp: 7 },
      },
    });
    expect(Object.keys(check.responses)).toEqual(['u1']);
  });
});

describe('decodeAlert', () => {
  it('defaults to active and replaces a broken location with the origin', () => {
    const alert = decodeAlert('a1', { userId: 'u1', groupId: 'g1', timestamp: 10, location: 'somewhere' });
    expect(alert.isActive).toBe(true);
    expect(alert.location).toEqual({ latitude: 0, longitude: 0 });
  });
});

describe('decodeUser', () => {
  it('reads a profile with no groups', () => {
    expect(decodeUser('u1', { username: 'Ada' })).toEqual({ id: 'u1', username: 'Ada', fcmToken: undefined, groups: [] });
  });
});

describe('decodeAll', () => {
  it('skips records that fail and reports them', () => {
    const failed: string[] = [];
    const groups = decodeAll(
      { g1: { name: 'One', adminId: 'u1' }, g2: { name: 'Two' } },
      decodeGroup,
      (id) => failed.push(id),
    );
    expect(groups.map((group) => group.id)).toEqual(['g1']);
    expect(failed).toEqual(['g2']);
  });
});

describe('encoding', () => {
  it('omits absent optional fields', () => {
    const encoded = encodeGroup(decodeGroup('g1', { name: 'Hikers', adminId: 'u1', createdAt: 3 }));
    expect(encoded).toEqual({
      id: 'g1',
      name: 'Hikers',
      adminId: 'u1',
      members: ['u1'],
      safetyCheckIntervalMinutes: 30,
      sosIntervalMinutesPerUser: 5,
      currentStatus: 'normal',
      createdAt: 3,
    });
  });

  it('writes responses keyed by user', () => {
    const encoded = encodeSafetyCheck({
      id: 'c1',
      groupId: 'g1',
      initiatedBy: 'u1',
      createdAt: 5,
      status: 'pending',
      responses: { u1: { userId: 'u1', status: 'safe', timestamp: 6, message: 'home' } },
    });
    expect(encoded.responses).toEqual({ u1: { userId: 'u1', status: 'safe', timestamp: 6, message: 'home' } });
    expect('completedAt' in encoded).toBe(false);
  });
});

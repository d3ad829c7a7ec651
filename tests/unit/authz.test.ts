import { ValidationError } from '../../src/shared/errors';
import {
  canRead,
  canWrite,
  normalizeSharedWith,
  parseVisibility,
} from '../../src/shared/engine/authz';
import type { AccessSubject } from '../../src/shared/engine/authz';
import type { Visibility } from '../../src/shared/types/scenario';

function subject(visibility: Visibility, sharedWith: string[] = []): AccessSubject {
  return { ownerId: 'owner-1', visibility, sharedWith };
}

describe('canRead', () => {
  it.each<[Visibility, string[], unknown, boolean]>([
    ['private', [], 'owner-1', true],
    ['private', [], 'stranger', false],
    ['shared', ['friend'], 'owner-1', true],
    ['shared', ['friend'], 'friend', true],
    ['shared', ['friend'], 'stranger', false],
    ['public', [], 'owner-1', true],
    ['public', [], 'stranger', true],
    ['public', [], '', false],
    ['public', [], '   ', false],
    ['public', [], undefined, false],
    ['public', [], null, false],
    ['public', [], 42, false],
  ])('%s card shared with %j, actor %p → %p', (visibility, sharedWith, actor, expected) => {
    expect(canRead(subject(visibility, sharedWith), actor)).toBe(expected);
  });

  it('denies everyone but the owner for an unknown visibility', () => {
    const tampered = JSON.parse('{"ownerId":"owner-1","visibility":"everyone","sharedWith":[]}');
    expect(canRead(tampered, 'stranger')).toBe(false);
    expect(canRead(tampered, 'owner-1')).toBe(true);
  });

  it('does not match actor ids case-insensitively', () => {
    expect(canRead(subject('shared', ['friend']), 'Friend')).toBe(false);
  });

  it('compares actor ids trimmed, like stored sharedWith entries', () => {
    const shared = subject('shared', normalizeSharedWith([' bob ']));

    expect(canRead(shared, ' bob ')).toBe(true);
    expect(canRead(shared, 'bob')).toBe(true);
    expect(canRead(shared, 'bobby')).toBe(false);
  });
});

describe('canWrite', () => {
  it.each<Visibility>(['private', 'shared', 'public'])('is owner-only on a %s card', (vis) => {
    const card = subject(vis, vis === 'shared' ? ['friend'] : []);
    expect(canWrite(card, 'owner-1')).toBe(true);
    expect(canWrite(card, 'friend')).toBe(false);
    expect(canWrite(card, 'stranger')).toBe(false);
    expect(canWrite(card, '')).toBe(false);
    expect(canWrite(card, undefined)).toBe(false);
  });

  it('accepts the owner id with surrounding whitespace', () => {
    expect(canWrite(subject('private'), ' owner-1 ')).toBe(true);
  });
});

describe('parseVisibility', () => {
  it('accepts known values case-insensitively', () => {
    expect(parseVisibility('private')).toBe('private');
    expect(parseVisibility(' PUBLIC ')).toBe('public');
    expect(parseVisibility('Shared')).toBe('shared');
  });

  it('rejects anything else', () => {
    expect(() => parseVisibility('secret')).toThrow(
      'visibility must be one of private, shared, public, got secret'
    );
    expect(() => parseVisibility(undefined)).toThrow(ValidationError);
    expect(() => parseVisibility(1)).toThrow(ValidationError);
  });
});

describe('normalizeSharedWith', () => {
  it('treats a missing list as empty', () => {
    expect(normalizeSharedWith(undefined)).toEqual([]);
    expect(normalizeSharedWith(null)).toEqual([]);
  });

  it('trims entries and drops duplicates in first-seen order', () => {
    expect(normalizeSharedWith(['b', ' a ', 'b', 'a', 'c'])).toEqual(['b', 'a', 'c']);
  });

  it('rejects a non-array', () => {
    expect(() => normalizeSharedWith('friend')).toThrow('sharedWith must be an array of actor ids');
  });

  it('names the offending entry', () => {
    try {
      normalizeSharedWith(['friend', '  ']);
      throw new Error('expected a ValidationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: 'sharedWith[1]' });
    }
  });
});

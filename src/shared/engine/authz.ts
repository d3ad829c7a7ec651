/**
 * Card access predicates.
 *
 * Read access follows visibility; write access is owner-only whatever the
 * visibility. Both are deny-by-default: a blank or non-string actor, or a
 * visibility outside the known set, never grants anything. Actor ids are
 * compared trimmed, the same way owner ids and `sharedWith` entries are
 * stored. The predicates have no side effects and never throw.
 */

import { ValidationError } from '../errors';
import type { Visibility } from '../types/scenario';
import { VISIBILITIES } from '../types/scenario';

export interface AccessSubject {
  readonly ownerId: string;
  readonly visibility: Visibility;
  readonly sharedWith: readonly string[];
}

function isActorId(actorId: unknown): actorId is string {
  return typeof actorId === 'string' && actorId.trim() !== '';
}

function actorKey(actorId: unknown): string | null {
  return isActorId(actorId) ? actorId.trim() : null;
}

export function canRead(subject: AccessSubject, actorId: unknown): boolean {
  const actor = actorKey(actorId);
  if (actor === null) {
    return false;
  }
  if (actor === subject.ownerId) {
    return true;
  }
  switch (subject.visibility) {
    case 'public':
      return true;
    case 'shared':
      return subject.sharedWith.includes(actor);
    case 'private':
      return false;
    default:
      return false;
  }
}

export function canWrite(subject: AccessSubject, actorId: unknown): boolean {
  const actor = actorKey(actorId);
  return actor !== null && actor === subject.ownerId;
}

/**
 * Parse a visibility value coming from outside the engine.
 */
export function parseVisibility(raw: unknown): Visibility {
  const normalized = typeof raw === 'string' ? raw.trim().toLowerCase() : raw;
  const visibility = VISIBILITIES.find((candidate) => candidate === normalized);
  if (!visibility) {
    throw new ValidationError(
      'visibility',
      `visibility must be one of ${VISIBILITIES.join(', ')}, got ${String(raw)}`
    );
  }
  return visibility;
}

/**
 * Normalize a `sharedWith` list: every entry must be a non-blank string;
 * duplicates are dropped, first occurrence order is kept.
 */
export function normalizeSharedWith(raw: unknown): string[] {
  if (raw === undefined || raw === null) {
    return [];
  }
  if (!Array.isArray(raw)) {
    throw new ValidationError('sharedWith', 'sharedWith must be an array of actor ids');
  }
  const seen = new Set<string>();
  raw.forEach((entry: unknown, index) => {
    if (!isActorId(entry)) {
      throw new ValidationError(
        `sharedWith[${index}]`,
        'sharedWith entries must be non-empty strings'
      );
    }
    seen.add(entry.trim());
  });
  return [...seen];
}

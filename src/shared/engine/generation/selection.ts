import { GenerationError } from '../../errors';
import type { GenerationStep } from '../../types/scenario';
import type { SeededRNG } from '../../utils/rng';
import type {
  CatalogueEntry,
  CountLimit,
  SpecialRuleEntry,
  VictoryPointEntry,
} from './catalogue';

/**
 * Fixed candidate order for one slot: a seeded starting index, then
 * declaration order with wrap-around. Draws from the stream only when there
 * is something to order.
 */
export function candidateOrder<T>(rng: SeededRNG, items: readonly T[]): T[] {
  if (items.length === 0) {
    return [];
  }
  const start = rng.nextInt(0, items.length - 1);
  return [...items.slice(start), ...items.slice(0, start)];
}

/**
 * How many entries a step should take, bounded by the mode limit and by what
 * is available. Fails the step when even the minimum cannot be met.
 */
export function drawCount(
  rng: SeededRNG,
  step: GenerationStep,
  limit: CountLimit,
  available: number
): number {
  if (available < limit.min) {
    throw new GenerationError(step, `needs at least ${limit.min} entries, ${available} available`, {
      min: limit.min,
      available,
    });
  }
  const max = Math.min(limit.max, available);
  return max <= limit.min ? limit.min : rng.nextInt(limit.min, max);
}

function conflicts(entry: SpecialRuleEntry, chosen: readonly SpecialRuleEntry[]): boolean {
  return chosen.some(
    (other) => entry.incompatibleWith.includes(other.id) || other.incompatibleWith.includes(entry.id)
  );
}

/**
 * Pick special rules in candidate order, skipping any rule declared
 * incompatible with one already picked.
 */
export function selectSpecialRules(
  rng: SeededRNG,
  entries: readonly SpecialRuleEntry[],
  limit: CountLimit
): SpecialRuleEntry[] {
  const count = drawCount(rng, 'special_rules', limit, entries.length);
  const chosen: SpecialRuleEntry[] = [];
  for (const entry of candidateOrder(rng, entries)) {
    if (chosen.length === count) {
      break;
    }
    if (!conflicts(entry, chosen)) {
      chosen.push(entry);
    }
  }
  if (chosen.length < limit.min) {
    throw new GenerationError(
      'special_rules',
      `only ${chosen.length} compatible rules, need ${limit.min}`,
      { chosen: chosen.map((r) => r.id) }
    );
  }
  return chosen;
}

export function selectVictoryPoints(
  rng: SeededRNG,
  entries: readonly VictoryPointEntry[],
  limit: CountLimit
): VictoryPointEntry[] {
  const count = drawCount(rng, 'victory_points', limit, entries.length);
  return candidateOrder(rng, entries).slice(0, count);
}

export function selectNarrativeHooks<T extends CatalogueEntry>(
  rng: SeededRNG,
  entries: readonly T[],
  limit: CountLimit
): T[] {
  const count = drawCount(rng, 'narrative_hooks', limit, entries.length);
  return candidateOrder(rng, entries).slice(0, count);
}

import { ScenarioError, ScenarioErrorCode } from '../errors';
import type { GenerationPhase, GenerationStep } from '../types/scenario';

/**
 * Explicit state model for one scenario generation run.
 *
 * State transitions:
 *   start → table_resolved → zones_placed → scenography_placed
 *         → objectives_placed → rules_selected → victory_assigned
 *         → hooks_selected → complete
 *                          → scored → complete
 *                                   → table_resolved (matched re-roll)
 *   any step phase → discarded (matched attempt that could not be placed)
 *                  → table_resolved (next re-roll) | complete
 *         → failed (any non-terminal state)
 */

export type StepPhase =
  | 'table_resolved'
  | 'zones_placed'
  | 'scenography_placed'
  | 'objectives_placed'
  | 'rules_selected'
  | 'victory_assigned'
  | 'hooks_selected';

export type GenerationState =
  | { kind: 'start' }
  | { kind: StepPhase; attempt: number }
  | { kind: 'scored'; attempt: number; total: number; distance: number }
  | { kind: 'discarded'; attempt: number; reason: string; step?: GenerationStep }
  | { kind: 'complete'; acceptedAttempt: number; attemptsTried: number }
  | { kind: 'failed'; reason: string; step?: GenerationStep };

export const initialGenerationState: GenerationState = { kind: 'start' };

const NEXT_STEP: Record<StepPhase, GenerationPhase | null> = {
  table_resolved: 'zones_placed',
  zones_placed: 'scenography_placed',
  scenography_placed: 'objectives_placed',
  objectives_placed: 'rules_selected',
  rules_selected: 'victory_assigned',
  victory_assigned: 'hooks_selected',
  hooks_selected: null,
};

function invalidTransition(from: GenerationState, to: GenerationPhase): ScenarioError {
  return new ScenarioError(
    ScenarioErrorCode.INTERNAL_ERROR,
    `invalid generation transition ${from.kind} → ${to}`,
    { from: from.kind, to }
  );
}

export function isTerminalGenerationState(state: GenerationState): boolean {
  return state.kind === 'complete' || state.kind === 'failed';
}

/**
 * Move to the next step phase. `table_resolved` is entered from `start` for
 * the first attempt and from `scored` or `discarded` for a re-roll.
 */
export function advanceStep(previous: GenerationState, next: StepPhase): GenerationState {
  if (next === 'table_resolved') {
    if (previous.kind === 'start') {
      return { kind: next, attempt: 0 };
    }
    if (previous.kind === 'scored' || previous.kind === 'discarded') {
      return { kind: next, attempt: previous.attempt + 1 };
    }
    throw invalidTransition(previous, next);
  }
  if (
    previous.kind === 'start' ||
    previous.kind === 'scored' ||
    previous.kind === 'discarded' ||
    previous.kind === 'complete' ||
    previous.kind === 'failed'
  ) {
    throw invalidTransition(previous, next);
  }
  if (NEXT_STEP[previous.kind] !== next) {
    throw invalidTransition(previous, next);
  }
  return { kind: next, attempt: previous.attempt };
}

export function markScored(
  previous: GenerationState,
  total: number,
  distance: number
): GenerationState {
  if (previous.kind !== 'hooks_selected') {
    throw invalidTransition(previous, 'scored');
  }
  return { kind: 'scored', attempt: previous.attempt, total, distance };
}

/**
 * Drop the current attempt after one of its steps failed. Only step phases
 * can be discarded; the run itself carries on with the next re-roll.
 */
export function markDiscarded(
  previous: GenerationState,
  reason: string,
  step?: GenerationStep
): GenerationState {
  if (
    previous.kind === 'start' ||
    previous.kind === 'scored' ||
    previous.kind === 'discarded' ||
    previous.kind === 'complete' ||
    previous.kind === 'failed'
  ) {
    throw invalidTransition(previous, 'discarded');
  }
  return {
    kind: 'discarded',
    attempt: previous.attempt,
    reason,
    ...(step !== undefined && { step }),
  };
}

export function markComplete(
  previous: GenerationState,
  acceptedAttempt: number,
  attemptsTried: number
): GenerationState {
  if (
    previous.kind !== 'hooks_selected' &&
    previous.kind !== 'scored' &&
    previous.kind !== 'discarded'
  ) {
    throw invalidTransition(previous, 'complete');
  }
  return { kind: 'complete', acceptedAttempt, attemptsTried };
}

export function markFailed(
  previous: GenerationState,
  reason: string,
  step?: GenerationStep
): GenerationState {
  if (isTerminalGenerationState(previous)) {
    return previous;
  }
  return { kind: 'failed', reason, ...(step !== undefined && { step }) };
}

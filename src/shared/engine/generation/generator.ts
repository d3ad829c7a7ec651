/**
 * Deterministic scenario generator.
 *
 * Same `(mode, seed, table)` and catalogue ⇒ byte-identical MapSpec and
 * content. All randomness comes from one {@link SeededRNG} per attempt, and
 * every step consumes the stream in a fixed order:
 *
 * 1. table resolution
 * 2. deployment zones
 * 3. scenography (or the caller's explicit shapes)
 * 4. objectives
 * 5. special rules
 * 6. victory points
 * 7. narrative hooks (casual / narrative only)
 * 8. matched-mode scoring, re-rolling steps 2-7 with derived attempt seeds
 *
 * A matched attempt whose placement fails is discarded and the re-rolls go
 * on; the run fails only when no attempt completed. Outside matched mode any
 * failure aborts the run. No partial scenario is ever returned.
 */

import { GenerationError, ValidationError, isValidationError } from '../../errors';
import {
  advanceStep,
  initialGenerationState,
  markComplete,
  markDiscarded,
  markFailed,
  markScored,
} from '../../stateMachines/generation';
import type { GenerationState, StepPhase } from '../../stateMachines/generation';
import type {
  GameMode,
  GenerationPhase,
  GenerationRequest,
  ScenarioContent,
  ScenographyPiece,
  Shape,
  TableRequest,
} from '../../types/scenario';
import type { EntropySource } from '../../utils/rng';
import { SeededRNG, deriveAttemptSeed, generateScenarioSeed, normalizeSeed } from '../../utils/rng';
import { buildMapSpec } from '../mapSpec';
import type { MapSpec } from '../mapSpec';
import { validateShapes } from '../shapeValidation';
import { TableSize } from '../tableSize';
import type {
  CatalogueEntry,
  ContentCatalogue,
  DeploymentEntry,
  ScenographyEntry,
} from './catalogue';
import { layoutDeploymentZones } from './deployment';
import { placeObjectives } from './objectives';
import { DEFAULT_MAX_PLACEMENT_TRIES, placeScenography } from './scenography';
import type { ScoredAttempt } from './scoring';
import { bandDistance, compareAttempts, scoreCombination } from './scoring';
import {
  candidateOrder,
  drawCount,
  selectNarrativeHooks,
  selectSpecialRules,
  selectVictoryPoints,
} from './selection';

export interface GeneratorOptions {
  /** Seed source used when the request carries none. */
  entropy?: EntropySource;
  /** Random positions tried per scenography / objective candidate. */
  maxPlacementTries?: number;
  /** Overrides the catalogue's matched-mode re-roll limit. */
  maxRerolls?: number;
  /** Called on every state change, including the final one. */
  onTransition?: (state: GenerationState) => void;
}

export interface GenerationTrace {
  readonly phases: readonly GenerationPhase[];
  readonly acceptedAttempt: number;
  readonly attemptsTried: number;
}

export interface GeneratedScenario {
  readonly mode: GameMode;
  /** Always recorded, including seeds drawn on the caller's behalf. */
  readonly seed: number;
  readonly seedWasGenerated: boolean;
  readonly table: TableSize;
  readonly mapSpec: MapSpec;
  readonly content: ScenarioContent;
  /** False when the caller supplied explicit shapes. */
  readonly isReplicable: boolean;
  readonly trace: GenerationTrace;
}

interface AttemptContext {
  readonly mode: GameMode;
  readonly seed: number;
  readonly table: TableSize;
  readonly catalogue: ContentCatalogue;
  readonly explicitShapes: readonly Shape[] | null;
  readonly maxPlacementTries: number;
}

interface Attempt extends ScoredAttempt {
  readonly content: Omit<ScenarioContent, 'score'>;
  readonly shapes: readonly Shape[];
}

export function resolveTable(request: TableRequest): TableSize {
  if (typeof request === 'string') {
    return TableSize.preset(request);
  }
  if ('unit' in request) {
    return TableSize.fromUnit(request.unit, request.width, request.height);
  }
  return TableSize.fromCm(request.widthCm, request.heightCm);
}

function resolveSeed(raw: number | undefined, entropy: EntropySource): number {
  try {
    return normalizeSeed(raw === undefined ? entropy() : raw);
  } catch (error) {
    throw new ValidationError('seed', error instanceof Error ? error.message : String(error));
  }
}

function declarationIndex<T>(list: readonly T[], item: T): number {
  return list.indexOf(item);
}

function explicitPieces(shapes: readonly Shape[]): ScenographyPiece[] {
  return shapes.map((shape, i): ScenographyPiece => ({
    entryId: 'explicit',
    name: shape.label ?? `${shape.type} ${i + 1}`,
    shape: shape.layer === undefined ? { ...shape, layer: 'scenography' } : shape,
  }));
}

function runAttempt(
  ctx: AttemptContext,
  attempt: number,
  advance: (next: StepPhase) => void
): Attempt {
  const { catalogue, mode, table } = ctx;
  const rng = new SeededRNG(deriveAttemptSeed(ctx.seed, attempt));
  const limits = catalogue.limits(mode);

  // (2) deployment
  const deploymentEntries = catalogue.entries(mode, 'deployment');
  let deployment: { entry: DeploymentEntry; zones: ScenarioContent['deploymentZones'] } | null =
    null;
  for (const entry of candidateOrder(rng, deploymentEntries)) {
    const zones = layoutDeploymentZones(entry, table, rng);
    if (zones !== null) {
      deployment = { entry, zones };
      break;
    }
  }
  if (deployment === null) {
    throw new GenerationError(
      'deployment',
      `no deployment layout fits a ${table.toString()} table`,
      { candidates: deploymentEntries.length }
    );
  }
  advance('zones_placed');

  // (3) scenography
  const scenographyEntries = catalogue.entries(mode, 'scenography');
  const placedScenery: Array<{ entry: ScenographyEntry; piece: ScenographyPiece }> =
    ctx.explicitShapes === null
      ? placeScenography(
          rng,
          scenographyEntries,
          drawCount(
            rng,
            'scenography',
            limits.scenography,
            scenographyEntries.length > 0 ? Number.MAX_SAFE_INTEGER : 0
          ),
          table,
          ctx.maxPlacementTries
        )
      : [];
  const scenography =
    ctx.explicitShapes === null
      ? placedScenery.map((p) => p.piece)
      : explicitPieces(ctx.explicitShapes);
  advance('scenography_placed');

  // (4) objectives
  const objectiveEntries = catalogue.entries(mode, 'objective');
  const obstacles = [...deployment.zones.map((z) => z.shape), ...scenography.map((p) => p.shape)];
  const objectives = placeObjectives(
    rng,
    objectiveEntries,
    limits.objectives,
    table,
    obstacles,
    ctx.maxPlacementTries
  );
  advance('objectives_placed');

  // (5) special rules
  const ruleEntries = catalogue.entries(mode, 'specialRule');
  const rules = selectSpecialRules(rng, ruleEntries, limits.specialRules);
  advance('rules_selected');

  // (6) victory points
  const victoryEntries = catalogue.entries(mode, 'victoryPoints');
  const victory = selectVictoryPoints(rng, victoryEntries, limits.victoryPoints);
  advance('victory_assigned');

  // (7) narrative hooks
  const hooks: CatalogueEntry[] =
    mode === 'matched'
      ? []
      : selectNarrativeHooks(rng, catalogue.entries(mode, 'narrativeHook'), limits.narrativeHooks);
  advance('hooks_selected');

  const selected: CatalogueEntry[] = [
    deployment.entry,
    ...placedScenery.map((p) => p.entry),
    ...objectives.map((o) => o.entry),
    ...rules,
    ...victory,
  ];
  const total = scoreCombination(selected, catalogue.scoring);

  return {
    attempt,
    total,
    distance: bandDistance(total, catalogue.scoring.targetBand),
    declarationOrder: [
      declarationIndex(deploymentEntries, deployment.entry),
      ...placedScenery.map((p) => declarationIndex(scenographyEntries, p.entry)),
      ...objectives.map((o) => declarationIndex(objectiveEntries, o.entry)),
      ...rules.map((r) => declarationIndex(ruleEntries, r)),
      ...victory.map((v) => declarationIndex(victoryEntries, v)),
    ],
    shapes: [
      ...deployment.zones.map((z) => z.shape),
      ...scenography.map((p) => p.shape),
      ...objectives.flatMap((o) => o.placement.markers),
    ],
    content: {
      deploymentZones: deployment.zones,
      scenography,
      objectives: objectives.map((o) => o.placement),
      specialRules: rules.map((r) => ({
        entryId: r.id,
        name: r.name,
        description: r.description,
      })),
      victoryPoints: victory.map((v) => ({
        entryId: v.id,
        name: v.name,
        description: v.description,
        points: v.points,
      })),
      narrativeHooks: hooks.map((h) => ({ entryId: h.id, text: h.description })),
    },
  };
}

function assembleMapSpec(table: TableSize, shapes: readonly Shape[]): MapSpec {
  try {
    return buildMapSpec(table, shapes);
  } catch (error) {
    if (isValidationError(error)) {
      throw new GenerationError('assembly', error.message, { field: error.field });
    }
    throw error;
  }
}

/**
 * Generate a scenario for `request` from `catalogue`.
 *
 * @throws ValidationError for a bad table, seed or explicit shape list
 * @throws GenerationError when a step runs out of candidates, or matched
 *   scoring cannot get within `maxDeviation` of the target band
 */
export function generateScenario(
  request: GenerationRequest,
  catalogue: ContentCatalogue,
  options: GeneratorOptions = {}
): GeneratedScenario {
  let state: GenerationState = initialGenerationState;
  const phases: GenerationPhase[] = [state.kind];
  const moveTo = (next: GenerationState): void => {
    state = next;
    phases.push(next.kind);
    options.onTransition?.(next);
  };
  const advance = (next: StepPhase): void => moveTo(advanceStep(state, next));

  try {
    // (1) table + inputs
    const seedWasGenerated = request.seed === undefined;
    const seed = resolveSeed(request.seed, options.entropy ?? generateScenarioSeed);
    const table = resolveTable(request.table);
    const explicitShapes =
      request.explicitShapes === undefined
        ? null
        : validateShapes(request.explicitShapes, table.widthMm, table.heightMm);
    advance('table_resolved');

    const ctx: AttemptContext = {
      mode: request.mode,
      seed,
      table,
      catalogue,
      explicitShapes,
      maxPlacementTries: options.maxPlacementTries ?? DEFAULT_MAX_PLACEMENT_TRIES,
    };
    const matched = request.mode === 'matched';
    const policy = catalogue.scoring;
    const maxRerolls = matched ? (options.maxRerolls ?? policy.maxRerolls) : 0;

    // (2-8) attempts
    let best: Attempt | null = null;
    let lastFailure: GenerationError | null = null;
    let tried = 0;
    for (let attempt = 0; attempt <= maxRerolls; attempt++) {
      if (attempt > 0) {
        advance('table_resolved');
      }
      let candidate: Attempt;
      try {
        candidate = runAttempt(ctx, attempt, advance);
      } catch (error) {
        // A matched attempt that cannot be placed is skipped; earlier
        // attempts stay eligible.
        if (!matched || !(error instanceof GenerationError)) {
          throw error;
        }
        tried += 1;
        lastFailure = error;
        moveTo(markDiscarded(state, error.message, error.step));
        continue;
      }
      tried += 1;
      if (!matched) {
        best = candidate;
        break;
      }
      moveTo(markScored(state, candidate.total, candidate.distance));
      if (best === null || compareAttempts(candidate, best) < 0) {
        best = candidate;
      }
      if (candidate.distance === 0) {
        break;
      }
    }
    if (best === null) {
      throw lastFailure ?? new GenerationError('assembly', 'no attempt completed');
    }
    if (matched && best.distance > policy.maxDeviation) {
      throw new GenerationError(
        'scoring',
        `closest attempt scored ${best.total}, ${best.distance} outside the target band`,
        { band: policy.targetBand, maxDeviation: policy.maxDeviation, attemptsTried: tried }
      );
    }

    const mapSpec = assembleMapSpec(table, best.shapes);
    const content: ScenarioContent = {
      ...best.content,
      score: matched
        ? {
            total: best.total,
            band: policy.targetBand,
            withinBand: best.distance === 0,
            distance: best.distance,
            attempt: best.attempt,
            attemptsTried: tried,
          }
        : null,
    };
    moveTo(markComplete(state, best.attempt, tried));

    return {
      mode: request.mode,
      seed,
      seedWasGenerated,
      table,
      mapSpec,
      content,
      isReplicable: explicitShapes === null,
      trace: { phases, acceptedAttempt: best.attempt, attemptsTried: tried },
    };
  } catch (error) {
    moveTo(
      markFailed(
        state,
        error instanceof Error ? error.message : String(error),
        error instanceof GenerationError ? error.step : undefined
      )
    );
    throw error;
  }
}

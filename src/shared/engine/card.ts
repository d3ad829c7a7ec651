/**
 * ScenarioCard - the aggregate a user owns, shares and renders.
 *
 * Identity (`id`, `ownerId`) always comes from the caller; the engine never
 * invents one. Every field is validated on construction and cards are
 * immutable: the `with*` methods return a new, re-validated card.
 */

import { ValidationError } from '../errors';
import { renderMapSvg } from '../render/svgRenderer';
import type { RenderOptions, RenderResult } from '../render/svgRenderer';
import type { GameMode, ScenarioContent, Visibility } from '../types/scenario';
import { GAME_MODES } from '../types/scenario';
import { MAX_SEED } from '../utils/rng';
import { canRead, canWrite, normalizeSharedWith, parseVisibility } from './authz';
import { validateScenarioContent, validateSharedWithVisibility } from './contentValidation';
import type { GeneratedScenario } from './generation/generator';
import type { MapSpec } from './mapSpec';
import type { TableSize } from './tableSize';

export interface CardIdentity {
  id: string;
  ownerId: string;
  visibility: Visibility;
  sharedWith?: readonly string[];
}

export interface ScenarioCardProps {
  id: string;
  ownerId: string;
  visibility: Visibility;
  sharedWith: readonly string[];
  mode: GameMode;
  seed: number;
  table: TableSize;
  mapSpec: MapSpec;
  content: ScenarioContent;
  isReplicable: boolean;
}

function requireIdentifier(field: string, value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(field, `${field} must be a non-empty string`);
  }
  return value;
}

export class ScenarioCard {
  readonly id: string;
  readonly ownerId: string;
  readonly visibility: Visibility;
  readonly sharedWith: readonly string[];
  readonly mode: GameMode;
  readonly seed: number;
  readonly table: TableSize;
  readonly mapSpec: MapSpec;
  readonly content: ScenarioContent;
  readonly isReplicable: boolean;

  private constructor(props: ScenarioCardProps) {
    this.id = requireIdentifier('id', props.id);
    this.ownerId = requireIdentifier('ownerId', props.ownerId);
    this.visibility = parseVisibility(props.visibility);
    this.sharedWith = Object.freeze(normalizeSharedWith(props.sharedWith));
    validateSharedWithVisibility(this.visibility, this.sharedWith);

    if (!GAME_MODES.includes(props.mode)) {
      throw new ValidationError('mode', `unknown mode: ${String(props.mode)}`);
    }
    this.mode = props.mode;

    if (!Number.isInteger(props.seed) || props.seed < 0 || props.seed > MAX_SEED) {
      throw new ValidationError('seed', `seed must be an integer in 0..${MAX_SEED}`);
    }
    this.seed = props.seed;

    if (!props.mapSpec.table.equals(props.table)) {
      throw new ValidationError(
        'mapSpec',
        `map is laid out for ${props.mapSpec.table.toString()}, card table is ${props.table.toString()}`
      );
    }
    this.table = props.table;
    this.mapSpec = props.mapSpec;

    validateScenarioContent(props.content, props.table);
    this.content = props.content;
    this.isReplicable = props.isReplicable;
    Object.freeze(this);
  }

  /** Attach caller-supplied identity to a freshly generated scenario. */
  static create(identity: CardIdentity, scenario: GeneratedScenario): ScenarioCard {
    return new ScenarioCard({
      id: identity.id,
      ownerId: identity.ownerId,
      visibility: identity.visibility,
      sharedWith: identity.sharedWith ?? [],
      mode: scenario.mode,
      seed: scenario.seed,
      table: scenario.table,
      mapSpec: scenario.mapSpec,
      content: scenario.content,
      isReplicable: scenario.isReplicable,
    });
  }

  /** Rebuild a card from stored props, validating everything again. */
  static fromProps(props: ScenarioCardProps): ScenarioCard {
    return new ScenarioCard(props);
  }

  toProps(): ScenarioCardProps {
    return {
      id: this.id,
      ownerId: this.ownerId,
      visibility: this.visibility,
      sharedWith: this.sharedWith,
      mode: this.mode,
      seed: this.seed,
      table: this.table,
      mapSpec: this.mapSpec,
      content: this.content,
      isReplicable: this.isReplicable,
    };
  }

  canUserRead(actorId: unknown): boolean {
    return canRead(this, actorId);
  }

  canUserWrite(actorId: unknown): boolean {
    return canWrite(this, actorId);
  }

  /**
   * Change visibility. `sharedWith` defaults to empty; keeping a share list
   * while leaving `shared` visibility is rejected.
   */
  withVisibility(visibility: Visibility, sharedWith: readonly string[] = []): ScenarioCard {
    return new ScenarioCard({ ...this.toProps(), visibility, sharedWith });
  }

  /** Replace the map. A hand-edited map can no longer be replayed from the seed. */
  withMapSpec(mapSpec: MapSpec): ScenarioCard {
    return new ScenarioCard({ ...this.toProps(), mapSpec, isReplicable: false });
  }

  withContent(content: ScenarioContent): ScenarioCard {
    return new ScenarioCard({ ...this.toProps(), content });
  }

  renderSvg(options: RenderOptions = {}): RenderResult {
    return renderMapSvg(this.mapSpec, this.table, options);
  }

  toJSON(): Record<string, unknown> {
    return {
      id: this.id,
      ownerId: this.ownerId,
      visibility: this.visibility,
      sharedWith: this.sharedWith,
      mode: this.mode,
      seed: this.seed,
      table: this.table.toJSON(),
      mapSpec: this.mapSpec.toJSON(),
      content: this.content,
      isReplicable: this.isReplicable,
    };
  }
}

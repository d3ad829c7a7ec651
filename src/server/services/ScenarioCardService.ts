import { ForbiddenError } from '../../shared/errors';
import { ScenarioCard } from '../../shared/engine/card';
import type { CardIdentity } from '../../shared/engine/card';
import { normalizeSharedWith, parseVisibility } from '../../shared/engine/authz';
import type { ContentCatalogue } from '../../shared/engine/generation/catalogue';
import { generateScenario } from '../../shared/engine/generation/generator';
import type { GeneratedScenario, GeneratorOptions } from '../../shared/engine/generation/generator';
import type { RenderOptions } from '../../shared/render/svgRenderer';
import type { GenerationRequest } from '../../shared/types/scenario';
import type { EntropySource } from '../../shared/utils/rng';
import {
  CardIdentitySchema,
  GenerationRequestSchema,
  toValidationError,
} from '../../shared/validation/schemas';
import { FileCatalogueProvider } from '../catalogue/FileCatalogueProvider';
import { config } from '../config';
import { errorMeta, logger } from '../utils/logger';

export interface ScenarioCardServiceOptions {
  entropy?: EntropySource;
  maxRerolls?: number;
  maxPlacementTries?: number;
}

function describeActor(actorId: unknown): string {
  return typeof actorId === 'string' && actorId.trim() !== '' ? actorId : '<anonymous>';
}

/**
 * Use cases around scenario cards: generate, render, regenerate, variants
 * and visibility changes.
 *
 * Identity always comes from the caller. Every operation on an existing card
 * checks the acting user against the card's visibility before doing anything
 * else, so a guessed card id gets an actor nothing.
 */
export class ScenarioCardService {
  private readonly catalogue: ContentCatalogue;
  private readonly options: ScenarioCardServiceOptions;

  constructor(catalogue: ContentCatalogue, options: ScenarioCardServiceOptions = {}) {
    this.catalogue = catalogue;
    this.options = {
      maxRerolls: config.generation.maxRerolls,
      maxPlacementTries: config.generation.maxPlacementTries,
      ...options,
    };
  }

  /**
   * Validate a raw generation request and caller identity, then generate and
   * wrap the result in a new card.
   */
  generate(rawRequest: unknown, rawIdentity: unknown): ScenarioCard {
    const request = GenerationRequestSchema.safeParse(rawRequest);
    if (!request.success) {
      throw toValidationError(request.error);
    }
    const identity = CardIdentitySchema.safeParse(rawIdentity);
    if (!identity.success) {
      throw toValidationError(identity.error);
    }

    const scenario = this.runGenerator(request.data, { cardId: identity.data.id });
    const card = ScenarioCard.create(identity.data, scenario);

    logger.info('Scenario card generated', {
      cardId: card.id,
      ownerId: card.ownerId,
      mode: card.mode,
      seed: card.seed,
      seedWasGenerated: scenario.seedWasGenerated,
      table: card.table.toJSON(),
      shapes: card.mapSpec.shapes.length,
      attemptsTried: scenario.trace.attemptsTried,
    });
    return card;
  }

  /**
   * Render the card's map for `actorId`.
   *
   * @throws ForbiddenError when the actor may not read the card
   * @throws RenderRefusedError when the stored map cannot be drawn safely
   */
  render(card: ScenarioCard, actorId: unknown, options: RenderOptions = {}): string {
    this.assertCanRead(card, actorId, 'render');
    const result = card.renderSvg(options);
    if (!result.ok) {
      logger.warn('Scenario card render refused', {
        cardId: card.id,
        ...errorMeta(result.error),
      });
      throw result.error;
    }
    logger.debug('Scenario card rendered', { cardId: card.id, bytes: result.svg.length });
    return result.svg;
  }

  /**
   * Generate the card again with the same mode and table, keeping its
   * identity. Without a seed a fresh one is drawn.
   */
  regenerate(card: ScenarioCard, actorId: unknown, seed?: unknown): ScenarioCard {
    this.assertCanWrite(card, actorId, 'regenerate');
    const request = this.requestFor(card, seed);
    const scenario = this.runGenerator(request, { cardId: card.id });
    const next = ScenarioCard.create(this.identityOf(card), scenario);

    logger.info('Scenario card regenerated', {
      cardId: next.id,
      previousSeed: card.seed,
      seed: next.seed,
    });
    return next;
  }

  /**
   * New card under `newId` with the same owner, mode, table and sharing as
   * `card` but a freshly drawn seed.
   */
  createVariant(card: ScenarioCard, actorId: unknown, newId: string): ScenarioCard {
    this.assertCanWrite(card, actorId, 'create a variant of');
    const identity = CardIdentitySchema.safeParse({ ...this.identityOf(card), id: newId });
    if (!identity.success) {
      throw toValidationError(identity.error);
    }
    const scenario = this.runGenerator(this.requestFor(card), {
      cardId: newId,
      variantOf: card.id,
    });
    const variant = ScenarioCard.create(identity.data, scenario);

    logger.info('Scenario card variant created', {
      cardId: variant.id,
      variantOf: card.id,
      seed: variant.seed,
    });
    return variant;
  }

  updateVisibility(
    card: ScenarioCard,
    actorId: unknown,
    visibility: unknown,
    sharedWith?: unknown
  ): ScenarioCard {
    this.assertCanWrite(card, actorId, 'change visibility of');
    const next = card.withVisibility(parseVisibility(visibility), normalizeSharedWith(sharedWith));
    logger.info('Scenario card visibility changed', {
      cardId: card.id,
      from: card.visibility,
      to: next.visibility,
      sharedWith: next.sharedWith.length,
    });
    return next;
  }

  private runGenerator(
    request: GenerationRequest,
    logContext: Record<string, unknown>
  ): GeneratedScenario {
    const generatorOptions: GeneratorOptions = {
      ...(this.options.entropy && { entropy: this.options.entropy }),
      ...(this.options.maxRerolls !== undefined && { maxRerolls: this.options.maxRerolls }),
      ...(this.options.maxPlacementTries !== undefined && {
        maxPlacementTries: this.options.maxPlacementTries,
      }),
      onTransition: (state) => {
        logger.debug('Generation state', { ...logContext, state });
      },
    };
    try {
      return generateScenario(request, this.catalogue, generatorOptions);
    } catch (error) {
      logger.warn('Scenario generation failed', {
        ...logContext,
        mode: request.mode,
        ...errorMeta(error),
      });
      throw error;
    }
  }

  /** Same mode and table as `card`; the seed is validated like any request seed. */
  private requestFor(card: ScenarioCard, seed?: unknown): GenerationRequest {
    const parsed = GenerationRequestSchema.safeParse({
      mode: card.mode,
      table: { unit: 'mm', width: card.table.widthMm, height: card.table.heightMm },
      ...(seed !== undefined && { seed }),
    });
    if (!parsed.success) {
      throw toValidationError(parsed.error);
    }
    return parsed.data;
  }

  private identityOf(card: ScenarioCard): CardIdentity {
    return {
      id: card.id,
      ownerId: card.ownerId,
      visibility: card.visibility,
      sharedWith: card.sharedWith,
    };
  }

  private assertCanRead(card: ScenarioCard, actorId: unknown, action: string): void {
    if (!card.canUserRead(actorId)) {
      logger.warn('Scenario card access denied', { cardId: card.id, action });
      throw new ForbiddenError(describeActor(actorId), action, { cardId: card.id });
    }
  }

  private assertCanWrite(card: ScenarioCard, actorId: unknown, action: string): void {
    if (!card.canUserWrite(actorId)) {
      logger.warn('Scenario card access denied', { cardId: card.id, action });
      throw new ForbiddenError(describeActor(actorId), action, { cardId: card.id });
    }
  }
}

/**
 * Service backed by the catalogue file named in config.
 */
export function createScenarioCardService(
  provider: FileCatalogueProvider = new FileCatalogueProvider(),
  options: ScenarioCardServiceOptions = {}
): ScenarioCardService {
  return new ScenarioCardService(provider.load(), options);
}

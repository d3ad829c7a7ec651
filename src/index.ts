/**
 * Public entry point of the scenario card engine.
 *
 * Only the shared engine (geometry, generation, cards, rendering) is
 * exported here; importing it reads no environment and loads no logger. The
 * server layer lives behind `scenario-card-engine/server`.
 */

export * from './shared/errors';
export * from './shared/types/scenario';
export * from './shared/types/result';

export { TableSize, MIN_TABLE_MM, MAX_TABLE_MM } from './shared/engine/tableSize';
export { MapSpec, buildMapSpec, tryBuildMapSpec } from './shared/engine/mapSpec';
export { MAX_SHAPES, validateShape, validateShapes } from './shared/engine/shapeValidation';
export { canRead, canWrite, parseVisibility, normalizeSharedWith } from './shared/engine/authz';
export type { AccessSubject } from './shared/engine/authz';
export { ScenarioCard } from './shared/engine/card';
export type { CardIdentity, ScenarioCardProps } from './shared/engine/card';

export { generateScenario, resolveTable } from './shared/engine/generation/generator';
export type {
  GeneratedScenario,
  GenerationTrace,
  GeneratorOptions,
} from './shared/engine/generation/generator';
export { InMemoryCatalogue } from './shared/engine/generation/catalogue';
export type {
  CatalogueData,
  ContentCatalogue,
  ContentCategory,
  ModeLimits,
  ScoringPolicy,
} from './shared/engine/generation/catalogue';
export type { GenerationState } from './shared/stateMachines/generation';

export { renderMapSvg } from './shared/render/svgRenderer';
export type { RenderOptions, RenderResult } from './shared/render/svgRenderer';
export { escapeXml } from './shared/render/svgSafety';
export {
  SeededRNG,
  MAX_SEED,
  generateScenarioSeed,
  normalizeSeed,
  seedFromConfig,
} from './shared/utils/rng';
export {
  CatalogueSchema,
  GenerationRequestSchema,
  CardIdentitySchema,
} from './shared/validation/schemas';

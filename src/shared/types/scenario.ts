// ═══════════════════════════════════════════════════════════════════════════
// Core scenario vocabulary shared by the engine, renderer and server layer.
// ═══════════════════════════════════════════════════════════════════════════

export type GameMode = 'casual' | 'narrative' | 'matched';

export const GAME_MODES: readonly GameMode[] = ['casual', 'narrative', 'matched'];

export type Visibility = 'private' | 'shared' | 'public';

export const VISIBILITIES: readonly Visibility[] = ['private', 'shared', 'public'];

export type TablePreset = 'standard' | 'massive';

export type LengthUnit = 'mm' | 'cm' | 'in' | 'ft';

/**
 * How a caller asks for a table: a named preset, a size in centimetres, or a
 * size in an explicit unit.
 */
export type TableRequest =
  | TablePreset
  | { widthCm: number | string; heightCm: number | string }
  | { unit: LengthUnit; width: number | string; height: number | string };

// ═══════════════════════════════════════════════════════════════════════════
// Shapes
// ═══════════════════════════════════════════════════════════════════════════

export type ShapeLayer = 'deployment' | 'scenography' | 'objective';

export const SHAPE_LAYERS: readonly ShapeLayer[] = ['deployment', 'scenography', 'objective'];

export interface Point {
  readonly x: number;
  readonly y: number;
}

/** Optional presentation / placement metadata carried by every shape. */
export interface ShapeMetadata {
  /** Free text drawn next to the shape. Escaped on render. */
  readonly label?: string;
  readonly layer?: ShapeLayer;
  /** Shapes that opt out of collision checks (passable terrain, for example). */
  readonly allowOverlap?: boolean;
  readonly fill?: string;
  readonly stroke?: string;
}

export interface CircleShape extends ShapeMetadata {
  readonly type: 'circle';
  readonly cx: number;
  readonly cy: number;
  readonly r: number;
}

export interface RectShape extends ShapeMetadata {
  readonly type: 'rect';
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export interface PolygonShape extends ShapeMetadata {
  readonly type: 'polygon';
  readonly points: readonly Point[];
}

export type Shape = CircleShape | RectShape | PolygonShape;

export type ShapeType = Shape['type'];

export const SHAPE_TYPES: readonly ShapeType[] = ['circle', 'rect', 'polygon'];

// ═══════════════════════════════════════════════════════════════════════════
// Generated content
// ═══════════════════════════════════════════════════════════════════════════

export type Edge = 'north' | 'south' | 'east' | 'west';

export type Corner = 'north-west' | 'north-east' | 'south-west' | 'south-east';

export interface DeploymentZone {
  readonly entryId: string;
  readonly name: string;
  readonly description: string;
  readonly side: Edge | Corner;
  readonly shape: RectShape | PolygonShape;
}

export interface ScenographyPiece {
  readonly entryId: string;
  readonly name: string;
  readonly shape: Shape;
}

export interface ObjectivePlacement {
  readonly entryId: string;
  readonly name: string;
  readonly description: string;
  readonly markers: readonly CircleShape[];
}

export interface SpecialRule {
  readonly entryId: string;
  readonly name: string;
  readonly description: string;
}

export interface VictoryCondition {
  readonly entryId: string;
  readonly name: string;
  readonly description: string;
  readonly points: number;
}

export interface NarrativeHook {
  readonly entryId: string;
  readonly text: string;
}

export interface ScoreBand {
  readonly min: number;
  readonly max: number;
}

/** Outcome of the matched-mode balancing pass. */
export interface ScoreReport {
  readonly total: number;
  readonly band: ScoreBand;
  readonly withinBand: boolean;
  /** Distance from the nearest band edge; 0 when inside the band. */
  readonly distance: number;
  /** Index of the accepted attempt (0 = the caller's seed itself). */
  readonly attempt: number;
  readonly attemptsTried: number;
}

export interface ScenarioContent {
  readonly deploymentZones: readonly DeploymentZone[];
  readonly scenography: readonly ScenographyPiece[];
  readonly objectives: readonly ObjectivePlacement[];
  readonly specialRules: readonly SpecialRule[];
  readonly victoryPoints: readonly VictoryCondition[];
  readonly narrativeHooks: readonly NarrativeHook[];
  /** Present only for matched mode. */
  readonly score: ScoreReport | null;
}

// ═══════════════════════════════════════════════════════════════════════════
// Generation
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A validated generation request. Seeds are already normalized; a missing
 * seed means "draw one", which is not the same thing as seed `0`.
 */
export interface GenerationRequest {
  mode: GameMode;
  seed?: number;
  table: TableRequest;
  explicitShapes?: readonly unknown[];
}

/** Named steps of a generation run, in the order they execute. */
export type GenerationStep =
  | 'table'
  | 'deployment'
  | 'scenography'
  | 'objectives'
  | 'special_rules'
  | 'victory_points'
  | 'narrative_hooks'
  | 'scoring'
  | 'assembly';

export type GenerationPhase =
  | 'start'
  | 'table_resolved'
  | 'zones_placed'
  | 'scenography_placed'
  | 'objectives_placed'
  | 'rules_selected'
  | 'victory_assigned'
  | 'hooks_selected'
  | 'scored'
  | 'discarded'
  | 'complete'
  | 'failed';

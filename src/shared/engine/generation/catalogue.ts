/**
 * Content catalogue model.
 *
 * The generator only sees the {@link ContentCatalogue} port: ordered entries
 * per `(mode, category)`, per-mode count limits and the matched-mode scoring
 * policy. Where the data comes from (a JSON file, a database, a test
 * fixture) is the host's concern.
 */

import type { GameMode, Point, ScoreBand } from '../../types/scenario';

export interface CatalogueEntry {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly modes: readonly GameMode[];
  /** Balance weight summed by matched-mode scoring. */
  readonly score: number;
  readonly riskFlags: readonly string[];
}

export type DeploymentLayout =
  | {
      readonly kind: 'edges';
      readonly axis: 'north-south' | 'east-west' | 'any';
      readonly minDepthMm: number;
      readonly maxDepthMm: number;
    }
  | {
      readonly kind: 'corners';
      readonly diagonal: 'nw-se' | 'ne-sw' | 'any';
      readonly minRadiusMm: number;
      readonly maxRadiusMm: number;
    };

export interface DeploymentEntry extends CatalogueEntry {
  readonly layout: DeploymentLayout;
}

export type Footprint =
  | { readonly kind: 'circle'; readonly minRadiusMm: number; readonly maxRadiusMm: number }
  | {
      readonly kind: 'rect';
      readonly minWidthMm: number;
      readonly maxWidthMm: number;
      readonly minHeightMm: number;
      readonly maxHeightMm: number;
    }
  /** Outline relative to its own origin; rotated in 90° steps on placement. */
  | { readonly kind: 'polygon'; readonly points: readonly Point[] };

export interface ScenographyEntry extends CatalogueEntry {
  readonly footprint: Footprint;
  /** Passable terrain that other pieces may overlap. */
  readonly allowOverlap: boolean;
  readonly fill?: string;
}

export type ObjectiveLayout = 'centre' | 'midline' | 'scattered';

export interface ObjectiveEntry extends CatalogueEntry {
  readonly layout: ObjectiveLayout;
  readonly markers: number;
}

export interface SpecialRuleEntry extends CatalogueEntry {
  readonly incompatibleWith: readonly string[];
}

export interface VictoryPointEntry extends CatalogueEntry {
  readonly points: number;
}

export type NarrativeHookEntry = CatalogueEntry;

export interface CatalogueEntries {
  deployment: DeploymentEntry;
  scenography: ScenographyEntry;
  objective: ObjectiveEntry;
  specialRule: SpecialRuleEntry;
  victoryPoints: VictoryPointEntry;
  narrativeHook: NarrativeHookEntry;
}

export type ContentCategory = keyof CatalogueEntries;

export type CatalogueEntryLists = { [C in ContentCategory]: readonly CatalogueEntries[C][] };

export interface CountLimit {
  readonly min: number;
  readonly max: number;
}

export interface ModeLimits {
  readonly scenography: CountLimit;
  readonly objectives: CountLimit;
  readonly specialRules: CountLimit;
  readonly victoryPoints: CountLimit;
  readonly narrativeHooks: CountLimit;
}

export interface ScoringPolicy {
  readonly targetBand: ScoreBand;
  /** Extra attempts after the first one. */
  readonly maxRerolls: number;
  /** Furthest from the band an accepted attempt may land. */
  readonly maxDeviation: number;
  /** Added to the total once per risk flag on a selected entry. */
  readonly riskPenalty: number;
}

export interface CatalogueData {
  readonly entries: CatalogueEntryLists;
  readonly limits: Readonly<Record<GameMode, ModeLimits>>;
  readonly scoring: ScoringPolicy;
}

export interface ContentCatalogue {
  /** Entries usable in `mode`, in declaration order. */
  entries<C extends ContentCategory>(mode: GameMode, category: C): readonly CatalogueEntries[C][];
  limits(mode: GameMode): ModeLimits;
  readonly scoring: ScoringPolicy;
}

/**
 * Catalogue backed by already-validated data held in memory.
 */
export class InMemoryCatalogue implements ContentCatalogue {
  private readonly data: CatalogueData;

  constructor(data: CatalogueData) {
    this.data = data;
  }

  get scoring(): ScoringPolicy {
    return this.data.scoring;
  }

  entries<C extends ContentCategory>(mode: GameMode, category: C): readonly CatalogueEntries[C][] {
    const all: readonly CatalogueEntries[C][] = this.data.entries[category];
    return all.filter((entry) => entry.modes.includes(mode));
  }

  limits(mode: GameMode): ModeLimits {
    return this.data.limits[mode];
  }

  /** Total number of entries across categories, for logging. */
  size(): number {
    return Object.values(this.data.entries).reduce((sum, list) => sum + list.length, 0);
  }
}

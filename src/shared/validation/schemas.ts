import { z } from 'zod';
import { ValidationError } from '../errors';
import { MAX_SEED } from '../utils/rng';

// Seeds arrive as JSON numbers or as query-string digits.
export const SeedSchema = z.union([
  z.number().int().min(0).max(MAX_SEED),
  z
    .string()
    .trim()
    .regex(/^\d+$/, 'Seed must be a non-negative integer')
    .transform(Number)
    .pipe(z.number().int().max(MAX_SEED)),
]);

export const GameModeSchema = z.enum(['casual', 'narrative', 'matched']);

export const VisibilitySchema = z.enum(['private', 'shared', 'public']);

// Dimensions stay loosely typed here; TableSize owns the rounding and limits.
const DimensionSchema = z.union([z.number(), z.string()]);

export const TableRequestSchema = z.union([
  z.enum(['standard', 'massive']),
  z.object({ widthCm: DimensionSchema, heightCm: DimensionSchema }).strict(),
  z
    .object({
      unit: z.enum(['mm', 'cm', 'in', 'ft']),
      width: DimensionSchema,
      height: DimensionSchema,
    })
    .strict(),
]);

// Generation request validation
// NOTE: Kept in sync with GenerationRequest in src/shared/types/scenario.ts.
// Shape records are left as unknown: the MapSpec builder reports their
// problems with field-level errors.
export const GenerationRequestSchema = z.object({
  mode: GameModeSchema,
  seed: SeedSchema.optional(),
  table: TableRequestSchema.default('standard'),
  explicitShapes: z.array(z.unknown()).optional(),
});

export type GenerationRequestInput = z.infer<typeof GenerationRequestSchema>;

export const CardIdentitySchema = z
  .object({
    id: z.string().trim().min(1, 'Card id is required'),
    ownerId: z.string().trim().min(1, 'Owner id is required'),
    visibility: VisibilitySchema.default('private'),
    sharedWith: z.array(z.string().trim().min(1)).max(200).default([]),
  })
  .refine((value) => value.sharedWith.length === 0 || value.visibility === 'shared', {
    message: 'sharedWith requires shared visibility',
    path: ['sharedWith'],
  });

export type CardIdentityInput = z.infer<typeof CardIdentitySchema>;

// ═══════════════════════════════════════════════════════════════════════════
// Content catalogue
// ═══════════════════════════════════════════════════════════════════════════

const PositiveMm = z.number().int().positive();

const EntryBaseSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'Entry ids are lowercase slugs'),
  name: z.string().min(1).max(120),
  description: z.string().max(2000).default(''),
  modes: z.array(GameModeSchema).min(1),
  score: z.number().int().default(0),
  riskFlags: z.array(z.string().min(1)).default([]),
});

const DeploymentLayoutSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('edges'),
    axis: z.enum(['north-south', 'east-west', 'any']),
    minDepthMm: PositiveMm,
    maxDepthMm: PositiveMm,
  }),
  z.object({
    kind: z.literal('corners'),
    diagonal: z.enum(['nw-se', 'ne-sw', 'any']),
    minRadiusMm: PositiveMm,
    maxRadiusMm: PositiveMm,
  }),
]);

const FootprintSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('circle'), minRadiusMm: PositiveMm, maxRadiusMm: PositiveMm }),
  z.object({
    kind: z.literal('rect'),
    minWidthMm: PositiveMm,
    maxWidthMm: PositiveMm,
    minHeightMm: PositiveMm,
    maxHeightMm: PositiveMm,
  }),
  z.object({
    kind: z.literal('polygon'),
    points: z
      .array(z.object({ x: z.number().int(), y: z.number().int() }))
      .min(3)
      .max(200),
  }),
]);

const CountLimitSchema = z
  .object({ min: z.number().int().min(0), max: z.number().int().min(0) })
  .refine((limit) => limit.min <= limit.max, { message: 'min must not exceed max' });

const ModeLimitsSchema = z.object({
  scenography: CountLimitSchema,
  objectives: CountLimitSchema,
  specialRules: CountLimitSchema,
  victoryPoints: CountLimitSchema,
  narrativeHooks: CountLimitSchema,
});

export const CatalogueSchema = z
  .object({
    version: z.literal(1),
    entries: z.object({
      deployment: z.array(EntryBaseSchema.extend({ layout: DeploymentLayoutSchema })),
      scenography: z.array(
        EntryBaseSchema.extend({
          footprint: FootprintSchema,
          allowOverlap: z.boolean().default(false),
          fill: z.string().max(64).optional(),
        })
      ),
      objective: z.array(
        EntryBaseSchema.extend({
          layout: z.enum(['centre', 'midline', 'scattered']),
          markers: z.number().int().min(1).max(6).default(1),
        })
      ),
      specialRule: z.array(
        EntryBaseSchema.extend({ incompatibleWith: z.array(z.string()).default([]) })
      ),
      victoryPoints: z.array(EntryBaseSchema.extend({ points: z.number().int().min(1).max(100) })),
      narrativeHook: z.array(EntryBaseSchema),
    }),
    limits: z.object({
      casual: ModeLimitsSchema,
      narrative: ModeLimitsSchema,
      matched: ModeLimitsSchema,
    }),
    scoring: z
      .object({
        targetBand: z.object({ min: z.number(), max: z.number() }),
        maxRerolls: z.number().int().min(0).max(100),
        maxDeviation: z.number().min(0),
        riskPenalty: z.number(),
      })
      .refine((s) => s.targetBand.min <= s.targetBand.max, {
        message: 'targetBand.min must not exceed targetBand.max',
        path: ['targetBand'],
      }),
  })
  .superRefine((catalogue, ctx) => {
    for (const [category, list] of Object.entries(catalogue.entries)) {
      const seen = new Set<string>();
      list.forEach((entry, index) => {
        if (seen.has(entry.id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate id ${entry.id}`,
            path: ['entries', category, index, 'id'],
          });
        }
        seen.add(entry.id);
      });
    }

    const ruleIds = new Set(catalogue.entries.specialRule.map((rule) => rule.id));
    catalogue.entries.specialRule.forEach((rule, index) => {
      rule.incompatibleWith.forEach((other) => {
        if (!ruleIds.has(other)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unknown special rule ${other}`,
            path: ['entries', 'specialRule', index, 'incompatibleWith'],
          });
        }
      });
    });

    catalogue.entries.deployment.forEach((entry, index) => {
      const [min, max] =
        entry.layout.kind === 'edges'
          ? [entry.layout.minDepthMm, entry.layout.maxDepthMm]
          : [entry.layout.minRadiusMm, entry.layout.maxRadiusMm];
      if (min > max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'Deployment range minimum exceeds maximum',
          path: ['entries', 'deployment', index, 'layout'],
        });
      }
    });

    catalogue.entries.scenography.forEach((entry, index) => {
      const f = entry.footprint;
      const inverted =
        (f.kind === 'circle' && f.minRadiusMm > f.maxRadiusMm) ||
        (f.kind === 'rect' && (f.minWidthMm > f.maxWidthMm || f.minHeightMm > f.maxHeightMm));
      if (inverted) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'Footprint range minimum exceeds maximum',
          path: ['entries', 'scenography', index, 'footprint'],
        });
      }
    });

    const matchedHooks = catalogue.limits.matched.narrativeHooks;
    if (matchedHooks.min > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Matched mode does not use narrative hooks',
        path: ['limits', 'matched', 'narrativeHooks', 'min'],
      });
    }
  });

export type CatalogueInput = z.infer<typeof CatalogueSchema>;

/**
 * Convert the first zod issue into a domain ValidationError naming the
 * offending field path.
 */
export function toValidationError(error: z.ZodError): ValidationError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'request';
  return new ValidationError(field, issue ? issue.message : 'Invalid input', {
    issues: error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
  });
}

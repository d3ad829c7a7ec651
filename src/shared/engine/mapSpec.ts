import type { ValidationError } from '../errors';
import { isValidationError } from '../errors';
import type { Result } from '../types/result';
import { err, ok } from '../types/result';
import type { Shape, ShapeLayer } from '../types/scenario';
import { validateShapes } from './shapeValidation';
import type { TableSize } from './tableSize';

/**
 * A validated, ordered, frozen collection of shapes on a table.
 *
 * Only {@link buildMapSpec} (and the never-throwing {@link tryBuildMapSpec})
 * create instances; edits go through {@link MapSpec.withShapes}, which
 * validates again and returns a new MapSpec.
 */
export class MapSpec {
  readonly table: TableSize;
  readonly shapes: readonly Shape[];

  private constructor(table: TableSize, shapes: readonly Shape[]) {
    this.table = table;
    this.shapes = Object.freeze([...shapes]);
    Object.freeze(this);
  }

  /** @internal Use {@link buildMapSpec}. */
  static validated(table: TableSize, rawShapes: unknown): MapSpec {
    return new MapSpec(table, validateShapes(rawShapes, table.widthMm, table.heightMm));
  }

  /** Replace the whole shape list, re-validating against the same table. */
  withShapes(rawShapes: unknown): MapSpec {
    return MapSpec.validated(this.table, rawShapes);
  }

  shapesOnLayer(layer: ShapeLayer): readonly Shape[] {
    return this.shapes.filter((shape) => shape.layer === layer);
  }

  toJSON(): { table: { widthMm: number; heightMm: number }; shapes: readonly Shape[] } {
    return { table: this.table.toJSON(), shapes: this.shapes };
  }
}

/**
 * Validate raw shapes against `table` and build a MapSpec.
 *
 * @throws ValidationError (or a subclass) on the first offending shape.
 */
export function buildMapSpec(table: TableSize, rawShapes: unknown): MapSpec {
  return MapSpec.validated(table, rawShapes);
}

/**
 * Same as {@link buildMapSpec}, but reports validation failures as a value.
 * Errors that are not validation errors still propagate.
 */
export function tryBuildMapSpec(
  table: TableSize,
  rawShapes: unknown
): Result<MapSpec, ValidationError> {
  try {
    return ok(buildMapSpec(table, rawShapes));
  } catch (error) {
    if (isValidationError(error)) {
      return err(error);
    }
    throw error;
  }
}

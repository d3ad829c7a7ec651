/**
 * Scenario Domain Errors - Structured error types for the scenario engine
 *
 * This module provides consistent error types for every layer of the engine
 * (table geometry, map validation, generation, rendering, catalogue loading).
 *
 * Error Categories:
 * - **Validation Errors**: malformed or out-of-bounds geometry / table input
 * - **Generation Errors**: a placement step ran out of candidates
 * - **Render Errors**: the renderer refused an out-of-contract MapSpec
 * - **Catalogue Errors**: the content catalogue could not be loaded
 * - **Access Errors**: an actor tried to act on a card it does not own
 *
 * Usage:
 * ```typescript
 * import { OutOfBoundsError, isScenarioError } from './ScenarioDomainErrors';
 *
 * throw new OutOfBoundsError('circle', 0, { cx: 10, r: 20 });
 *
 * if (isScenarioError(error)) {
 *   console.log(error.code, error.context);
 * }
 * ```
 *
 * The engine never maps these to transport status codes; that is the job of
 * whichever host embeds it.
 *
 * @module ScenarioDomainErrors
 */

import type { GenerationStep } from '../types/scenario';

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Enumeration of all scenario domain error codes.
 *
 * Error codes are prefixed by category:
 * - VALIDATION_* / SHAPE_*: input validation failures
 * - GENERATION_*: generator failures
 * - RENDER_*: renderer refusals
 * - CATALOGUE_*: content catalogue problems
 * - ACCESS_*: authorization failures
 */
export enum ScenarioErrorCode {
  // Validation Errors
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  SHAPE_UNKNOWN_TYPE = 'SHAPE_UNKNOWN_TYPE',
  SHAPE_INVALID_COORDINATE = 'SHAPE_INVALID_COORDINATE',
  SHAPE_OUT_OF_BOUNDS = 'SHAPE_OUT_OF_BOUNDS',
  SHAPE_COUNT_EXCEEDED = 'SHAPE_COUNT_EXCEEDED',
  SHAPE_POLYGON_POINT_COUNT = 'SHAPE_POLYGON_POINT_COUNT',

  // Generation Errors
  GENERATION_FAILED = 'GENERATION_FAILED',

  // Render Errors
  RENDER_REFUSED = 'RENDER_REFUSED',

  // Catalogue Errors
  CATALOGUE_INVALID = 'CATALOGUE_INVALID',

  // Access Errors
  ACCESS_FORBIDDEN = 'ACCESS_FORBIDDEN',

  // Internal Errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all scenario domain errors.
 *
 * Provides:
 * - Structured error code
 * - Context for debugging
 * - Serialization for API responses
 */
export class ScenarioError extends Error {
  /** Error code for programmatic handling */
  readonly code: ScenarioErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  constructor(code: ScenarioErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'ScenarioError';
    this.code = code;
    this.context = context;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, ScenarioError.prototype);
  }

  /** Serialize to a JSON-safe object */
  toJSON(): ScenarioErrorJSON {
    return {
      error: true,
      code: this.code,
      name: this.name,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * JSON representation of a ScenarioError.
 */
export interface ScenarioErrorJSON {
  error: true;
  code: string;
  name: string;
  message: string;
  context: Record<string, unknown>;
}

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION ERRORS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Malformed or out-of-bounds input. Always names the offending field.
 */
export class ValidationError extends ScenarioError {
  /** Field that failed validation (e.g. `width`, `shapes[3].cx`). */
  readonly field: string;

  constructor(
    field: string,
    message: string,
    context: Record<string, unknown> = {},
    code: ScenarioErrorCode = ScenarioErrorCode.VALIDATION_FAILED
  ) {
    super(code, message, { field, ...context });
    this.name = 'ValidationError';
    this.field = field;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * A shape carries a `type` tag outside the supported set.
 */
export class UnknownShapeTypeError extends ValidationError {
  constructor(index: number, shapeType: unknown) {
    super(
      `shapes[${index}].type`,
      `unknown shape type: ${String(shapeType)}`,
      { index, shapeType: String(shapeType) },
      ScenarioErrorCode.SHAPE_UNKNOWN_TYPE
    );
    this.name = 'UnknownShapeTypeError';
    Object.setPrototypeOf(this, UnknownShapeTypeError.prototype);
  }
}

/**
 * A numeric shape field cannot be coerced to an integer, or is not positive
 * where a size is required.
 */
export class InvalidCoordinateError extends ValidationError {
  constructor(field: string, value: unknown, reason = 'must be an integer') {
    super(
      field,
      `${field} ${reason}, got ${describeValue(value)}`,
      { value: describeValue(value) },
      ScenarioErrorCode.SHAPE_INVALID_COORDINATE
    );
    this.name = 'InvalidCoordinateError';
    Object.setPrototypeOf(this, InvalidCoordinateError.prototype);
  }
}

/**
 * A shape extends beyond `[0, widthMm] × [0, heightMm]`.
 */
export class OutOfBoundsError extends ValidationError {
  constructor(shapeType: string, index: number, context: Record<string, unknown> = {}) {
    super(
      `shapes[${index}]`,
      `${shapeType} at index ${index} is out of table bounds`,
      { shapeType, index, ...context },
      ScenarioErrorCode.SHAPE_OUT_OF_BOUNDS
    );
    this.name = 'OutOfBoundsError';
    Object.setPrototypeOf(this, OutOfBoundsError.prototype);
  }
}

/**
 * More shapes than a MapSpec may hold.
 */
export class ShapeCountExceededError extends ValidationError {
  constructor(count: number, max: number) {
    super(
      'shapes',
      `too many shapes: ${count} (max ${max})`,
      { count, max },
      ScenarioErrorCode.SHAPE_COUNT_EXCEEDED
    );
    this.name = 'ShapeCountExceededError';
    Object.setPrototypeOf(this, ShapeCountExceededError.prototype);
  }
}

/**
 * A polygon with fewer than the minimum or more than the maximum vertices.
 */
export class PolygonPointCountError extends ValidationError {
  constructor(index: number, count: number, min: number, max: number) {
    super(
      `shapes[${index}].points`,
      `polygon at index ${index} has ${count} points (allowed ${min}..${max})`,
      { index, count, min, max },
      ScenarioErrorCode.SHAPE_POLYGON_POINT_COUNT
    );
    this.name = 'PolygonPointCountError';
    Object.setPrototypeOf(this, PolygonPointCountError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// GENERATION / RENDER / CATALOGUE / ACCESS ERRORS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A generation step exhausted its candidates.
 */
export class GenerationError extends ScenarioError {
  readonly step: GenerationStep;

  constructor(step: GenerationStep, message: string, context: Record<string, unknown> = {}) {
    super(ScenarioErrorCode.GENERATION_FAILED, `${step}: ${message}`, { step, ...context });
    this.name = 'GenerationError';
    this.step = step;
    Object.setPrototypeOf(this, GenerationError.prototype);
  }
}

/**
 * The renderer's own checks failed; no markup is produced.
 */
export class RenderRefusedError extends ScenarioError {
  constructor(reason: string, context: Record<string, unknown> = {}) {
    super(ScenarioErrorCode.RENDER_REFUSED, `refusing to render: ${reason}`, {
      reason,
      ...context,
    });
    this.name = 'RenderRefusedError';
    Object.setPrototypeOf(this, RenderRefusedError.prototype);
  }
}

/**
 * The content catalogue is missing or malformed.
 */
export class CatalogueError extends ScenarioError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(ScenarioErrorCode.CATALOGUE_INVALID, message, context);
    this.name = 'CatalogueError';
    Object.setPrototypeOf(this, CatalogueError.prototype);
  }
}

/**
 * An actor attempted an operation it is not permitted to perform.
 */
export class ForbiddenError extends ScenarioError {
  constructor(actorId: string, action: string, context: Record<string, unknown> = {}) {
    super(ScenarioErrorCode.ACCESS_FORBIDDEN, `actor ${actorId} is not allowed to ${action}`, {
      actorId,
      action,
      ...context,
    });
    this.name = 'ForbiddenError';
    Object.setPrototypeOf(this, ForbiddenError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

function describeValue(value: unknown): string {
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (value === null || value === undefined) {
    return String(value);
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return typeof value;
}

/**
 * Check if an error is a ScenarioError.
 */
export function isScenarioError(error: unknown): error is ScenarioError {
  return error instanceof ScenarioError;
}

/**
 * Check if an error is a ValidationError (including its specializations).
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Wrap an unknown error in a ScenarioError.
 */
export function wrapError(error: unknown, context: Record<string, unknown> = {}): ScenarioError {
  if (isScenarioError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new ScenarioError(ScenarioErrorCode.INTERNAL_ERROR, message, {
    ...context,
    originalStack: stack,
  });
}

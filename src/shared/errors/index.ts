/**
 * Shared Errors Module
 *
 * This module exports structured error types for consistent error handling
 * across the scenario engine.
 *
 * @module errors
 */

export {
  // Error codes
  ScenarioErrorCode,
  // Base class
  ScenarioError,
  type ScenarioErrorJSON,
  // Validation errors
  ValidationError,
  UnknownShapeTypeError,
  InvalidCoordinateError,
  OutOfBoundsError,
  ShapeCountExceededError,
  PolygonPointCountError,
  // Other errors
  GenerationError,
  RenderRefusedError,
  CatalogueError,
  ForbiddenError,
  // Utilities
  isScenarioError,
  isValidationError,
  wrapError,
} from './ScenarioDomainErrors';

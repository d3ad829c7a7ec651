import {
  ForbiddenError,
  GenerationError,
  InvalidCoordinateError,
  OutOfBoundsError,
  RenderRefusedError,
  ScenarioError,
  ScenarioErrorCode,
  ShapeCountExceededError,
  ValidationError,
  isScenarioError,
  isValidationError,
  wrapError,
} from '../../src/shared/errors';

describe('ScenarioDomainErrors', () => {
  describe('class hierarchy', () => {
    it('keeps the prototype chain for subclasses', () => {
      const error = new OutOfBoundsError('circle', 2, { cx: 1190, r: 20 });

      expect(error).toBeInstanceOf(OutOfBoundsError);
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toBeInstanceOf(ScenarioError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('OutOfBoundsError');
    });

    it('names the offending field on validation errors', () => {
      const error = new InvalidCoordinateError('shapes[0].cx', 12.5);

      expect(error.field).toBe('shapes[0].cx');
      expect(error.code).toBe(ScenarioErrorCode.SHAPE_INVALID_COORDINATE);
      expect(error.message).toBe('shapes[0].cx must be an integer, got 12.5');
      expect(error.context).toEqual({ field: 'shapes[0].cx', value: '12.5' });
    });

    it('describes string values with quotes', () => {
      const error = new InvalidCoordinateError('shapes[1].r', 'abc');

      expect(error.message).toBe('shapes[1].r must be an integer, got "abc"');
    });

    it('uses the count code for too many shapes', () => {
      const error = new ShapeCountExceededError(101, 100);

      expect(error.code).toBe(ScenarioErrorCode.SHAPE_COUNT_EXCEEDED);
      expect(error.field).toBe('shapes');
      expect(error.message).toBe('too many shapes: 101 (max 100)');
    });
  });

  describe('GenerationError', () => {
    it('carries the failed step in the message, property and context', () => {
      const error = new GenerationError('objectives', 'no candidate fits', { slot: 1 });

      expect(error.step).toBe('objectives');
      expect(error.message).toBe('objectives: no candidate fits');
      expect(error.context).toEqual({ step: 'objectives', slot: 1 });
    });
  });

  describe('toJSON', () => {
    it('serializes code, name, message and context', () => {
      const error = new RenderRefusedError('too many shapes', { count: 101 });

      expect(error.toJSON()).toEqual({
        error: true,
        code: 'RENDER_REFUSED',
        name: 'RenderRefusedError',
        message: 'refusing to render: too many shapes',
        context: { reason: 'too many shapes', count: 101 },
      });
    });

    it('round-trips through JSON.stringify', () => {
      const error = new ForbiddenError('user-2', 'regenerate', { cardId: 'card-1' });
      const parsed: unknown = JSON.parse(JSON.stringify(error));

      expect(parsed).toEqual({
        error: true,
        code: 'ACCESS_FORBIDDEN',
        name: 'ForbiddenError',
        message: 'actor user-2 is not allowed to regenerate',
        context: { actorId: 'user-2', action: 'regenerate', cardId: 'card-1' },
      });
    });
  });

  describe('type guards', () => {
    it('recognizes scenario and validation errors', () => {
      expect(isScenarioError(new GenerationError('scoring', 'x'))).toBe(true);
      expect(isScenarioError(new Error('plain'))).toBe(false);
      expect(isValidationError(new OutOfBoundsError('rect', 0))).toBe(true);
      expect(isValidationError(new GenerationError('scoring', 'x'))).toBe(false);
      expect(isValidationError('not an error')).toBe(false);
    });
  });

  describe('wrapError', () => {
    it('returns scenario errors unchanged', () => {
      const original = new ValidationError('seed', 'bad seed');
      expect(wrapError(original)).toBe(original);
    });

    it('wraps plain errors as internal errors with context', () => {
      const wrapped = wrapError(new TypeError('boom'), { operation: 'render' });

      expect(wrapped.code).toBe(ScenarioErrorCode.INTERNAL_ERROR);
      expect(wrapped.message).toBe('boom');
      expect(wrapped.context.operation).toBe('render');
      expect(typeof wrapped.context.originalStack).toBe('string');
    });

    it('wraps non-error values by their string form', () => {
      const wrapped = wrapError('just text');

      expect(wrapped.message).toBe('just text');
      expect(wrapped.context.originalStack).toBeUndefined();
    });
  });
});

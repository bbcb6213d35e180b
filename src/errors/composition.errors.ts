import { ParameterKind } from '../interface/parameter-tree.interface';

export type CompositionErrorCode =
  | 'MissingField'
  | 'PathNotFound'
  | 'TypeMismatch'
  | 'InvalidPath';

/**
 * Base class of every failure raised by the composition engine.
 *
 * Callers can branch on `code` instead of `instanceof` when errors cross a
 * serialization boundary.
 */
export abstract class CompositionError extends Error {
  abstract readonly code: CompositionErrorCode;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A required input field is absent: a service configuration key, a chart
 * identity field, the merged parameter tree or instance metadata.
 */
export class MissingFieldError extends CompositionError {
  readonly code = 'MissingField';

  constructor(
    readonly field: string,
    context?: string,
  ) {
    super(
      context
        ? `${context}: required field '${field}' is missing`
        : `Required field '${field}' is missing`,
    );
  }
}

/**
 * A path lookup could not resolve one of its segments.
 */
export class PathNotFoundError extends CompositionError {
  readonly code = 'PathNotFound';

  constructor(
    readonly path: string,
    readonly segment: string,
  ) {
    super(`Path '${path}': key '${segment}' not found`);
  }
}

/**
 * A traversal step expected a mapping and found something else.
 */
export class TypeMismatchError extends CompositionError {
  readonly code = 'TypeMismatch';

  constructor(
    readonly path: string,
    readonly segment: string,
    readonly expected: ParameterKind,
    readonly actual: ParameterKind,
  ) {
    super(
      `Path '${path}': expected ${expected} at '${segment}', got ${actual}`,
    );
  }
}

/**
 * A path string is empty or contains an empty segment.
 */
export class InvalidPathError extends CompositionError {
  readonly code = 'InvalidPath';

  constructor(
    readonly path: string,
    readonly reason: string,
  ) {
    super(`Invalid path '${path}': ${reason}`);
  }
}

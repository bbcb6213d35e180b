import {
  InvalidPathError,
  PathNotFoundError,
  TypeMismatchError,
} from '../errors';
import {
  ParameterTree,
  ParameterValue,
} from '../interface/parameter-tree.interface';
import { describeKind, isParameterTree } from './parameter-tree.util';

export interface PathReadOptions {
  /**
   * Leading segment to ignore, so that a path may echo the name of the
   * document root (e.g. `spec.size.cpu` against the contents of `spec`).
   */
  rootSegment?: string;
}

const RESERVED_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor']);

/**
 * Reads and writes values inside nested parameter trees using
 * dot-delimited paths such as `master.resources.requests.cpu`.
 */
export class PathAccessorUtil {
  /**
   * Resolve the value at `path`. An empty path resolves to the tree itself.
   *
   * @throws PathNotFoundError if a segment is missing
   * @throws TypeMismatchError if a segment other than the last holds a
   * value that is not a mapping
   *
   * @example
   * ```typescript
   * PathAccessorUtil.get({ size: { cpu: '500m' } }, 'spec.size.cpu', {
   *   rootSegment: 'spec',
   * }); // '500m'
   * ```
   */
  static get(
    tree: ParameterTree,
    path: string,
    options: PathReadOptions = {},
  ): ParameterValue {
    if (path === '') {
      return tree;
    }

    const segments = path.split('.');
    let current: ParameterValue = tree;
    let holder = '';

    for (let i = 0; i < segments.length; i++) {
      const segment = segments[i];
      if (i === 0 && segment === options.rootSegment) {
        continue;
      }

      if (!isParameterTree(current)) {
        throw new TypeMismatchError(
          path,
          holder,
          'mapping',
          describeKind(current),
        );
      }
      if (!Object.prototype.hasOwnProperty.call(current, segment)) {
        throw new PathNotFoundError(path, segment);
      }

      current = current[segment];
      holder = segment;
    }

    return current;
  }

  /**
   * Whether `path` resolves to a value. Type mismatches still throw.
   */
  static has(
    tree: ParameterTree,
    path: string,
    options: PathReadOptions = {},
  ): boolean {
    try {
      this.get(tree, path, options);
      return true;
    } catch (error) {
      if (error instanceof PathNotFoundError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Assign `value` at `path`, creating intermediate mappings as needed and
   * overwriting whatever the last segment held.
   *
   * @throws InvalidPathError if the path is empty or has an empty segment
   * @throws TypeMismatchError if an intermediate segment holds a value that
   * is not a mapping
   */
  static set(tree: ParameterTree, path: string, value: ParameterValue): void {
    const segments = this.splitPath(path);
    const last = segments[segments.length - 1];
    let current = tree;

    for (const segment of segments.slice(0, -1)) {
      if (!Object.prototype.hasOwnProperty.call(current, segment)) {
        current[segment] = {};
      }

      const next = current[segment];
      if (!isParameterTree(next)) {
        throw new TypeMismatchError(
          path,
          segment,
          'mapping',
          describeKind(next),
        );
      }
      current = next;
    }

    current[last] = value;
  }

  /**
   * Split a writable path into segments.
   *
   * @throws InvalidPathError if the path is empty, has an empty segment or
   * names a reserved object key
   */
  static splitPath(path: string): string[] {
    if (path.trim() === '') {
      throw new InvalidPathError(path, 'path is empty');
    }

    const segments = path.split('.');
    if (segments.some((segment) => segment === '')) {
      throw new InvalidPathError(path, 'path contains an empty segment');
    }

    const reserved = segments.find((segment) =>
      RESERVED_SEGMENTS.has(segment),
    );
    if (reserved !== undefined) {
      throw new InvalidPathError(path, `segment '${reserved}' is reserved`);
    }

    return segments;
  }
}

import {
  ParameterKind,
  ParameterTree,
  ParameterValue,
} from '../interface/parameter-tree.interface';

export function isParameterTree(
  value: ParameterValue | undefined,
): value is ParameterTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function describeKind(value: ParameterValue): ParameterKind {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'sequence';
  switch (typeof value) {
    case 'boolean':
      return 'boolean';
    case 'number':
      return 'number';
    case 'string':
      return 'string';
    default:
      return 'mapping';
  }
}

/**
 * Validate an untyped value (typically `JSON.parse` output) as a parameter
 * value. Returns undefined for anything JSON cannot represent, such as
 * functions, `undefined` or non-finite numbers, at any depth.
 */
export function toParameterValue(value: unknown): ParameterValue | undefined {
  if (
    value === null ||
    typeof value === 'boolean' ||
    typeof value === 'string'
  ) {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (Array.isArray(value)) {
    const items: ParameterValue[] = [];
    for (const item of value) {
      const converted = toParameterValue(item);
      if (converted === undefined) return undefined;
      items.push(converted);
    }
    return items;
  }
  if (typeof value === 'object') {
    const tree: ParameterTree = {};
    for (const [key, entry] of Object.entries(value)) {
      const converted = toParameterValue(entry);
      if (converted === undefined) return undefined;
      tree[key] = converted;
    }
    return tree;
  }
  return undefined;
}

export function toParameterTree(value: unknown): ParameterTree | undefined {
  const converted = toParameterValue(value);
  return isParameterTree(converted) ? converted : undefined;
}

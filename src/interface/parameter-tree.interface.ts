/**
 * A single value inside an untyped, nested configuration document.
 *
 * Mirrors the shape of Helm values and Kubernetes resource specs: scalars,
 * ordered sequences and string-keyed mappings, nested to any depth.
 */
export type ParameterValue =
  | null
  | boolean
  | number
  | string
  | ParameterValue[]
  | ParameterTree;

/**
 * String-keyed mapping of parameter values.
 *
 * Used for user specifications, default Helm values, merged values and
 * observed resource trees alike. Key order carries no meaning.
 *
 * @example
 * ```typescript
 * const values: ParameterTree = {
 *   replicaCount: 3,
 *   auth: { enabled: true },
 *   master: { resources: { requests: { cpu: '500m' } } },
 * };
 * ```
 */
export interface ParameterTree {
  [key: string]: ParameterValue;
}

/**
 * Kind of a parameter value, as reported in type mismatch diagnostics.
 */
export type ParameterKind =
  | 'null'
  | 'boolean'
  | 'number'
  | 'string'
  | 'sequence'
  | 'mapping';

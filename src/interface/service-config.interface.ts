import { ParameterTree, ParameterValue } from './parameter-tree.interface';

/**
 * Helm chart coordinates a service is deployed from.
 */
export interface ChartIdentity {
  /** Chart repository URL (e.g., 'https://charts.bitnami.com/bitnami') */
  repository: string;
  /** Chart name within the repository (e.g., 'redis') */
  name: string;
  /** Version deployed when the user does not pin one */
  defaultVersion: string;
}

/**
 * Mapping from a dot-delimited path in the user specification to a
 * dot-delimited path in the Helm values.
 *
 * Destinations are kept untyped as they arrive from the service
 * configuration document; non-string destinations are skipped at merge time.
 *
 * @example
 * ```typescript
 * {
 *   'spec.size.cpu': 'master.resources.requests.cpu',
 *   'spec.replicas': 'replica.replicaCount',
 * }
 * ```
 */
export type FieldMapping = Readonly<Record<string, ParameterValue>>;

/**
 * One key of the generated connection secret and the template its value is
 * rendered from. Templates may reference `${instanceName}`, `${namespace}`
 * and `${password}`.
 */
export interface SecretFieldTemplate {
  key: string;
  value: string;
}

/**
 * Declares how the connection secret of a service instance is produced and
 * where the generated password and the secret name are fed into the chart.
 *
 * @example
 * ```typescript
 * {
 *   fields: [
 *     { key: 'host', value: '${instanceName}-master.${namespace}.svc' },
 *     { key: 'password', value: '${password}' },
 *   ],
 *   passwordPath: 'auth.password',
 *   existingSecretPath: 'auth.existingSecret',
 * }
 * ```
 */
export interface ConnectionSecretTemplate {
  /** Ordered key/template pairs rendered into the secret */
  fields: SecretFieldTemplate[];

  /**
   * Helm values path that receives the generated password.
   * When set, the password is also read back from the observed release.
   */
  passwordPath?: string;

  /**
   * Helm values path that receives the name of the connection secret,
   * for charts that consume an externally managed secret.
   */
  existingSecretPath?: string;
}

/**
 * Validated service configuration.
 *
 * Raw documents carry the keys `chart`, `defaultHelmValues`, `mapping` and
 * `connectionSecret`; all four are mandatory. A `connectionSecret` of `null`
 * declares that the service publishes no connection secret.
 */
export interface ServiceConfig {
  chart: ChartIdentity;
  defaultParameterTree: ParameterTree;
  fieldMapping: FieldMapping;
  connectionSecret: ConnectionSecretTemplate | null;
}

/**
 * Output of the merge stage and sole input to resource synthesis.
 */
export interface MergedConfig {
  chart: ChartIdentity;
  parameterTree: ParameterTree;
  connectionSecret: ConnectionSecretTemplate | null;
}

/**
 * Where rendered connection values are surfaced.
 *
 * - `both`: a Secret descriptor is emitted and the values are returned
 *   as connection details of the response
 * - `descriptor`: only the Secret descriptor carries the values
 * - `response`: only the response carries the values; no Secret descriptor
 */
export type ConnectionDetailsTarget = 'both' | 'descriptor' | 'response';

/**
 * Configuration options for the ServiceComposerModule.
 *
 * @example
 * Inline service configurations only:
 * ```typescript
 * {}
 * ```
 *
 * @example
 * With a service catalog kept in Parameter Store:
 * ```typescript
 * {
 *   awsRegion: 'us-east-1',
 *   serviceCatalogPath: '/platform/services',
 *   continueOnError: false,
 * }
 * ```
 *
 * @example
 * Connection values returned to the caller only:
 * ```typescript
 * {
 *   connectionDetailsTarget: 'response',
 *   passwordLength: 48,
 * }
 * ```
 */
export interface ModuleOptions {
  /**
   * AWS region of the service catalog.
   * Required when `serviceCatalogPath` is set.
   *
   * @example 'us-east-1', 'eu-west-1'
   */
  awsRegion?: string;

  /**
   * Parameter Store path holding one JSON service configuration per
   * parameter. The last path segment is the service name, so
   * `/platform/services/redis` registers the service `redis`.
   * When omitted, no catalog is loaded and only inline service
   * configurations can be composed.
   */
  serviceCatalogPath?: string;

  /**
   * Whether to continue with an empty catalog if fetching it fails.
   *
   * @default false
   */
  continueOnError?: boolean;

  /**
   * Length of generated passwords.
   *
   * @default 32
   */
  passwordLength?: number;

  /**
   * Where rendered connection details go. Under 'response' the Secret
   * descriptor is still emitted when it is the only place the password is
   * persisted.
   *
   * @default 'both'
   */
  connectionDetailsTarget?: ConnectionDetailsTarget;

  /**
   * Log merged values at debug level. Values under sensitive-looking keys
   * are masked.
   *
   * @default false
   */
  enableValueLogging?: boolean;

  /**
   * TTL returned with every composition response.
   *
   * @default 60
   */
  responseTtlSeconds?: number;

  /**
   * Value of the `app.kubernetes.io/managed-by` label on every generated
   * descriptor (Helm release and connection secret).
   *
   * @default 'crossplane'
   */
  managedBy?: string;
}

/**
 * Dependency injection token for the service catalog provider.
 * Resolves to the raw Parameter Store entries fetched at start-up.
 */
export const SERVICE_CATALOG_PROVIDER = 'SERVICE_CATALOG_PROVIDER';

/**
 * Dependency injection token for the resolved module options.
 */
export const SERVICE_COMPOSER_OPTIONS = 'SERVICE_COMPOSER_OPTIONS';

/**
 * Role of the Helm release among observed and desired resources.
 */
export const DEPLOYMENT_ROLE = 'helmrelease';

/**
 * Role of the connection secret among observed and desired resources.
 */
export const SECRET_ROLE = 'secret';

/**
 * Leading path segment ignored when reading mapped values from a user spec,
 * so that mappings may be written as `spec.size.cpu` or `size.cpu`.
 */
export const USER_SPEC_ROOT_SEGMENT = 'spec';

/**
 * Path inside an observed Helm release under which the chart values live.
 */
export const RELEASE_VALUES_PATH = 'spec.forProvider.values';

export const DEFAULT_PASSWORD_LENGTH = 32;

export const DEFAULT_RESPONSE_TTL_SECONDS = 60;

export const DEFAULT_MANAGED_BY = 'crossplane';

/**
 * Configuration key for the AWS region of the service catalog.
 * Expected value: AWS region string (e.g., 'us-east-1')
 */
export const COMPOSER_AWS_REGION = 'composer.awsRegion';

/**
 * Configuration key for the Parameter Store path of the service catalog.
 * Expected value: Path string starting with '/' (e.g., '/platform/services')
 */
export const COMPOSER_SERVICE_CATALOG_PATH = 'composer.serviceCatalogPath';

/**
 * Configuration key for the continue-on-error flag.
 * Expected value: Boolean indicating whether to start with an empty catalog on fetch failure
 */
export const COMPOSER_CONTINUE_ON_ERROR = 'composer.continueOnError';

/**
 * Configuration key for the generated password length.
 * Expected value: Positive integer
 */
export const COMPOSER_PASSWORD_LENGTH = 'composer.passwordLength';

/**
 * Configuration key for where connection values are surfaced.
 * Expected value: 'both', 'descriptor' or 'response'
 */
export const COMPOSER_CONNECTION_DETAILS_TARGET =
  'composer.connectionDetailsTarget';

/**
 * Configuration key for debug logging of merged values.
 * Expected value: Boolean
 */
export const COMPOSER_ENABLE_VALUE_LOGGING = 'composer.enableValueLogging';

/**
 * Configuration key for the composition response TTL.
 * Expected value: Number of seconds
 */
export const COMPOSER_RESPONSE_TTL_SECONDS = 'composer.responseTtlSeconds';

/**
 * Configuration key for the managed-by label value.
 * Expected value: String
 */
export const COMPOSER_MANAGED_BY = 'composer.managedBy';

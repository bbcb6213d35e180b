import { MissingFieldError, TypeMismatchError } from '../errors';
import {
  ConnectionSecretTemplate,
  SecretFieldTemplate,
  ServiceConfig,
} from '../interface/service-config.interface';
import {
  ParameterTree,
  ParameterValue,
} from '../interface/parameter-tree.interface';
import { ConnectionDetailsTarget } from '../interface/module-options.interface';
import { describeKind, isParameterTree } from './parameter-tree.util';

/**
 * Utility class for service configuration documents.
 * Provides parsing, validation, logging and error message helpers.
 */
export class ServiceConfigUtil {
  /**
   * Top-level keys every service configuration must declare.
   */
  static readonly requiredKeys = [
    'chart',
    'defaultHelmValues',
    'mapping',
    'connectionSecret',
  ] as const;

  /**
   * List of sensitive keywords that should be masked in logs.
   * Values stored under keys containing these keywords are hidden.
   */
  private static readonly sensitiveKeywords = [
    'password',
    'passwd',
    'pwd',
    'secret',
    'key',
    'token',
    'auth',
    'credential',
    'api_key',
    'apikey',
    'access_key',
    'private',
    'salt',
  ];

  /**
   * Parse and validate a raw service configuration document.
   *
   * Accepts `chart.repository` or `chart.repo`, `fields[].value` or
   * `fields[].valueTemplate`, and the injection paths under either their
   * short (`passwordPath`, `existingSecretPath`) or long
   * (`passwordInjectionPath`, `existingSecretNameInjectionPath`) names.
   *
   * @param raw - Service configuration as found in the composition input or
   * the service catalog
   * @param context - Prefix for error messages (e.g. the service name)
   * @throws MissingFieldError if a mandatory key or chart field is absent
   * @throws TypeMismatchError if a mandatory key holds the wrong kind of value
   *
   * @example
   * ```typescript
   * const config = ServiceConfigUtil.parse({
   *   chart: { repository: 'r', name: 'redis', defaultVersion: '1.0' },
   *   defaultHelmValues: { auth: { enabled: true } },
   *   mapping: { 'spec.replicas': 'replicaCount' },
   *   connectionSecret: null,
   * });
   * ```
   */
  static parse(raw: ParameterTree, context = 'service config'): ServiceConfig {
    for (const key of this.requiredKeys) {
      if (!Object.prototype.hasOwnProperty.call(raw, key)) {
        throw new MissingFieldError(key, context);
      }
    }

    const chart = this.requireMapping(raw, 'chart');
    const repository = this.firstString(chart, 'repository', 'repo');
    if (repository === undefined) {
      throw new MissingFieldError('chart.repository', context);
    }
    const name = this.firstString(chart, 'name');
    if (name === undefined) {
      throw new MissingFieldError('chart.name', context);
    }
    const defaultVersion = this.firstString(chart, 'defaultVersion');
    if (defaultVersion === undefined) {
      throw new MissingFieldError('chart.defaultVersion', context);
    }

    const connectionSecret = raw.connectionSecret;
    if (connectionSecret !== null && !isParameterTree(connectionSecret)) {
      throw new TypeMismatchError(
        'connectionSecret',
        'connectionSecret',
        'mapping',
        describeKind(connectionSecret),
      );
    }

    return {
      chart: { repository, name, defaultVersion },
      defaultParameterTree: this.requireMapping(raw, 'defaultHelmValues'),
      fieldMapping: this.requireMapping(raw, 'mapping'),
      connectionSecret:
        connectionSecret === null
          ? null
          : this.parseConnectionSecret(connectionSecret),
    };
  }

  /**
   * Parse the `connectionSecret` section. Field entries that are not
   * mappings or have no key are dropped; a missing template renders as an
   * empty value.
   */
  static parseConnectionSecret(raw: ParameterTree): ConnectionSecretTemplate {
    const fields: SecretFieldTemplate[] = [];
    const rawFields = raw.fields;

    if (Array.isArray(rawFields)) {
      for (const entry of rawFields) {
        if (!isParameterTree(entry)) continue;
        const key = this.firstString(entry, 'key');
        if (key === undefined) continue;
        fields.push({
          key,
          value: this.firstString(entry, 'value', 'valueTemplate') ?? '',
        });
      }
    }

    const template: ConnectionSecretTemplate = { fields };
    const passwordPath = this.firstString(
      raw,
      'passwordPath',
      'passwordInjectionPath',
    );
    if (passwordPath !== undefined) {
      template.passwordPath = passwordPath;
    }
    const existingSecretPath = this.firstString(
      raw,
      'existingSecretPath',
      'existingSecretNameInjectionPath',
    );
    if (existingSecretPath !== undefined) {
      template.existingSecretPath = existingSecretPath;
    }
    return template;
  }

  /**
   * Parse a configuration value as boolean.
   * Handles both boolean and string values from ConfigService.
   *
   * @example
   * ```typescript
   * ServiceConfigUtil.parseBoolean(true); // true
   * ServiceConfigUtil.parseBoolean('true'); // true
   * ServiceConfigUtil.parseBoolean('anything'); // false
   * ```
   */
  static parseBoolean(value: unknown): boolean {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') return value.toLowerCase() === 'true';
    return false;
  }

  /**
   * Parse a configuration value as a positive number, falling back when the
   * value is absent or not a positive finite number.
   */
  static parseNumber(value: unknown, fallback: number): number {
    const parsed =
      typeof value === 'number'
        ? value
        : typeof value === 'string' && value.trim() !== ''
          ? Number(value)
          : NaN;
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
  }

  /**
   * Parse the connection details target, defaulting to 'both' for absent or
   * unrecognized values.
   */
  static parseConnectionDetailsTarget(value: unknown): ConnectionDetailsTarget {
    if (value === 'descriptor' || value === 'response') {
      return value;
    }
    return 'both';
  }

  /**
   * Determines if a key should have its value masked in logs.
   *
   * @example
   * ```typescript
   * ServiceConfigUtil.shouldMaskValue('auth.password'); // true
   * ServiceConfigUtil.shouldMaskValue('replicaCount'); // false
   * ```
   */
  static shouldMaskValue(key: string): boolean {
    const lowerKey = key.toLowerCase();
    return this.sensitiveKeywords.some((keyword) => lowerKey.includes(keyword));
  }

  static maskValue(value: string, key: string): string {
    return this.shouldMaskValue(key) ? '***MASKED***' : value;
  }

  /**
   * Copy of `tree` with every scalar under a sensitive key replaced by
   * `***MASKED***`. Mappings under sensitive keys are walked, not hidden.
   */
  static maskTree(tree: ParameterTree): ParameterTree {
    const masked: ParameterTree = {};
    for (const [key, value] of Object.entries(tree)) {
      masked[key] = this.maskEntry(key, value);
    }
    return masked;
  }

  /**
   * Builds a detailed error message for a failed catalog fetch from AWS SSM
   * Parameter Store, with remediation guidance for common failures.
   *
   * @param error - The caught error object
   * @param awsRegion - AWS region being accessed
   * @param catalogPath - Parameter Store path being accessed
   */
  static buildErrorMessage(
    error: unknown,
    awsRegion: string,
    catalogPath: string,
  ): string {
    const baseMessage = `Failed to fetch service catalog from AWS SSM Parameter Store. Region: '${awsRegion}', Path: '${catalogPath}'`;
    const name = this.readErrorField(error, 'name');
    const code = this.readErrorField(error, 'code');
    const message = this.readErrorField(error, 'message');

    if (name === 'AccessDeniedException') {
      return (
        `${baseMessage} - Access Denied. ` +
        `Ensure the IAM role/user has 'ssm:GetParametersByPath' permission for the catalog path. ` +
        `Error: ${message}`
      );
    }

    if (name === 'ParameterNotFound') {
      return (
        `${baseMessage} - Parameter not found. ` +
        `Verify the catalog path exists in AWS Systems Manager Parameter Store. ` +
        `Error: ${message}`
      );
    }

    if (name === 'InvalidParameterException') {
      return (
        `${baseMessage} - Invalid parameter. ` +
        `Check that the path format is correct (must start with '/'). ` +
        `Error: ${message}`
      );
    }

    if (name === 'ThrottlingException') {
      return (
        `${baseMessage} - Request throttled. ` +
        `AWS SSM API rate limit exceeded. Reduce how often the catalog is refreshed. ` +
        `Error: ${message}`
      );
    }

    if (code === 'ENOTFOUND' || code === 'ETIMEDOUT') {
      return (
        `${baseMessage} - Network error. ` +
        `Unable to reach AWS SSM service. Check network connectivity and AWS service status. ` +
        `Error: ${message}`
      );
    }

    if (message?.includes('Missing credentials')) {
      return (
        `${baseMessage} - Missing AWS credentials. ` +
        `Configure credentials via environment variables, AWS credentials file, or IAM role. ` +
        `Error: ${message}`
      );
    }

    return `${baseMessage} - ${message || 'Unknown error occurred'}`;
  }

  /**
   * Validates the catalog location before any AWS call is made.
   *
   * @throws Error if the region is blank or the path is blank or relative
   */
  static validateCatalogLocation(awsRegion: string, catalogPath: string): void {
    if (!awsRegion || awsRegion.trim() === '') {
      throw new Error(
        'AWS region is required. Please provide a valid AWS region (e.g., us-east-1)',
      );
    }

    if (!catalogPath || catalogPath.trim() === '') {
      throw new Error(
        'Service catalog path is required. Please provide a valid path (e.g., /platform/services)',
      );
    }

    if (!catalogPath.startsWith('/')) {
      throw new Error(
        `Service catalog path must start with '/'. Received: '${catalogPath}'`,
      );
    }
  }

  private static maskEntry(key: string, value: ParameterValue): ParameterValue {
    if (isParameterTree(value)) {
      return this.maskTree(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.maskEntry(key, item));
    }
    if (value !== null && this.shouldMaskValue(key)) {
      return '***MASKED***';
    }
    return value;
  }

  private static requireMapping(raw: ParameterTree, key: string): ParameterTree {
    const value = raw[key];
    if (!isParameterTree(value)) {
      throw new TypeMismatchError(key, key, 'mapping', describeKind(value));
    }
    return value;
  }

  private static firstString(
    tree: ParameterTree,
    ...keys: string[]
  ): string | undefined {
    for (const key of keys) {
      const value = tree[key];
      if (typeof value === 'string' && value.trim() !== '') {
        return value;
      }
    }
    return undefined;
  }

  private static readErrorField(
    error: unknown,
    field: 'name' | 'code' | 'message',
  ): string | undefined {
    if (typeof error !== 'object' || error === null) {
      return undefined;
    }
    const value: unknown = Reflect.get(error, field);
    return typeof value === 'string' ? value : undefined;
  }
}

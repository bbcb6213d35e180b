import { MissingFieldError, TypeMismatchError } from '../errors';
import { ParameterTree } from '../interface';
import { ServiceConfigUtil } from './service-config.util';

describe('ServiceConfigUtil', () => {
  const rawConfig = (): ParameterTree => ({
    chart: {
      repository: 'https://charts.example.com',
      name: 'redis',
      defaultVersion: '1.0.0',
    },
    defaultHelmValues: { auth: { enabled: true } },
    mapping: { 'spec.replicas': 'replicaCount' },
    connectionSecret: {
      fields: [
        { key: 'host', value: '${instanceName}.${namespace}.svc' },
        { key: 'password', value: '${password}' },
      ],
      passwordPath: 'auth.password',
      existingSecretPath: 'auth.existingSecret',
    },
  });

  describe('parse', () => {
    it('should parse a complete service config', () => {
      expect(ServiceConfigUtil.parse(rawConfig())).toEqual({
        chart: {
          repository: 'https://charts.example.com',
          name: 'redis',
          defaultVersion: '1.0.0',
        },
        defaultParameterTree: { auth: { enabled: true } },
        fieldMapping: { 'spec.replicas': 'replicaCount' },
        connectionSecret: {
          fields: [
            { key: 'host', value: '${instanceName}.${namespace}.svc' },
            { key: 'password', value: '${password}' },
          ],
          passwordPath: 'auth.password',
          existingSecretPath: 'auth.existingSecret',
        },
      });
    });

    it.each(['chart', 'defaultHelmValues', 'mapping', 'connectionSecret'])(
      'should throw MissingFieldError when %s is absent',
      (key) => {
        const raw = rawConfig();
        delete raw[key];

        expect(() => ServiceConfigUtil.parse(raw, "service 'redis'")).toThrow(
          `service 'redis': required field '${key}' is missing`,
        );
      },
    );

    it('should accept a null connection secret', () => {
      const raw = rawConfig();
      raw.connectionSecret = null;

      expect(ServiceConfigUtil.parse(raw).connectionSecret).toBeNull();
    });

    it('should accept chart.repo as the repository', () => {
      const raw = rawConfig();
      raw.chart = { repo: 'r', name: 'redis', defaultVersion: '1.0' };

      expect(ServiceConfigUtil.parse(raw).chart).toEqual({
        repository: 'r',
        name: 'redis',
        defaultVersion: '1.0',
      });
    });

    it.each([
      ['repository', 'chart.repository'],
      ['name', 'chart.name'],
      ['defaultVersion', 'chart.defaultVersion'],
    ])('should throw MissingFieldError when chart %s is blank', (key, field) => {
      const raw = rawConfig();
      raw.chart = {
        repository: 'r',
        name: 'redis',
        defaultVersion: '1.0',
        [key]: '',
      };

      expect.assertions(2);
      try {
        ServiceConfigUtil.parse(raw);
      } catch (error) {
        expect(error).toBeInstanceOf(MissingFieldError);
        expect(error).toMatchObject({ field });
      }
    });

    it('should throw TypeMismatchError when defaults are not a mapping', () => {
      const raw = rawConfig();
      raw.defaultHelmValues = ['not', 'a', 'map'];

      expect(() => ServiceConfigUtil.parse(raw)).toThrow(
        "Path 'defaultHelmValues': expected mapping at 'defaultHelmValues', got sequence",
      );
    });

    it('should throw TypeMismatchError when the connection secret is a scalar', () => {
      const raw = rawConfig();
      raw.connectionSecret = 'none';

      expect(() => ServiceConfigUtil.parse(raw)).toThrow(TypeMismatchError);
    });

    it('should keep non-string mapping destinations for the merger to skip', () => {
      const raw = rawConfig();
      raw.mapping = { 'spec.replicas': 3 };

      expect(ServiceConfigUtil.parse(raw).fieldMapping).toEqual({
        'spec.replicas': 3,
      });
    });
  });

  describe('parseConnectionSecret', () => {
    it('should drop malformed fields and default missing templates', () => {
      expect(
        ServiceConfigUtil.parseConnectionSecret({
          fields: [
            'not-a-field',
            { value: 'no key' },
            { key: 'port' },
            { key: 'url', valueTemplate: 'redis://${instanceName}:6379' },
          ],
        }),
      ).toEqual({
        fields: [
          { key: 'port', value: '' },
          { key: 'url', value: 'redis://${instanceName}:6379' },
        ],
      });
    });

    it('should accept the long injection path names', () => {
      expect(
        ServiceConfigUtil.parseConnectionSecret({
          fields: [],
          passwordInjectionPath: 'auth.password',
          existingSecretNameInjectionPath: 'auth.existingSecret',
        }),
      ).toEqual({
        fields: [],
        passwordPath: 'auth.password',
        existingSecretPath: 'auth.existingSecret',
      });
    });

    it('should ignore empty injection paths', () => {
      expect(
        ServiceConfigUtil.parseConnectionSecret({
          passwordPath: '',
          existingSecretPath: 7,
        }),
      ).toEqual({ fields: [] });
    });
  });

  describe('parseBoolean', () => {
    it('should parse booleans and strings', () => {
      expect(ServiceConfigUtil.parseBoolean(true)).toBe(true);
      expect(ServiceConfigUtil.parseBoolean('TRUE')).toBe(true);
      expect(ServiceConfigUtil.parseBoolean('false')).toBe(false);
      expect(ServiceConfigUtil.parseBoolean(undefined)).toBe(false);
      expect(ServiceConfigUtil.parseBoolean(1)).toBe(false);
    });
  });

  describe('parseNumber', () => {
    it('should parse positive numbers and fall back otherwise', () => {
      expect(ServiceConfigUtil.parseNumber(48, 32)).toBe(48);
      expect(ServiceConfigUtil.parseNumber('16', 32)).toBe(16);
      expect(ServiceConfigUtil.parseNumber('abc', 32)).toBe(32);
      expect(ServiceConfigUtil.parseNumber('', 32)).toBe(32);
      expect(ServiceConfigUtil.parseNumber(0, 32)).toBe(32);
      expect(ServiceConfigUtil.parseNumber(undefined, 60)).toBe(60);
    });
  });

  describe('parseConnectionDetailsTarget', () => {
    it('should accept known targets and default to both', () => {
      expect(ServiceConfigUtil.parseConnectionDetailsTarget('descriptor')).toBe(
        'descriptor',
      );
      expect(ServiceConfigUtil.parseConnectionDetailsTarget('response')).toBe(
        'response',
      );
      expect(ServiceConfigUtil.parseConnectionDetailsTarget('both')).toBe(
        'both',
      );
      expect(ServiceConfigUtil.parseConnectionDetailsTarget('other')).toBe(
        'both',
      );
      expect(ServiceConfigUtil.parseConnectionDetailsTarget(undefined)).toBe(
        'both',
      );
    });
  });

  describe('masking', () => {
    it('should mask values of sensitive keys', () => {
      expect(ServiceConfigUtil.maskValue('hunter2', 'auth.password')).toBe(
        '***MASKED***',
      );
      expect(ServiceConfigUtil.maskValue('3', 'replicaCount')).toBe('3');
    });

    it('should mask sensitive scalars anywhere in a tree', () => {
      expect(
        ServiceConfigUtil.maskTree({
          replicaCount: 3,
          auth: { enabled: true, password: 'test-secret' },
          tokens: ['a', 'b'],
          master: { apiToken: null },
        }),
      ).toEqual({
        replicaCount: 3,
        auth: { enabled: true, password: '***MASKED***' },
        tokens: ['***MASKED***', '***MASKED***'],
        master: { apiToken: null },
      });
    });
  });

  describe('validateCatalogLocation', () => {
    it('should pass for a valid region and absolute path', () => {
      expect(() =>
        ServiceConfigUtil.validateCatalogLocation('us-east-1', '/platform/services'),
      ).not.toThrow();
    });

    it('should reject a blank region', () => {
      expect(() =>
        ServiceConfigUtil.validateCatalogLocation('  ', '/platform/services'),
      ).toThrow('AWS region is required');
    });

    it('should reject a blank path', () => {
      expect(() =>
        ServiceConfigUtil.validateCatalogLocation('us-east-1', ''),
      ).toThrow('Service catalog path is required');
    });

    it('should reject a relative path', () => {
      expect(() =>
        ServiceConfigUtil.validateCatalogLocation('us-east-1', 'platform'),
      ).toThrow("Service catalog path must start with '/'. Received: 'platform'");
    });
  });

  describe('buildErrorMessage', () => {
    const build = (error: unknown) =>
      ServiceConfigUtil.buildErrorMessage(error, 'us-east-1', '/platform/services');

    it('should explain access denied errors', () => {
      const message = build({
        name: 'AccessDeniedException',
        message: 'User is not authorized',
      });

      expect(message).toBe(
        "Failed to fetch service catalog from AWS SSM Parameter Store. Region: 'us-east-1', Path: '/platform/services' - Access Denied. " +
          "Ensure the IAM role/user has 'ssm:GetParametersByPath' permission for the catalog path. " +
          'Error: User is not authorized',
      );
    });

    it('should explain throttling', () => {
      expect(
        build({ name: 'ThrottlingException', message: 'Rate exceeded' }),
      ).toContain('Request throttled');
    });

    it('should explain network errors', () => {
      expect(build({ code: 'ETIMEDOUT', message: 'timed out' })).toContain(
        'Network error',
      );
    });

    it('should explain missing credentials', () => {
      expect(build(new Error('Missing credentials in config'))).toContain(
        'Missing AWS credentials',
      );
    });

    it('should fall back to a generic message', () => {
      expect(build({ name: 'Other' })).toBe(
        "Failed to fetch service catalog from AWS SSM Parameter Store. Region: 'us-east-1', Path: '/platform/services' - Unknown error occurred",
      );
      expect(build('boom')).toContain('Unknown error occurred');
    });
  });
});

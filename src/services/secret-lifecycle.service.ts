import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomBytes } from 'crypto';
import {
  DEFAULT_PASSWORD_LENGTH,
  DEPLOYMENT_ROLE,
  RELEASE_VALUES_PATH,
  SECRET_ROLE,
  SERVICE_COMPOSER_OPTIONS,
} from '../constants';
import { PathNotFoundError, TypeMismatchError } from '../errors';
import {
  ConnectionSecretTemplate,
  ModuleOptions,
  ObservedDescriptors,
  ParameterTree,
  ParameterValue,
} from '../interface';
import { isParameterTree } from '../utils/parameter-tree.util';
import { PathAccessorUtil } from '../utils/path-accessor.util';
import { TemplateUtil } from '../utils/template.util';

/**
 * Injectable service that decides which password a service instance uses.
 *
 * A password is generated once per instance. On every later pass it is read
 * back from the resources observed in the cluster and reused verbatim, so
 * reconciling an instance never rotates its credentials.
 *
 * Where the password is read back from follows the connection secret
 * template:
 * - `passwordPath` set: the observed Helm release values at that path
 * - a field whose template is exactly `${password}`: that key of the
 *   observed connection secret
 */
@Injectable()
export class SecretLifecycleService {
  private readonly logger = new Logger(SecretLifecycleService.name);

  constructor(
    @Inject(SERVICE_COMPOSER_OPTIONS) private readonly options: ModuleOptions,
  ) {}

  /**
   * Password for the instance: the observed one if present, otherwise a
   * freshly generated one.
   *
   * @param observed - Resources observed for this instance, keyed by role
   * @param instanceName - Used for logging only
   * @param template - Connection secret template of the service
   */
  resolve(
    observed: ObservedDescriptors,
    instanceName: string,
    template: ConnectionSecretTemplate | null,
  ): string {
    if (template?.passwordPath) {
      const fromRelease = this.readFromRelease(
        observed[DEPLOYMENT_ROLE],
        template.passwordPath,
      );
      if (fromRelease !== undefined) {
        this.logger.log(
          `Reusing existing password from Helm release for instance '${instanceName}'`,
        );
        return fromRelease;
      }
    }

    const passwordField = template?.fields.find((field) =>
      TemplateUtil.isPlaceholderFor(field.value, 'password'),
    );
    if (passwordField) {
      const fromSecret = this.readFromSecret(
        observed[SECRET_ROLE],
        passwordField.key,
      );
      if (fromSecret !== undefined) {
        this.logger.log(
          `Reusing existing password from connection secret for instance '${instanceName}'`,
        );
        return fromSecret;
      }
    }

    if (!template?.passwordPath && !passwordField) {
      this.logger.debug(
        `Password for instance '${instanceName}' is not persisted by the service template and will change on every pass`,
      );
    }

    this.logger.log(`Generating new password for instance '${instanceName}'`);
    return this.generate();
  }

  /**
   * Random URL-safe base64 text from a cryptographically secure source.
   *
   * @param length - Number of characters, defaults to the configured
   * `passwordLength`
   */
  generate(
    length = this.options.passwordLength ?? DEFAULT_PASSWORD_LENGTH,
  ): string {
    return randomBytes(length).toString('base64url').slice(0, length);
  }

  private readFromRelease(
    release: ParameterTree | undefined,
    passwordPath: string,
  ): string | undefined {
    if (!release) {
      return undefined;
    }
    const value = this.readObserved(
      release,
      `${RELEASE_VALUES_PATH}.${passwordPath}`,
    );
    return typeof value === 'string' && value !== '' ? value : undefined;
  }

  private readFromSecret(
    secret: ParameterTree | undefined,
    key: string,
  ): string | undefined {
    if (!secret) {
      return undefined;
    }

    // Secret keys may contain dots, so index the data maps directly.
    const data = this.readObserved(secret, 'data');
    if (isParameterTree(data)) {
      const encoded = data[key];
      if (typeof encoded === 'string' && encoded !== '') {
        const decoded = Buffer.from(encoded, 'base64').toString('utf-8');
        if (decoded !== '') {
          return decoded;
        }
      }
    }

    const stringData = this.readObserved(secret, 'stringData');
    if (isParameterTree(stringData)) {
      const plain = stringData[key];
      if (typeof plain === 'string' && plain !== '') {
        return plain;
      }
    }

    return undefined;
  }

  private readObserved(
    tree: ParameterTree,
    path: string,
  ): ParameterValue | undefined {
    try {
      return PathAccessorUtil.get(tree, path);
    } catch (error) {
      if (error instanceof PathNotFoundError) {
        return undefined;
      }
      if (error instanceof TypeMismatchError) {
        this.logger.warn(
          `Ignoring observed value at '${path}': ${error.message}`,
        );
        return undefined;
      }
      throw error;
    }
  }
}

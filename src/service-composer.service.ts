import { Inject, Injectable, Logger } from '@nestjs/common';
import { Parameter } from '@aws-sdk/client-ssm';
import {
  DEFAULT_RESPONSE_TTL_SECONDS,
  SERVICE_CATALOG_PROVIDER,
  SERVICE_COMPOSER_OPTIONS,
} from './constants';
import { MissingFieldError } from './errors';
import {
  CompositionRequest,
  CompositionResponse,
  ConnectionSecretTemplate,
  DescriptorSet,
  ModuleOptions,
  ObservedDescriptors,
  ParameterTree,
  ServiceConfig,
} from './interface';
import {
  ConfigMergerService,
  ResourceSynthesizerService,
  ServiceCatalogFetcherService,
} from './services';
import { CompositeUtil } from './utils/composite.util';
import { toParameterTree } from './utils/parameter-tree.util';
import { ServiceConfigUtil } from './utils/service-config.util';
import { TemplateUtil } from './utils/template.util';

/**
 * Request for a service held in the catalog; the service configuration is
 * looked up by name instead of being passed in.
 */
export type CatalogCompositionRequest = Omit<CompositionRequest, 'serviceConfig'>;

/**
 * Entry point of the composition engine.
 *
 * Runs a composition request through the merge and synthesis stages and
 * shapes the response. Service configurations are either passed inline with
 * each request or looked up in the service catalog, which is fetched from
 * AWS SSM Parameter Store at start-up and cached in memory.
 *
 * @example
 * Inline service configuration:
 * ```typescript
 * constructor(private readonly composer: ServiceComposerService) {}
 *
 * runFunction(request: CompositionRequest) {
 *   const response = this.composer.compose(request);
 *   // response.resources.helmrelease, response.resources.secret,
 *   // response.connectionDetails
 * }
 * ```
 *
 * @example
 * Catalog lookup:
 * ```typescript
 * const response = this.composer.composeForService('redis', {
 *   userSpec: { replicas: 3 },
 *   observed: {},
 *   identity: { name: 'my-redis', namespace: 'ns1' },
 * });
 * ```
 */
@Injectable()
export class ServiceComposerService {
  private readonly logger = new Logger(ServiceComposerService.name);
  private _catalog = new Map<string, ServiceConfig>();

  constructor(
    @Inject(SERVICE_CATALOG_PROVIDER) catalogParameters: Parameter[],
    @Inject(SERVICE_COMPOSER_OPTIONS) private readonly options: ModuleOptions,
    private readonly catalogFetcher: ServiceCatalogFetcherService,
    private readonly merger: ConfigMergerService,
    private readonly synthesizer: ResourceSynthesizerService,
  ) {
    this.loadCatalog(catalogParameters);
  }

  /**
   * Load catalog parameters into the in-memory catalog.
   * Entries that are not valid service configurations are logged and skipped.
   */
  private loadCatalog(catalogParameters: Parameter[]): void {
    const catalog = new Map<string, ServiceConfig>();

    for (const parameter of catalogParameters) {
      if (!parameter.Name || parameter.Value === undefined) {
        continue;
      }

      const tokens = parameter.Name.split('/');
      const serviceName = tokens[tokens.length - 1];
      try {
        const raw = toParameterTree(JSON.parse(parameter.Value));
        if (!raw) {
          this.logger.warn(
            `Skipping catalog entry '${parameter.Name}': value is not a JSON object`,
          );
          continue;
        }
        catalog.set(
          serviceName,
          ServiceConfigUtil.parse(raw, `service '${serviceName}'`),
        );
        this.logger.debug(`Loaded service config: ${serviceName}`);
      } catch (error) {
        this.logger.warn(
          `Skipping catalog entry '${parameter.Name}': ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
      }
    }

    this._catalog = catalog;
    if (catalogParameters.length > 0) {
      this.logger.log(`Loaded ${catalog.size} service config(s) into catalog`);
    }
  }

  /**
   * Compose the desired resources for a request carrying its own service
   * configuration.
   *
   * @throws MissingFieldError if the service configuration or merged result
   * lacks a required field
   * @throws TypeMismatchError if a mapping or injection path conflicts with
   * the default values
   * @throws InvalidPathError if a mapping or injection path is malformed
   */
  compose(request: CompositionRequest): CompositionResponse {
    return this.run(request, () =>
      ServiceConfigUtil.parse(request.serviceConfig),
    );
  }

  /**
   * Compose the desired resources for a service held in the catalog.
   *
   * @param serviceName - Catalog name of the service (e.g., 'redis')
   * @throws MissingFieldError if the catalog holds no such service
   */
  composeForService(
    serviceName: string,
    request: CatalogCompositionRequest,
  ): CompositionResponse {
    return this.run(request, () => this.getServiceConfig(serviceName));
  }

  /**
   * Compose from a raw composite resource: the user spec, instance identity
   * and `spec.writeConnectionSecretToRef` are read from the composite.
   *
   * @param composite - Observed composite resource tree
   * @param serviceConfig - Raw service configuration document
   * @param observed - Resources observed for the composite, keyed by role
   */
  composeFromComposite(
    composite: ParameterTree,
    serviceConfig: ParameterTree,
    observed: ObservedDescriptors,
  ): CompositionResponse {
    const request: CompositionRequest = {
      userSpec: CompositeUtil.extractUserSpec(composite),
      identity: CompositeUtil.extractIdentity(composite),
      serviceConfig,
      observed,
    };
    const secretRef = CompositeUtil.extractSecretReference(composite);
    if (secretRef) {
      request.secretRef = secretRef;
    }
    return this.compose(request);
  }

  /**
   * @throws MissingFieldError if the catalog holds no such service
   */
  getServiceConfig(serviceName: string): ServiceConfig {
    const config = this._catalog.get(serviceName);
    if (!config) {
      throw new MissingFieldError(serviceName, 'service catalog');
    }
    return config;
  }

  hasService(serviceName: string): boolean {
    return this._catalog.has(serviceName);
  }

  getServiceNames(): string[] {
    return [...this._catalog.keys()];
  }

  /**
   * Re-fetch the service catalog from AWS SSM Parameter Store and replace
   * the cached one.
   *
   * @throws Error if no catalog path is configured, or if fetching fails
   * and continueOnError is false
   */
  async refreshCatalog(): Promise<void> {
    if (!this.options.serviceCatalogPath) {
      throw new Error('Service catalog is not configured');
    }

    const parameters = await this.catalogFetcher.fetchServiceConfigs(
      this.options.awsRegion ?? '',
      this.options.serviceCatalogPath,
      this.options.continueOnError ?? false,
    );
    this.loadCatalog(parameters);
  }

  private run(
    request: CatalogCompositionRequest,
    resolveConfig: () => ServiceConfig,
  ): CompositionResponse {
    const { name, namespace } = request.identity;
    this.logger.log(`Composing instance '${namespace}/${name}'`);

    try {
      const merged = this.merger.merge(resolveConfig(), request.userSpec);
      const result = this.synthesizer.synthesize(
        merged,
        request.identity,
        request.observed,
        request.secretRef,
      );
      const response = this.shapeResponse(
        `${namespace}/${name}`,
        result.descriptors,
        result.connectionDetails,
        merged.connectionSecret,
      );

      this.logger.log(
        `Composition of '${namespace}/${name}' complete - Resources: ${
          Object.keys(response.resources).length
        }`,
      );
      return response;
    } catch (error) {
      this.logger.error(
        `Failed to compose instance '${namespace}/${name}': ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      throw error;
    }
  }

  /**
   * Apply `connectionDetailsTarget`. Under 'response' the Secret descriptor
   * is still emitted when it is the only place the password is persisted,
   * otherwise the password would be regenerated on every pass.
   */
  private shapeResponse(
    instance: string,
    descriptors: DescriptorSet,
    connectionDetails: Record<string, string>,
    template: ConnectionSecretTemplate | null,
  ): CompositionResponse {
    const target = this.options.connectionDetailsTarget ?? 'both';
    const resources: DescriptorSet = { helmrelease: descriptors.helmrelease };
    if (descriptors.secret) {
      if (target !== 'response') {
        resources.secret = descriptors.secret;
      } else if (this.persistsPasswordInSecretOnly(template)) {
        this.logger.warn(
          `Keeping connection secret for instance '${instance}': it is the only place its password is persisted`,
        );
        resources.secret = descriptors.secret;
      }
    }

    return {
      resources,
      connectionDetails: target === 'descriptor' ? {} : connectionDetails,
      ready: true,
      ttlSeconds: this.options.responseTtlSeconds ?? DEFAULT_RESPONSE_TTL_SECONDS,
    };
  }

  private persistsPasswordInSecretOnly(
    template: ConnectionSecretTemplate | null,
  ): boolean {
    if (!template || template.passwordPath) {
      return false;
    }
    return template.fields.some((field) =>
      TemplateUtil.isPlaceholderFor(field.value, 'password'),
    );
  }
}

import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Parameter } from '@aws-sdk/client-ssm';
import {
  COMPOSER_AWS_REGION,
  COMPOSER_CONNECTION_DETAILS_TARGET,
  COMPOSER_CONTINUE_ON_ERROR,
  COMPOSER_ENABLE_VALUE_LOGGING,
  COMPOSER_MANAGED_BY,
  COMPOSER_PASSWORD_LENGTH,
  COMPOSER_RESPONSE_TTL_SECONDS,
  COMPOSER_SERVICE_CATALOG_PATH,
  DEFAULT_PASSWORD_LENGTH,
  DEFAULT_RESPONSE_TTL_SECONDS,
  SERVICE_CATALOG_PROVIDER,
  SERVICE_COMPOSER_OPTIONS,
} from './constants';
import { ModuleAsyncOptions, ModuleOptions } from './interface';
import { ServiceComposerService } from './service-composer.service';
import {
  ConfigMergerService,
  ResourceSynthesizerService,
  SecretLifecycleService,
  ServiceCatalogFetcherService,
} from './services';
import { ServiceConfigUtil } from './utils/service-config.util';

/**
 * Global NestJS module for composing service instances from service
 * configurations and user specs.
 *
 * Features:
 * - Deterministic merge of default Helm values with mapped user values
 * - Stable generated passwords across reconciliation passes
 * - Connection secret rendering from templates
 * - Optional service catalog fetched from AWS SSM Parameter Store
 *
 * @example
 * Static registration:
 * ```typescript
 * @Module({
 *   imports: [
 *     ServiceComposerModule.register({
 *       awsRegion: 'us-east-1',
 *       serviceCatalogPath: '/platform/services',
 *     }),
 *   ],
 * })
 * export class AppModule {}
 * ```
 *
 * @example
 * Async registration with ConfigService:
 * ```typescript
 * @Module({
 *   imports: [
 *     ServiceComposerModule.registerAsync({
 *       import: ConfigModule,
 *       useClass: ConfigService,
 *     }),
 *   ],
 * })
 * export class AppModule {}
 * ```
 */
@Global()
@Module({})
export class ServiceComposerModule {
  /**
   * Register the module with static configuration.
   */
  public static register(moduleOptions: ModuleOptions): DynamicModule {
    return {
      module: ServiceComposerModule,
      providers: [
        ...this.serviceProviders(),
        {
          provide: SERVICE_COMPOSER_OPTIONS,
          useValue: moduleOptions,
        },
        this.catalogProvider(),
      ],
      exports: this.exportedProviders(),
    };
  }

  /**
   * Register the module with configuration read from ConfigService under
   * the `composer.*` keys.
   *
   * @example
   * ```typescript
   * // In your .env or config:
   * // composer.awsRegion=us-east-1
   * // composer.serviceCatalogPath=/platform/services
   * // composer.connectionDetailsTarget=descriptor
   *
   * ServiceComposerModule.registerAsync({
   *   import: ConfigModule,
   *   useClass: ConfigService,
   * })
   * ```
   */
  public static registerAsync(
    moduleAsyncOptions: ModuleAsyncOptions,
  ): DynamicModule {
    return {
      module: ServiceComposerModule,
      imports: [moduleAsyncOptions.import],
      providers: [
        ...this.serviceProviders(),
        {
          provide: SERVICE_COMPOSER_OPTIONS,
          useFactory: (configService: ConfigService): ModuleOptions =>
            this.optionsFromConfig(configService),
          inject: [moduleAsyncOptions.useClass],
        },
        this.catalogProvider(),
      ],
      exports: this.exportedProviders(),
    };
  }

  private static serviceProviders(): Provider[] {
    return [
      ServiceComposerService,
      ServiceCatalogFetcherService,
      ConfigMergerService,
      SecretLifecycleService,
      ResourceSynthesizerService,
    ];
  }

  private static exportedProviders(): Provider[] {
    return [
      ServiceComposerService,
      ConfigMergerService,
      ResourceSynthesizerService,
    ];
  }

  private static catalogProvider(): Provider {
    return {
      provide: SERVICE_CATALOG_PROVIDER,
      useFactory: async (
        moduleOptions: ModuleOptions,
        fetcher: ServiceCatalogFetcherService,
      ): Promise<Parameter[]> => {
        if (!moduleOptions.serviceCatalogPath) {
          return [];
        }
        return await fetcher.fetchServiceConfigs(
          moduleOptions.awsRegion ?? '',
          moduleOptions.serviceCatalogPath,
          moduleOptions.continueOnError || false,
        );
      },
      inject: [SERVICE_COMPOSER_OPTIONS, ServiceCatalogFetcherService],
    };
  }

  private static optionsFromConfig(configService: ConfigService): ModuleOptions {
    return {
      awsRegion: configService.get<string>(COMPOSER_AWS_REGION),
      serviceCatalogPath: configService.get<string>(
        COMPOSER_SERVICE_CATALOG_PATH,
      ),
      continueOnError: ServiceConfigUtil.parseBoolean(
        configService.get(COMPOSER_CONTINUE_ON_ERROR),
      ),
      passwordLength: ServiceConfigUtil.parseNumber(
        configService.get(COMPOSER_PASSWORD_LENGTH),
        DEFAULT_PASSWORD_LENGTH,
      ),
      connectionDetailsTarget: ServiceConfigUtil.parseConnectionDetailsTarget(
        configService.get(COMPOSER_CONNECTION_DETAILS_TARGET),
      ),
      enableValueLogging: ServiceConfigUtil.parseBoolean(
        configService.get(COMPOSER_ENABLE_VALUE_LOGGING),
      ),
      responseTtlSeconds: ServiceConfigUtil.parseNumber(
        configService.get(COMPOSER_RESPONSE_TTL_SECONDS),
        DEFAULT_RESPONSE_TTL_SECONDS,
      ),
      managedBy: configService.get<string>(COMPOSER_MANAGED_BY),
    };
  }
}

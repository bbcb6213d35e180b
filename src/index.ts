import 'reflect-metadata';
import { ServiceComposerService } from './service-composer.service';
import { ServiceComposerModule } from './service-composer.module';
import {
  DEPLOYMENT_ROLE,
  SECRET_ROLE,
  SERVICE_CATALOG_PROVIDER,
  SERVICE_COMPOSER_OPTIONS,
} from './constants';
import {
  ConfigMergerService,
  ResourceSynthesizerService,
  SecretLifecycleService,
  ServiceCatalogFetcherService,
} from './services';
import { HelmReleaseBuilder, SecretBuilder } from './builders/descriptor.builders';
import { DeepCloneUtil } from './utils/deep-clone.util';
import { PathAccessorUtil } from './utils/path-accessor.util';
import { ServiceConfigUtil } from './utils/service-config.util';
import { TemplateUtil } from './utils/template.util';

export * from './errors';
export * from './interface';
export type { CatalogCompositionRequest } from './service-composer.service';
export type { PathReadOptions } from './utils/path-accessor.util';
export type { TemplateVariables } from './utils/template.util';
export {
  describeKind,
  isParameterTree,
  toParameterTree,
  toParameterValue,
} from './utils/parameter-tree.util';

export {
  DEPLOYMENT_ROLE,
  SECRET_ROLE,
  SERVICE_CATALOG_PROVIDER,
  SERVICE_COMPOSER_OPTIONS,
  ServiceComposerService,
  ServiceComposerModule,
  ConfigMergerService,
  ResourceSynthesizerService,
  SecretLifecycleService,
  ServiceCatalogFetcherService,
  HelmReleaseBuilder,
  SecretBuilder,
  DeepCloneUtil,
  PathAccessorUtil,
  ServiceConfigUtil,
  TemplateUtil,
};

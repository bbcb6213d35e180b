/**
 * Barrel export for the injectable engine services:
 * - ConfigMergerService: merges default Helm values with the user spec
 * - SecretLifecycleService: reuses or generates instance passwords
 * - ResourceSynthesizerService: builds the Helm release and connection secret
 * - ServiceCatalogFetcherService: fetches service configs from AWS SSM Parameter Store
 */
export { ConfigMergerService } from './config-merger.service';
export { SecretLifecycleService } from './secret-lifecycle.service';
export { ResourceSynthesizerService } from './resource-synthesizer.service';
export { ServiceCatalogFetcherService } from './service-catalog-fetcher.service';

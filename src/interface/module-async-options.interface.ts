import { Type } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';

/**
 * Async configuration options for ServiceComposerModule.
 *
 * The ConfigService should provide values for the following keys:
 * - `composer.awsRegion`: AWS region of the service catalog (string, optional)
 * - `composer.serviceCatalogPath`: Parameter Store path of the catalog (string, optional)
 * - `composer.continueOnError`: Continue on catalog fetch failure (boolean)
 * - `composer.passwordLength`: Generated password length (number, optional)
 * - `composer.connectionDetailsTarget`: 'both' | 'descriptor' | 'response' (optional)
 * - `composer.enableValueLogging`: Debug logging of merged values (boolean, optional)
 * - `composer.responseTtlSeconds`: Response TTL (number, optional)
 * - `composer.managedBy`: managed-by label value (string, optional)
 *
 * @example
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
export interface ModuleAsyncOptions {
  /**
   * The ConfigModule to import for dependency injection.
   */
  import: Type<ConfigModule>;

  /**
   * The ConfigService class used to read the `composer.*` keys.
   */
  useClass: Type<ConfigService>;
}

import { Injectable, Logger } from '@nestjs/common';
import {
  GetParametersByPathCommand,
  GetParametersByPathCommandInput,
  Parameter,
  SSMClient,
} from '@aws-sdk/client-ssm';
import { ServiceConfigUtil } from '../utils/service-config.util';

/**
 * Injectable service for fetching the service catalog from AWS Systems
 * Manager Parameter Store.
 *
 * Each parameter under the catalog path holds one service configuration as
 * a JSON document. SecureString parameters are decrypted.
 *
 * @example
 * ```typescript
 * constructor(private readonly fetcher: ServiceCatalogFetcherService) {}
 *
 * async loadCatalog() {
 *   const parameters = await this.fetcher.fetchServiceConfigs(
 *     'us-east-1',
 *     '/platform/services',
 *     false,
 *   );
 * }
 * ```
 */
@Injectable()
export class ServiceCatalogFetcherService {
  private readonly logger = new Logger(ServiceCatalogFetcherService.name);

  /**
   * Fetch every parameter below the catalog path, following pagination.
   *
   * @param awsRegion - AWS region of the catalog (e.g., 'us-east-1')
   * @param catalogPath - Parameter Store path of the catalog (must start with '/')
   * @param continueOnError - If true, returns an empty array on error; if false, throws
   * @returns Raw Parameter Store entries
   * @throws Error with remediation guidance if fetching fails and
   * continueOnError is false
   */
  async fetchServiceConfigs(
    awsRegion: string,
    catalogPath: string,
    continueOnError: boolean,
  ): Promise<Parameter[]> {
    const parameters: Parameter[] = [];

    this.logger.log(
      `Fetching service catalog from AWS SSM Parameter Store - Region: ${awsRegion}, Path: ${catalogPath}`,
    );

    try {
      ServiceConfigUtil.validateCatalogLocation(awsRegion, catalogPath);

      const ssmClient = new SSMClient({ region: awsRegion });
      let nextToken: string | undefined = undefined;
      let pageCount = 0;

      do {
        pageCount++;
        const commandInput: GetParametersByPathCommandInput = {
          Path: catalogPath,
          Recursive: true,
          WithDecryption: true,
        };
        if (nextToken) {
          commandInput.NextToken = nextToken;
          this.logger.debug(`Fetching catalog page ${pageCount} with NextToken`);
        }

        const result = await ssmClient.send(
          new GetParametersByPathCommand(commandInput),
        );
        const fetchedParameters = result.Parameters ?? [];
        parameters.push(...fetchedParameters);

        this.logger.debug(
          `Page ${pageCount}: Retrieved ${fetchedParameters.length} service config(s)`,
        );
        nextToken = result.NextToken;
      } while (nextToken);

      this.logger.log(
        `Fetched ${parameters.length} service config(s) from AWS SSM in ${pageCount} page(s)`,
      );

      if (parameters.length === 0) {
        this.logger.warn(
          `No service configs found at path '${catalogPath}' in region '${awsRegion}'. ` +
            `Verify the path exists and has parameters configured.`,
        );
      }
    } catch (error) {
      const errorMessage = ServiceConfigUtil.buildErrorMessage(
        error,
        awsRegion,
        catalogPath,
      );

      if (continueOnError) {
        this.logger.warn(
          `${errorMessage} - Application will continue with an empty service catalog`,
        );
        if (error instanceof Error) {
          this.logger.debug(`Error details: ${error.stack}`);
        }
        return [];
      }

      this.logger.error(errorMessage);
      const enhancedError = new Error(errorMessage);
      if (error instanceof Error) {
        this.logger.debug(`Error details: ${error.stack}`);
        enhancedError.stack = error.stack;
      }
      throw enhancedError;
    }

    return parameters;
  }
}

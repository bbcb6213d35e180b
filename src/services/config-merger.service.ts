import { Inject, Injectable, Logger } from '@nestjs/common';
import { SERVICE_COMPOSER_OPTIONS, USER_SPEC_ROOT_SEGMENT } from '../constants';
import {
  CompositionError,
  PathNotFoundError,
  TypeMismatchError,
} from '../errors';
import {
  MergedConfig,
  ModuleOptions,
  ParameterTree,
  ParameterValue,
  ServiceConfig,
} from '../interface';
import { DeepCloneUtil } from '../utils/deep-clone.util';
import { PathAccessorUtil } from '../utils/path-accessor.util';
import { ServiceConfigUtil } from '../utils/service-config.util';

/**
 * Injectable service that merges a service's default Helm values with the
 * values a user supplied in the composite spec.
 *
 * The service configuration's field mapping decides which user values are
 * copied and where they land. Defaults stay in effect for every mapping the
 * user left unset.
 *
 * @example
 * ```typescript
 * const merged = this.merger.merge(serviceConfig, { size: { cpu: '500m' } });
 * // with mapping { 'spec.size.cpu': 'resources.cpu' }:
 * // merged.parameterTree.resources.cpu === '500m'
 * ```
 */
@Injectable()
export class ConfigMergerService {
  private readonly logger = new Logger(ConfigMergerService.name);

  constructor(
    @Inject(SERVICE_COMPOSER_OPTIONS) private readonly options: ModuleOptions,
  ) {}

  /**
   * Merge defaults and user spec into one parameter tree.
   *
   * Mappings are applied in lexicographic order of their source path, so two
   * mappings writing the same destination resolve the same way every time
   * (the later one wins). Neither input is mutated.
   *
   * @param serviceConfig - Validated service configuration
   * @param userSpec - Contents of the composite's `spec`
   * @returns Merged configuration carrying the chart identity and
   * connection secret template unchanged
   * @throws TypeMismatchError if a mapped destination runs through a
   * default value that is not a mapping
   * @throws InvalidPathError if a mapped destination is empty or malformed
   */
  merge(serviceConfig: ServiceConfig, userSpec: ParameterTree): MergedConfig {
    const parameterTree = DeepCloneUtil.cloneTree(
      serviceConfig.defaultParameterTree,
    );
    const sourcePaths = Object.keys(serviceConfig.fieldMapping).sort();
    let applied = 0;

    for (const sourcePath of sourcePaths) {
      const destinationPath = serviceConfig.fieldMapping[sourcePath];
      if (typeof destinationPath !== 'string') {
        this.logger.warn(
          `Skipping mapping '${sourcePath}': destination is not a string`,
        );
        continue;
      }

      const value = this.lookupUserValue(userSpec, sourcePath);
      if (value === undefined) {
        continue;
      }

      try {
        PathAccessorUtil.set(
          parameterTree,
          destinationPath,
          DeepCloneUtil.clone(value),
        );
      } catch (error) {
        if (error instanceof CompositionError) {
          this.logger.error(
            `Failed to set Helm value at '${destinationPath}' (mapped from '${sourcePath}'): ${error.message}`,
          );
        }
        throw error;
      }

      applied++;
      if (this.options.enableValueLogging) {
        this.logger.debug(
          `Mapped '${sourcePath}' -> '${destinationPath}' = ${ServiceConfigUtil.maskValue(
            JSON.stringify(value),
            destinationPath,
          )}`,
        );
      }
    }

    this.logger.log(
      `Merged ${applied} of ${sourcePaths.length} mapped value(s) into chart '${serviceConfig.chart.name}'`,
    );
    if (this.options.enableValueLogging) {
      this.logger.debug(
        `Merged values: ${JSON.stringify(ServiceConfigUtil.maskTree(parameterTree))}`,
      );
    }

    return {
      chart: serviceConfig.chart,
      parameterTree,
      connectionSecret: serviceConfig.connectionSecret,
    };
  }

  /**
   * Value the user supplied at `sourcePath`, or undefined when the user spec
   * has nothing there.
   */
  private lookupUserValue(
    userSpec: ParameterTree,
    sourcePath: string,
  ): ParameterValue | undefined {
    try {
      return PathAccessorUtil.get(userSpec, sourcePath, {
        rootSegment: USER_SPEC_ROOT_SEGMENT,
      });
    } catch (error) {
      if (
        error instanceof PathNotFoundError ||
        error instanceof TypeMismatchError
      ) {
        this.logger.debug(
          `User spec has no value for '${sourcePath}', keeping default`,
        );
        return undefined;
      }
      throw error;
    }
  }
}

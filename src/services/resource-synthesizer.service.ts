import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  HelmReleaseBuilder,
  SecretBuilder,
} from '../builders/descriptor.builders';
import { DEFAULT_MANAGED_BY, SERVICE_COMPOSER_OPTIONS } from '../constants';
import { MissingFieldError } from '../errors';
import {
  ChartIdentity,
  DescriptorSet,
  InstanceIdentity,
  MergedConfig,
  ModuleOptions,
  ObservedDescriptors,
  SecretReference,
  SynthesisResult,
} from '../interface';
import { DeepCloneUtil } from '../utils/deep-clone.util';
import { isParameterTree } from '../utils/parameter-tree.util';
import { PathAccessorUtil } from '../utils/path-accessor.util';
import { TemplateUtil } from '../utils/template.util';
import { SecretLifecycleService } from './secret-lifecycle.service';

/**
 * Injectable service that turns a merged configuration into the desired
 * resources of one service instance: a Helm release and, when the service
 * declares a connection secret template, a connection Secret.
 *
 * @example
 * ```typescript
 * const { descriptors, connectionDetails } = this.synthesizer.synthesize(
 *   merged,
 *   { name: 'my-redis', namespace: 'ns1' },
 *   observedResources,
 * );
 * ```
 */
@Injectable()
export class ResourceSynthesizerService {
  private readonly logger = new Logger(ResourceSynthesizerService.name);

  constructor(
    @Inject(SERVICE_COMPOSER_OPTIONS) private readonly options: ModuleOptions,
    private readonly secretLifecycle: SecretLifecycleService,
  ) {}

  /**
   * Build the descriptor set and connection values for an instance.
   *
   * The password is resolved first so that the Helm values, the Secret and
   * the connection details all carry the same one. The merged configuration
   * is not mutated.
   *
   * @param mergedConfig - Output of the merge stage
   * @param identity - Name and namespace of the composite
   * @param observed - Resources observed for the composite, keyed by role
   * @param secretRef - Optional override of the connection secret's name and
   * namespace
   * @throws MissingFieldError if the chart identity, the parameter tree or
   * the instance identity is incomplete
   * @throws TypeMismatchError if an injection path runs through a value that
   * is not a mapping
   * @throws InvalidPathError if an injection path is malformed
   */
  synthesize(
    mergedConfig: MergedConfig,
    identity: InstanceIdentity,
    observed: ObservedDescriptors,
    secretRef?: SecretReference,
  ): SynthesisResult {
    const chart = this.requireChart(mergedConfig.chart);
    if (!isParameterTree(mergedConfig.parameterTree)) {
      throw new MissingFieldError('parameterTree', 'merged config');
    }
    if (!identity.name) {
      throw new MissingFieldError('metadata.name', 'instance identity');
    }
    if (!identity.namespace) {
      throw new MissingFieldError('metadata.namespace', 'instance identity');
    }

    this.logger.log(
      `Generating resources for instance '${identity.name}' in namespace '${identity.namespace}'`,
    );

    const values = DeepCloneUtil.cloneTree(mergedConfig.parameterTree);
    const template = mergedConfig.connectionSecret;
    const password = this.secretLifecycle.resolve(
      observed,
      identity.name,
      template,
    );
    const secretName = secretRef?.name || identity.name;
    const secretNamespace = secretRef?.namespace || identity.namespace;

    if (template?.passwordPath) {
      PathAccessorUtil.set(values, template.passwordPath, password);
      this.logger.debug(
        `Injected password into Helm values at '${template.passwordPath}'`,
      );
    }

    if (template?.existingSecretPath) {
      PathAccessorUtil.set(values, template.existingSecretPath, secretName);
      this.logger.log(
        `Configured Helm chart to use existing secret '${secretName}' at '${template.existingSecretPath}'`,
      );
    }

    const managedBy = this.options.managedBy ?? DEFAULT_MANAGED_BY;
    const descriptors: DescriptorSet = {
      helmrelease: new HelmReleaseBuilder(identity.name)
        .withNamespace(identity.namespace)
        .withChart(chart.repository, chart.name, chart.defaultVersion)
        .withValues(values)
        .withLabel('app.kubernetes.io/managed-by', managedBy)
        .withLabel('app.kubernetes.io/instance', identity.name)
        .build(),
    };

    this.logger.log(
      `Created Helm release for chart '${chart.name}' version '${chart.defaultVersion}' from '${chart.repository}'`,
    );

    // Null prototype: `__proto__` is a valid secret key.
    const connectionDetails: Record<string, string> = Object.create(null);
    if (template) {
      const variables = {
        instanceName: identity.name,
        namespace: identity.namespace,
        password,
      };
      const secretBuilder = new SecretBuilder(secretName, secretNamespace);

      for (const field of template.fields) {
        const value = TemplateUtil.render(field.value, variables);
        connectionDetails[field.key] = value;
        secretBuilder.withData(field.key, value);
      }

      descriptors.secret = secretBuilder
        .withLabel('app.kubernetes.io/managed-by', managedBy)
        .withLabel('app.kubernetes.io/instance', identity.name)
        .withLabel('app.kubernetes.io/component', 'connection-secret')
        .build();

      this.logger.log(
        `Created connection secret '${secretNamespace}/${secretName}' with ${template.fields.length} field(s)`,
      );
    }

    return { descriptors, connectionDetails, secretValue: password };
  }

  private requireChart(chart: ChartIdentity | undefined): ChartIdentity {
    if (!chart) {
      throw new MissingFieldError('chart', 'merged config');
    }
    if (!chart.repository) {
      throw new MissingFieldError('chart.repository', 'merged config');
    }
    if (!chart.name) {
      throw new MissingFieldError('chart.name', 'merged config');
    }
    if (!chart.defaultVersion) {
      throw new MissingFieldError('chart.defaultVersion', 'merged config');
    }
    return chart;
  }
}

import {
  DeploymentDescriptor,
  SecretDescriptor,
} from '../interface/composition.interface';
import { ParameterTree } from '../interface/parameter-tree.interface';

/**
 * Builds `helm.crossplane.io/v1beta1` Release descriptors.
 *
 * @example
 * ```typescript
 * const release = new HelmReleaseBuilder('my-redis')
 *   .withNamespace('ns1')
 *   .withChart('https://charts.example.com', 'redis', '1.0.0')
 *   .withValues({ replicaCount: 3 })
 *   .build();
 * ```
 */
export class HelmReleaseBuilder {
  private namespace = '';
  private chart = { repository: '', name: '', version: '' };
  private values: ParameterTree = {};
  private readonly labels: Record<string, string> = {};

  constructor(private readonly name: string) {}

  /**
   * Namespace of the release object and of the chart it deploys.
   */
  withNamespace(namespace: string): this {
    this.namespace = namespace;
    return this;
  }

  withChart(repository: string, name: string, version: string): this {
    this.chart = { repository, name, version };
    return this;
  }

  withValues(values: ParameterTree): this {
    this.values = values;
    return this;
  }

  withLabel(key: string, value: string): this {
    this.labels[key] = value;
    return this;
  }

  build(): DeploymentDescriptor {
    return {
      apiVersion: 'helm.crossplane.io/v1beta1',
      kind: 'Release',
      metadata: {
        name: this.name,
        namespace: this.namespace,
        labels: { ...this.labels },
      },
      spec: {
        forProvider: {
          chart: { ...this.chart },
          namespace: this.namespace,
          values: this.values,
        },
      },
    };
  }
}

/**
 * Builds `v1` Secret descriptors. Values are base64 encoded into `data`.
 */
export class SecretBuilder {
  private readonly data: Record<string, string> = Object.create(null);
  private readonly labels: Record<string, string> = {};

  constructor(
    private readonly name: string,
    private readonly namespace: string,
  ) {}

  withData(key: string, value: string): this {
    this.data[key] = Buffer.from(value, 'utf-8').toString('base64');
    return this;
  }

  withLabel(key: string, value: string): this {
    this.labels[key] = value;
    return this;
  }

  build(): SecretDescriptor {
    return {
      apiVersion: 'v1',
      kind: 'Secret',
      metadata: {
        name: this.name,
        namespace: this.namespace,
        labels: { ...this.labels },
      },
      type: 'Opaque',
      data: { ...this.data },
    };
  }
}

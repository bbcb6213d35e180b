import { ParameterTree } from './parameter-tree.interface';

/**
 * Name and namespace of the composite resource being reconciled.
 * Every generated descriptor is scoped to this namespace.
 */
export interface InstanceIdentity {
  name: string;
  namespace: string;
}

/**
 * Optional override of where the connection secret is written.
 * Empty or missing fields fall back to the instance identity.
 */
export interface SecretReference {
  name?: string;
  namespace?: string;
}

export interface DescriptorMetadata {
  name: string;
  namespace?: string;
  labels: Record<string, string>;
}

/**
 * Helm release descriptor handed to the downstream Helm provider.
 */
export interface DeploymentDescriptor {
  apiVersion: string;
  kind: string;
  metadata: DescriptorMetadata;
  spec: {
    forProvider: {
      chart: {
        repository: string;
        name: string;
        version: string;
      };
      namespace: string;
      values: ParameterTree;
    };
  };
}

/**
 * Kubernetes Secret descriptor; `data` values are base64 encoded.
 */
export interface SecretDescriptor {
  apiVersion: string;
  kind: string;
  metadata: DescriptorMetadata;
  type: string;
  data: Record<string, string>;
}

export interface DescriptorSet {
  helmrelease: DeploymentDescriptor;
  secret?: SecretDescriptor;
}

/**
 * Previously observed resources keyed by role ('helmrelease', 'secret').
 * Entries are raw trees as reported by the cluster.
 */
export type ObservedDescriptors = Readonly<
  Record<string, ParameterTree | undefined>
>;

export interface SynthesisResult {
  descriptors: DescriptorSet;
  /** Rendered connection values in plain text, keyed by secret key */
  connectionDetails: Record<string, string>;
  /** Password used for this pass, reused or freshly generated */
  secretValue: string;
}

/**
 * Inbound composition request.
 */
export interface CompositionRequest {
  /** Contents of the composite resource's `spec` */
  userSpec: ParameterTree;
  /** Raw service configuration document */
  serviceConfig: ParameterTree;
  observed: ObservedDescriptors;
  identity: InstanceIdentity;
  secretRef?: SecretReference;
}

/**
 * Outbound composition response.
 */
export interface CompositionResponse {
  resources: DescriptorSet;
  connectionDetails: Record<string, string>;
  ready: boolean;
  /** How long the caller may cache this response before re-running */
  ttlSeconds: number;
}

import { MissingFieldError, TypeMismatchError } from '../errors';
import {
  InstanceIdentity,
  SecretReference,
} from '../interface/composition.interface';
import { ParameterTree } from '../interface/parameter-tree.interface';
import { PathAccessorUtil } from './path-accessor.util';
import { describeKind, isParameterTree } from './parameter-tree.util';

/**
 * Reads the parts of a composite resource the engine consumes.
 */
export class CompositeUtil {
  /**
   * The composite's `spec` mapping, i.e. the user-supplied parameters.
   *
   * @throws MissingFieldError if the composite has no spec
   * @throws TypeMismatchError if spec is not a mapping
   */
  static extractUserSpec(composite: ParameterTree): ParameterTree {
    if (!PathAccessorUtil.has(composite, 'spec')) {
      throw new MissingFieldError('spec', 'composite');
    }
    const spec = PathAccessorUtil.get(composite, 'spec');
    if (!isParameterTree(spec)) {
      throw new TypeMismatchError('spec', 'spec', 'mapping', describeKind(spec));
    }
    return spec;
  }

  /**
   * @throws MissingFieldError if `metadata.name` or `metadata.namespace` is
   * absent or not a non-empty string
   */
  static extractIdentity(composite: ParameterTree): InstanceIdentity {
    return {
      name: this.requireString(composite, 'metadata.name'),
      namespace: this.requireString(composite, 'metadata.namespace'),
    };
  }

  /**
   * `spec.writeConnectionSecretToRef`, when present and a mapping.
   */
  static extractSecretReference(
    composite: ParameterTree,
  ): SecretReference | undefined {
    const path = 'spec.writeConnectionSecretToRef';
    if (!PathAccessorUtil.has(composite, path)) {
      return undefined;
    }
    const ref = PathAccessorUtil.get(composite, path);
    if (!isParameterTree(ref)) {
      return undefined;
    }

    const secretRef: SecretReference = {};
    if (typeof ref.name === 'string') secretRef.name = ref.name;
    if (typeof ref.namespace === 'string') secretRef.namespace = ref.namespace;
    return secretRef;
  }

  private static requireString(composite: ParameterTree, path: string): string {
    const value = PathAccessorUtil.has(composite, path)
      ? PathAccessorUtil.get(composite, path)
      : undefined;
    if (typeof value !== 'string' || value === '') {
      throw new MissingFieldError(path, 'composite');
    }
    return value;
  }
}

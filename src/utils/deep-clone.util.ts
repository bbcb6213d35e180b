import {
  ParameterTree,
  ParameterValue,
} from '../interface/parameter-tree.interface';
import { isParameterTree } from './parameter-tree.util';

/**
 * Structural copies of parameter trees. The copy shares no mapping or
 * sequence with its source, so it can be mutated freely.
 */
export class DeepCloneUtil {
  static cloneTree(tree: ParameterTree): ParameterTree {
    const copy: ParameterTree = {};
    for (const [key, value] of Object.entries(tree)) {
      copy[key] = this.clone(value);
    }
    return copy;
  }

  static clone(value: ParameterValue): ParameterValue {
    if (Array.isArray(value)) {
      return value.map((item) => this.clone(item));
    }
    if (isParameterTree(value)) {
      return this.cloneTree(value);
    }
    return value;
  }
}

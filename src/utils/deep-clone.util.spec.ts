import { ParameterTree } from '../interface';
import { DeepCloneUtil } from './deep-clone.util';

describe('DeepCloneUtil', () => {
  const source = (): ParameterTree => ({
    auth: { enabled: true, password: null },
    replicas: 3,
    tolerations: [{ key: 'dedicated', values: ['db'] }],
    name: 'redis',
  });

  it('should produce a structurally equal copy', () => {
    const original = source();
    expect(DeepCloneUtil.cloneTree(original)).toEqual(original);
  });

  it('should not share nested mappings', () => {
    const original = source();
    const copy = DeepCloneUtil.cloneTree(original);

    expect(copy.auth).not.toBe(original.auth);
    mutate(copy);
    expect(original).toEqual(source());
  });

  it('should not share sequences or mappings inside sequences', () => {
    const original = source();
    const copy = DeepCloneUtil.cloneTree(original);
    const copiedTolerations = copy.tolerations;
    const originalTolerations = original.tolerations;

    expect(copiedTolerations).not.toBe(originalTolerations);
    expect(Array.isArray(copiedTolerations)).toBe(true);
    if (Array.isArray(copiedTolerations) && Array.isArray(originalTolerations)) {
      expect(copiedTolerations[0]).not.toBe(originalTolerations[0]);
      copiedTolerations.push('extra');
    }
    expect(original.tolerations).toEqual([
      { key: 'dedicated', values: ['db'] },
    ]);
  });

  it('should return scalars unchanged', () => {
    expect(DeepCloneUtil.clone('text')).toBe('text');
    expect(DeepCloneUtil.clone(42)).toBe(42);
    expect(DeepCloneUtil.clone(false)).toBe(false);
    expect(DeepCloneUtil.clone(null)).toBeNull();
  });

  it('should clone sequences at the top level', () => {
    const original = [[1], { a: 2 }];
    const copy = DeepCloneUtil.clone(original);

    expect(copy).toEqual(original);
    expect(copy).not.toBe(original);
  });
});

function mutate(tree: ParameterTree): void {
  const auth = tree.auth;
  if (typeof auth === 'object' && auth !== null && !Array.isArray(auth)) {
    auth.enabled = false;
    auth.password = 'changed';
  }
  tree.replicas = 5;
}

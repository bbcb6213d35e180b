import {
  describeKind,
  isParameterTree,
  toParameterTree,
  toParameterValue,
} from './parameter-tree.util';

describe('parameter tree helpers', () => {
  describe('isParameterTree', () => {
    it('should accept mappings only', () => {
      expect(isParameterTree({ a: 1 })).toBe(true);
      expect(isParameterTree({})).toBe(true);
      expect(isParameterTree([])).toBe(false);
      expect(isParameterTree(null)).toBe(false);
      expect(isParameterTree('a')).toBe(false);
      expect(isParameterTree(undefined)).toBe(false);
    });
  });

  describe('describeKind', () => {
    it('should name every kind', () => {
      expect(describeKind(null)).toBe('null');
      expect(describeKind(true)).toBe('boolean');
      expect(describeKind(1.5)).toBe('number');
      expect(describeKind('x')).toBe('string');
      expect(describeKind([1])).toBe('sequence');
      expect(describeKind({ a: 1 })).toBe('mapping');
    });
  });

  describe('toParameterValue', () => {
    it('should accept JSON documents', () => {
      const parsed: unknown = JSON.parse(
        '{"chart":{"name":"redis"},"list":[1,"a",null,true]}',
      );
      expect(toParameterValue(parsed)).toEqual({
        chart: { name: 'redis' },
        list: [1, 'a', null, true],
      });
    });

    it('should reject values JSON cannot represent', () => {
      expect(toParameterValue(undefined)).toBeUndefined();
      expect(toParameterValue(Number.NaN)).toBeUndefined();
      expect(toParameterValue({ a: () => 1 })).toBeUndefined();
      expect(toParameterValue([1, undefined])).toBeUndefined();
    });
  });

  describe('toParameterTree', () => {
    it('should return mappings and reject other values', () => {
      expect(toParameterTree({ a: { b: 1 } })).toEqual({ a: { b: 1 } });
      expect(toParameterTree([1, 2])).toBeUndefined();
      expect(toParameterTree('text')).toBeUndefined();
    });
  });
});

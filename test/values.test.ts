import {
  DuplicateKeyError,
  EmptyKeyError,
  HeterogeneousArrayError,
  TomlArray,
  TomlBoolean,
  TomlDateTime,
  TomlFloat,
  TomlInteger,
  TomlString,
  TomlTable,
} from '../src/index';

const one = new TomlInteger(1n);
const two = new TomlInteger(2n);

describe('TOML Values', () => {
  describe('Scalars', () => {
    test('should erase small integers to numbers', () => {
      expect(new TomlInteger(42n).erase()).toBe(42);
      expect(new TomlInteger(-7n).erase()).toBe(-7);
    });

    test('should erase large integers to bigints', () => {
      expect(new TomlInteger(2n ** 53n).erase()).toBe(2n ** 53n);
      expect(new TomlInteger(TomlInteger.MAX).erase()).toBe(9223372036854775807n);
    });

    test('should reject integers outside 64 bits', () => {
      expect(() => new TomlInteger(TomlInteger.MAX + 1n)).toThrow(RangeError);
      expect(TomlInteger.isInRange(TomlInteger.MIN)).toBe(true);
      expect(TomlInteger.isInRange(TomlInteger.MIN - 1n)).toBe(false);
    });

    test('should share boolean instances', () => {
      expect(TomlBoolean.of(true)).toBe(TomlBoolean.TRUE);
      expect(TomlBoolean.of(false).erase()).toBe(false);
    });

    test('should erase date-times to dates', () => {
      const value = new TomlDateTime(1_000_000_000_000, 60);

      expect(value.erase()).toEqual(new Date(1_000_000_000_000));
      expect(value.describe()).toBe('2001-09-09T01:46:40.000Z');
      expect(value.offsetMinutes).toBe(60);
    });

    test('should describe strings as quoted text', () => {
      expect(new TomlString('a"b').describe()).toBe('"a\\"b"');
    });

    test('should freeze every value', () => {
      expect(Object.isFrozen(new TomlString('x'))).toBe(true);
      expect(Object.isFrozen(new TomlFloat(1.5))).toBe(true);
      expect(Object.isFrozen(TomlTable.empty)).toBe(true);
    });
  });

  describe('Arrays', () => {
    test('should reject mixed element kinds', () => {
      expect(() => TomlArray.from([one, new TomlString('a')])).toThrow(HeterogeneousArrayError);
      expect(() => TomlArray.from([one, new TomlString('a')]))
        .toThrow('Array elements must be of the same type: 1 (integer), "a" (string)');
    });

    test('should report the first element and the offending one on append', () => {
      const array = TomlArray.from([one, two]);

      try {
        array.append(new TomlFloat(1.5));
        throw new Error('append should have failed');
      } catch (error) {
        expect(error).toBeInstanceOf(HeterogeneousArrayError);
        if (error instanceof HeterogeneousArrayError) {
          expect(error.first).toBe(one);
          expect(error.last.describe()).toBe('1.5');
        }
      }
    });

    test('should allow nested arrays of different element kinds', () => {
      const nested = TomlArray.from([TomlArray.from([one]), TomlArray.from([new TomlString('a')])]);

      expect(nested.erase()).toEqual([[1], ['a']]);
    });

    test('should leave the original untouched on append', () => {
      const original = TomlArray.from([one]);
      const appended = original.append(two);

      expect(original.length).toBe(1);
      expect(appended.erase()).toEqual([1, 2]);
      expect(Object.isFrozen(original.elements)).toBe(true);
    });

    test('should recognise arrays of tables', () => {
      expect(TomlArray.empty.isArrayOfTables).toBe(false);
      expect(TomlArray.empty.elementKind).toBeUndefined();
      expect(TomlArray.empty.append(TomlTable.empty).isArrayOfTables).toBe(true);
      expect(TomlArray.from([one]).isArrayOfTables).toBe(false);
    });
  });

  describe('Tables', () => {
    test('should create intermediate tables for a key path', () => {
      const table = TomlTable.empty.addKeyPath('table', ['a', 'b']);

      expect(table.erase()).toEqual({ a: { b: {} } });
      expect(TomlTable.empty.size).toBe(0);
    });

    test('should return the same table when it already exists', () => {
      const table = TomlTable.empty.addKeyPath('table', ['a']);

      expect(table.addKeyPath('table', ['a'])).toBe(table);
    });

    test('should append a table for each array key path', () => {
      const table = TomlTable.empty
        .addKeyPath('array', ['x'])
        .addKeyPath('array', ['x']);

      expect(table.erase()).toEqual({ x: [{}, {}] });
    });

    test('should descend into the last table of an array', () => {
      const table = TomlTable.empty
        .addKeyPath('array', ['x'])
        .addKeyPath('array', ['x'])
        .addKeyPath('table', ['x', 'y']);

      expect(table.erase()).toEqual({ x: [{}, { y: {} }] });
    });

    test('should reject empty key paths', () => {
      expect(() => TomlTable.empty.addKeyPath('table', [])).toThrow(EmptyKeyError);
      expect(() => TomlTable.empty.addKeyPath('table', ['a', ''])).toThrow('Path must be non-empty');
      expect(() => TomlTable.empty.assign([], '', one)).toThrow(EmptyKeyError);
    });

    test('should reject a key path through a scalar', () => {
      const table = TomlTable.empty.assign([], 'a', one);

      expect(() => table.addKeyPath('table', ['a', 'b'])).toThrow('Key has already been set: a');
      expect(() => table.addKeyPath('array', ['a'])).toThrow(DuplicateKeyError);
    });

    test('should append a table to an empty static array', () => {
      const table = TomlTable.empty
        .assign([], 'a', TomlArray.empty)
        .addKeyPath('array', ['a']);

      expect(table.erase()).toEqual({ a: [{}] });
    });

    test('should reject an array key path over an array of scalars', () => {
      const table = TomlTable.empty.assign([], 'a', TomlArray.from([one]));

      expect(() => table.addKeyPath('array', ['a'])).toThrow(HeterogeneousArrayError);
      expect(() => table.addKeyPath('array', ['a']))
        .toThrow('Array elements must be of the same type: 1 (integer), {} (table)');
    });

    test('should hand out a copy of the entries', () => {
      const table = TomlTable.empty.assign([], 'a', one);
      const entries = table.value;
      entries.set('b', two);
      entries.delete('a');

      expect(table.erase()).toEqual({ a: 1 });
      expect(TomlTable.empty.value.size).toBe(0);
    });

    test('should assign under a prefix', () => {
      const table = TomlTable.empty.assign(['a', 'b'], 'c', one);

      expect(table.erase()).toEqual({ a: { b: { c: 1 } } });
    });

    test('should reject assigning a key twice', () => {
      const table = TomlTable.empty.assign(['a'], 'c', one);

      try {
        table.assign(['a'], 'c', two);
        throw new Error('assign should have failed');
      } catch (error) {
        expect(error).toBeInstanceOf(DuplicateKeyError);
        if (error instanceof DuplicateKeyError) {
          expect(error.path).toEqual(['a', 'c']);
          expect(error.message).toBe('Key has already been set: a.c');
        }
      }
    });

    test('should keep __proto__ as an ordinary key when erased', () => {
      const erased = new TomlTable([['__proto__', new TomlString('x')]]).erase();

      expect(Object.keys(erased)).toEqual(['__proto__']);
      expect(Object.getPrototypeOf(erased)).toBe(Object.prototype);
    });

    test('should preserve insertion order', () => {
      const table = TomlTable.empty
        .assign([], 'z', one)
        .assign([], 'a', two);

      expect(table.keys()).toEqual(['z', 'a']);
    });
  });
});

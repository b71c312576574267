import { describe, expect, it } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import type { ObjectFactory } from '../../host/reflection-host.js';
import { ManifestObject } from '../../host/manifest-host.js';
import { namedClass } from '../../schema/class-source.js';
import { Def, type Definition } from '../../schema/definition.js';
import { RootSchema } from '../../schema/root-schema.js';
import {
  expectErr,
  manifestHost,
  PERSON_WITH_GENDER,
  TREE_NODE,
} from '../../test-utils/manifest-fixtures.js';
import { resolveOptions, type SchemaOptions } from '../../types/options.js';
import { createInstantiationContext } from '../context.js';
import { instantiate } from '../instantiator.js';
import { Native, toPlain } from '../native-value.js';

const host = manifestHost([PERSON_WITH_GENDER, TREE_NODE]);

function run(
  value: unknown,
  definition: Definition,
  defs: ReadonlyMap<string, Definition> = new Map(),
  options: SchemaOptions = {},
  factory: ObjectFactory = host
) {
  return instantiate(
    value,
    definition,
    createInstantiationContext(factory, defs, resolveOptions(options))
  );
}

describe('instantiate primitives', () => {
  it('keeps integers and floats apart', () => {
    expect(run(3, Def.integer()).unwrap()).toEqual(Native.int(3));
    expect(run(3, Def.number()).unwrap()).toEqual(Native.float(3));
    expect(run(2.5, Def.number()).unwrap()).toEqual(Native.float(2.5));
  });

  it('refuses a float where an integer is declared', () => {
    const error = expectErr(run(2.5, Def.integer()));
    expect(error.errorCode).toBe(ErrorCode.EXPECTED_INTEGER_GOT_FLOAT);
    expect(error.message).toBe('Expected integer, got float');
  });

  it('enforces the declared integer width', () => {
    expect(run(255, Def.integer('uint8')).unwrap()).toEqual(Native.int(255));
    const error = expectErr(run(256, Def.integer('uint8')));
    expect(error.errorCode).toBe(ErrorCode.INTEGER_OUT_OF_RANGE);
    expect(error.message).toBe('Integer 256 is outside the uint8 range [0, 255]');
    expect(expectErr(run(-1, Def.integer('uint32'))).errorCode).toBe(
      ErrorCode.INTEGER_OUT_OF_RANGE
    );
  });

  it('keeps integers beyond 2^53 as bigint', () => {
    expect(run(2n ** 63n - 1n, Def.integer('int64')).unwrap()).toEqual(
      Native.int(9223372036854775807n)
    );
    expect(run(2n ** 53n + 1n, Def.integer()).unwrap()).toEqual(
      Native.int(9007199254740993n)
    );
    expect(run(42n, Def.integer()).unwrap()).toEqual(Native.int(42));
    expect(run(2n ** 60n, Def.number()).unwrap()).toEqual(Native.float(2 ** 60));
  });

  it('rejects bigint integers outside the declared width', () => {
    const error = expectErr(run(2n ** 63n, Def.integer('int64')));
    expect(error.errorCode).toBe(ErrorCode.INTEGER_OUT_OF_RANGE);
    expect(error.message).toBe(
      'Integer 9223372036854775808 is outside the int64 range [-9223372036854775808, 9223372036854775807]'
    );
    expect(error.context?.value).toBe('9223372036854775808');
  });

  it('rejects numbers past the safe integer range', () => {
    const error = expectErr(run(2 ** 53, Def.integer()));
    expect(error.errorCode).toBe(ErrorCode.INTEGER_OUT_OF_RANGE);
    expect(error.message).toBe('Integer 9007199254740992 cannot be represented exactly');
  });

  it('reports type mismatches with the JSON type found', () => {
    const error = expectErr(run('12', Def.integer(), new Map(), {}, host));
    expect(error.errorCode).toBe(ErrorCode.TYPE_MISMATCH);
    expect(error.message).toBe('Expected integer, got string');
    expect(expectErr(run(1, Def.string())).message).toBe('Expected string, got integer');
    expect(expectErr(run(false, Def.null())).message).toBe('Expected null, got boolean');
    expect(run(null, Def.null()).unwrap()).toEqual(Native.nil());
    expect(run(true, Def.boolean()).unwrap()).toEqual(Native.bool(true));
  });
});

describe('instantiate enums', () => {
  const gender = Def.stringEnum([
    ['MALE', 0],
    ['FEMALE', 1],
  ]);

  it('maps a variant name to its value', () => {
    expect(run('FEMALE', gender).unwrap()).toEqual(Native.int(1));
  });

  it('lists the variants of an unknown name', () => {
    const error = expectErr(run('OTHER', gender));
    expect(error.errorCode).toBe(ErrorCode.UNKNOWN_VARIANT);
    expect(error.message).toBe('Expected one of MALE, FEMALE, got "OTHER"');
    expect(error.context?.suggestion).toBe('Use one of: MALE, FEMALE');
  });
});

describe('instantiate objects', () => {
  const point = Def.object([
    ['x', Def.number()],
    ['y', Def.number()],
  ]);

  it('builds a dictionary in declaration order', () => {
    const value = run({ y: 2, x: 1 }, point).unwrap();
    expect(value.type === 'dictionary' && [...value.entries.keys()]).toEqual(['x', 'y']);
  });

  it('requires exactly the declared number of properties', () => {
    const error = expectErr(run({ x: 1, y: 2, z: 3 }, point));
    expect(error.errorCode).toBe(ErrorCode.PROPERTY_COUNT_MISMATCH);
    expect(error.message).toBe('Expected JSON object to have 2 properties, got 3');
  });

  it('names the missing property when the counts match', () => {
    const error = expectErr(run({ x: 1, z: 2 }, point));
    expect(error.errorCode).toBe(ErrorCode.MISSING_PROPERTY);
    expect(error.message).toBe('Missing property "y"');
  });

  it('passes an open dictionary through untyped', () => {
    const value = run({ a: 1, b: [true, false], c: null }, Def.dictionary()).unwrap();
    expect(value).toEqual(
      Native.dictionary([
        ['a', Native.int(1)],
        ['b', Native.array([Native.bool(true), Native.bool(false)], { type: 'bool' })],
        ['c', Native.nil()],
      ])
    );
  });

  it('points at the failing property', () => {
    const error = expectErr(run({ x: 1, y: 'up' }, point));
    expect(error.context?.path).toBe('/y');
  });
});

describe('instantiate arrays and tuples', () => {
  it('types arrays by their item definition', () => {
    expect(run([1, 2], Def.array(Def.integer())).unwrap()).toEqual(
      Native.array([Native.int(1), Native.int(2)], { type: 'int' })
    );
    expect(run([], Def.array(Def.builtin('Vector2'))).unwrap()).toEqual(
      Native.array([], { type: 'builtin', tag: 'Vector2' })
    );
  });

  it('infers the element type of untyped arrays', () => {
    expect(run(['a', 'b'], Def.array()).unwrap()).toEqual(
      Native.array([Native.string('a'), Native.string('b')], { type: 'string' })
    );
    expect(run([1, 'b'], Def.array()).unwrap()).toEqual(
      Native.array([Native.int(1), Native.string('b')])
    );
    expect(run([null, null], Def.array()).unwrap()).toEqual(
      Native.array([Native.nil(), Native.nil()])
    );
  });

  it('checks tuple arity', () => {
    const pair = Def.tuple([Def.number(), Def.string()]);
    expect(run([1, 'a'], pair).unwrap()).toEqual(
      Native.array([Native.float(1), Native.string('a')])
    );
    const error = expectErr(run([1], pair));
    expect(error.errorCode).toBe(ErrorCode.TUPLE_ARITY_MISMATCH);
    expect(error.message).toBe('Expected tuple of 2 items, got 1');
  });

  it('reports the index of a failing item', () => {
    const error = expectErr(run([1, 2.5], Def.array(Def.integer())));
    expect(error.context?.path).toBe('/1');
  });
});

describe('instantiate built-ins', () => {
  it('converts through the catalog definition', () => {
    expect(run({ x: 1, y: 2 }, Def.builtin('Vector2i')).unwrap()).toEqual(
      Native.builtin(
        'Vector2i',
        Native.dictionary([
          ['x', Native.int(1)],
          ['y', Native.int(2)],
        ])
      )
    );
    expect(expectErr(run({ x: 1.5, y: 2 }, Def.builtin('Vector2i'))).errorCode).toBe(
      ErrorCode.EXPECTED_INTEGER_GOT_FLOAT
    );
  });

  it('converts nested built-ins and tuples', () => {
    const row = { x: 1, y: 0, z: 0 };
    const value = run({ rows: [row, row, row] }, Def.builtin('Basis')).unwrap();
    expect(toPlain(value)).toEqual({ rows: [row, row, row] });
  });
});

describe('instantiate classes', () => {
  const person = RootSchema.generate(namedClass('Person'), host).unwrap();

  it('constructs the object and assigns every property', () => {
    const value = person
      .instantiate({ name: 'Ada', age: 36, gender: 'FEMALE' }, host)
      .unwrap();
    expect(value.type).toBe('object');
    if (value.type === 'object') {
      expect(value.className).toBe('Person');
      expect(value.handle).toBeInstanceOf(ManifestObject);
    }
    expect(toPlain(value, host.describeObject)).toEqual({
      $class: 'Person',
      name: 'Ada',
      age: 36,
      gender: 1,
    });
  });

  it('rejects unknown keys before missing ones', () => {
    const error = expectErr(person.instantiate({ name: 'Ada', nickname: 'A' }, host));
    expect(error.errorCode).toBe(ErrorCode.UNKNOWN_PROPERTY);
    expect(error.message).toBe('Class "Person" has no property "nickname"');
    expect(error.context?.path).toBe('/nickname');
  });

  it('names a missing property', () => {
    const error = expectErr(person.instantiate({ name: 'Ada', age: 36 }, host));
    expect(error.errorCode).toBe(ErrorCode.MISSING_PROPERTY);
    expect(error.message).toBe('Missing property "gender" of class "Person"');
  });

  it('requires a JSON object', () => {
    const error = expectErr(person.instantiate([1], host));
    expect(error.errorCode).toBe(ErrorCode.TYPE_MISMATCH);
    expect(error.message).toBe('Expected an object for class "Person", got array');
  });

  it('follows references of recursive classes', () => {
    const tree = RootSchema.generate(namedClass('TreeNode'), host).unwrap();
    const value = tree
      .instantiate({ value: 1, children: [{ value: 2, children: [] }] }, host)
      .unwrap();
    expect(toPlain(value, host.describeObject)).toEqual({
      $class: 'TreeNode',
      value: 1,
      children: [{ $class: 'TreeNode', value: 2, children: [] }],
    });
  });

  it('wraps construction failures', () => {
    const factory: ObjectFactory = {
      construct: () => {
        throw new Error('abstract class');
      },
      setProperty: () => undefined,
    };
    const error = expectErr(
      person.instantiate({ name: 'Ada', age: 36, gender: 'MALE' }, factory)
    );
    expect(error.errorCode).toBe(ErrorCode.CONSTRUCTION_FAILED);
    expect(error.message).toBe('Host failed to construct an instance of "Person"');
  });

  it('wraps assignment failures with the property path', () => {
    const factory: ObjectFactory = {
      construct: () => ({}),
      setProperty: (_handle, name) => {
        if (name === 'age') throw new Error('read-only');
      },
    };
    const error = expectErr(
      person.instantiate({ name: 'Ada', age: 36, gender: 'MALE' }, factory)
    );
    expect(error.errorCode).toBe(ErrorCode.PROPERTY_ASSIGNMENT_FAILED);
    expect(error.context?.path).toBe('/age');
    expect(error.cause?.message).toBe('read-only');
  });
});

describe('instantiation depth', () => {
  it('stops at the configured nesting depth', () => {
    const error = expectErr(
      run([[[1]]], Def.array(), new Map(), { instantiation: { maxDepth: 2 } })
    );
    expect(error.errorCode).toBe(ErrorCode.DEPTH_LIMIT_EXCEEDED);
    expect(error.context?.path).toBe('/0/0');
  });
});

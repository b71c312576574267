import { describe, expect, it } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { propertyDescriptor } from '../../resolver/property-descriptor.js';
import { expectErr, manifestHost, PERSON, PERSON_WITH_GENDER, TREE_NODE } from '../../test-utils/manifest-fixtures.js';
import { namedClass } from '../class-source.js';
import { Def, withDescription } from '../definition.js';
import { JSON_SCHEMA_DIALECT } from '../serializer.js';
import { RootSchema } from '../root-schema.js';

describe('RootSchema.generate', () => {
  it('emits a class at the root with an empty $defs', () => {
    const root = RootSchema.generate(namedClass('Person'), manifestHost([PERSON])).unwrap();
    expect(root.toJsonCompact()).toBe(
      '{"$schema":"https://json-schema.org/draft/2020-12/schema","$defs":{},' +
        '"type":"object","properties":{"name":{"type":"string"},"age":{"type":"integer"}},' +
        '"required":["name","age"],"additionalProperties":false}'
    );
    expect(root.isWrapped()).toBe(false);
  });

  it('registers enums under their Class.Enum path and skips bookkeeping entries', () => {
    const root = RootSchema.generate(
      namedClass('Person'),
      manifestHost([PERSON_WITH_GENDER])
    ).unwrap();
    const document = root.toDocument();
    expect(document.$defs).toEqual({
      'Person.Gender': { type: 'string', enum: ['MALE', 'FEMALE'] },
    });
    expect(document.properties).toEqual({
      name: { type: 'string' },
      age: { type: 'integer' },
      gender: { $ref: '#/$defs/Person.Gender' },
    });
  });

  it('keeps the root addressable when the class graph points back at it', () => {
    const root = RootSchema.generate(namedClass('TreeNode'), manifestHost([TREE_NODE])).unwrap();
    const document = root.toDocument();
    const node = {
      type: 'object',
      properties: {
        value: { type: 'integer' },
        children: { type: 'array', items: { $ref: '#/$defs/TreeNode' } },
      },
      required: ['value', 'children'],
      additionalProperties: false,
    };
    expect(document.$defs).toEqual({ TreeNode: node });
    expect(document).toEqual({ $schema: JSON_SCHEMA_DIALECT, $defs: { TreeNode: node }, ...node });
  });
});

describe('RootSchema.fromTypeInfo', () => {
  it('wraps a primitive into a value object', () => {
    const root = RootSchema.fromTypeInfo(
      propertyDescriptor({ name: 'value', kind: 'int' }),
      manifestHost([])
    ).unwrap();
    expect(root.isWrapped()).toBe(true);
    expect(root.toDocument()).toEqual({
      $schema: JSON_SCHEMA_DIALECT,
      $defs: {},
      type: 'object',
      properties: { value: { type: 'integer' } },
      required: ['value'],
      additionalProperties: false,
    });
  });

  it('lifts a referenced class to the root', () => {
    const root = RootSchema.fromTypeInfo(
      propertyDescriptor({ name: 'value', kind: 'object', className: 'Person' }),
      manifestHost([PERSON])
    ).unwrap();
    expect(root.base.kind).toBe('class');
    expect(root.defs.size).toBe(0);
  });

  it('lifts an enum and wraps it', () => {
    const root = RootSchema.fromTypeInfo(
      propertyDescriptor({
        name: 'value',
        kind: 'int',
        className: 'Person.Gender',
        usage: 1 << 16,
      }),
      manifestHost([PERSON_WITH_GENDER])
    ).unwrap();
    expect(root.toDocument().properties).toEqual({
      value: { type: 'string', enum: ['MALE', 'FEMALE'] },
    });
  });

  it('keeps a typed array of classes in $defs', () => {
    const root = RootSchema.fromTypeInfo(
      propertyDescriptor({ name: 'value', kind: 'array', hint: 'array_type', hintString: 'Person' }),
      manifestHost([PERSON])
    ).unwrap();
    const document = root.toDocument();
    expect(Object.keys(document.$defs ?? {})).toEqual(['Person']);
    expect(document.properties).toEqual({
      value: { type: 'array', items: { $ref: '#/$defs/Person' } },
    });
  });
});

describe('RootSchema', () => {
  it('emits the root description first', () => {
    const root = new RootSchema(withDescription(Def.object([['a', Def.string()]]), 'Thing'));
    const document = root.toDocument();
    expect(Object.keys(document)).toEqual([
      'description',
      '$schema',
      '$defs',
      'type',
      'properties',
      'required',
      'additionalProperties',
    ]);
    expect(document.description).toBe('Thing');
  });

  it('keeps the description of a wrapped base at the top only', () => {
    const document = new RootSchema(withDescription(Def.integer(), 'Count')).toDocument();
    expect(document.description).toBe('Count');
    expect(document.properties).toEqual({ value: { type: 'integer' } });
  });

  it('emits explicit definitions sorted by name, then the built-in closure', () => {
    const root = new RootSchema(Def.object([['b', Def.ref('B')], ['a', Def.ref('A')]]), [
      ['B', Def.object([['where', Def.builtin('Vector2')]])],
      ['A', Def.string()],
    ]);
    expect(Object.keys(root.toDocument().$defs ?? {})).toEqual(['A', 'B', 'Vector2']);
  });

  it('reports dangling references', () => {
    const root = new RootSchema(Def.object([['a', Def.ref('Missing')]]));
    expect(root.danglingReferences()).toEqual(['Missing']);
    const error = expectErr(root.checkReferences());
    expect(error.errorCode).toBe(ErrorCode.DANGLING_REFERENCE);
    expect(error.message).toBe('Expected definition "Missing" to be in the definition table');
  });

  it('builds the array schema of its base', () => {
    const root = RootSchema.generate(namedClass('Person'), manifestHost([PERSON])).unwrap();
    const list = root.arraySchema('Person');
    expect(list.isWrapped()).toBe(true);
    expect(list.danglingReferences()).toEqual([]);
    expect(list.toDocument().properties).toEqual({
      value: { type: 'array', items: { $ref: '#/$defs/Person' } },
    });
  });

  it('pretty-prints with the requested indent', () => {
    const root = new RootSchema(Def.dictionary());
    expect(root.toJsonPretty(1)).toBe(
      `{\n "$schema": "${JSON_SCHEMA_DIALECT}",\n "$defs": {},\n "type": "object"\n}`
    );
  });
});

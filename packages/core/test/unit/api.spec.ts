import { describe, expect, it } from 'vitest';

import {
  ErrorCode,
  isErr,
  ManifestHost,
  propertyDescriptor,
  SchemaLibrary,
  toPlain,
} from '../../src/index.js';

const MANIFEST = JSON.stringify({
  classes: [
    {
      name: 'Person',
      properties: [
        { name: 'name', kind: 'string' },
        { name: 'age', kind: 'int' },
      ],
    },
  ],
});

function openLibrary(): { host: ManifestHost; library: SchemaLibrary } {
  const host = ManifestHost.fromJson(MANIFEST, 'classes.json').unwrap();
  return { host, library: new SchemaLibrary(host) };
}

describe('Node API: generate', () => {
  it('emits the class schema document', () => {
    const { library } = openLibrary();
    const schema = library.generateNamedClassSchema('Person').unwrap();

    expect(schema.toJsonCompact()).toBe(
      '{"$schema":"https://json-schema.org/draft/2020-12/schema","$defs":{},' +
        '"type":"object","properties":{"name":{"type":"string"},"age":{"type":"integer"}},' +
        '"required":["name","age"],"additionalProperties":false}'
    );
  });

  it('wraps a property type schema into a value object', () => {
    const { library } = openLibrary();
    const schema = library
      .generateTypeInfoSchema(propertyDescriptor({ name: 'tags', kind: 'packed_string_array' }))
      .unwrap();

    expect(schema.document.$defs).toEqual({
      PackedStringArray: { type: 'array', items: { type: 'string' } },
    });
    expect(schema.document.properties).toEqual({
      value: { $ref: '#/$defs/PackedStringArray' },
    });
    expect(schema.document.required).toEqual(['value']);
  });
});

describe('Node API: instantiate', () => {
  it('builds host objects from matching JSON', () => {
    const { host, library } = openLibrary();
    library.generateNamedClassSchema('Person').unwrap();
    const schema = library.getNamedClassSchema('Person').unwrap();

    const value = schema.instantiate('{"name":"Ada","age":36}').unwrap();
    expect(toPlain(value, host.describeObject)).toEqual({
      $class: 'Person',
      name: 'Ada',
      age: 36,
    });
  });

  it('rejects JSON that does not match the schema', () => {
    const { library } = openLibrary();
    const schema = library.generateNamedClassSchema('Person').unwrap();

    const result = schema.instantiate('{"name":"Ada","age":"old"}');
    expect(isErr(result) && result.error.errorCode).toBe(
      ErrorCode.SCHEMA_VALIDATION_FAILED
    );
  });

  it('rejects text that is not JSON', () => {
    const { library } = openLibrary();
    const schema = library.generateNamedClassSchema('Person').unwrap();

    const result = schema.instantiate('{"name":');
    expect(isErr(result) && result.error.errorCode).toBe(ErrorCode.PARSE_ERROR);
  });
});

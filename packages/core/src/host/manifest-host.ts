/**
 * In-process host backed by a JSON class manifest.
 *
 * @example
 * {
 *   "classes": [{
 *     "name": "Person",
 *     "enums": { "Gender": { "MALE": 0, "FEMALE": 1 } },
 *     "properties": [
 *       { "name": "name", "kind": "string" },
 *       { "name": "gender", "kind": "int", "className": "Person.Gender",
 *         "usage": ["STORAGE", "EDITOR", "CLASS_IS_ENUM"] }
 *     ]
 *   }]
 * }
 */

import { Ajv2020 } from 'ajv/dist/2020.js';

import type { NativeValue } from '../instantiate/native-value.js';
import { toPlain } from '../instantiate/native-value.js';
import {
  PROPERTY_HINTS,
  PropertyUsage,
  VALUE_KINDS,
  propertyDescriptor,
  type PropertyDescriptor,
  type PropertyHint,
  type ValueKind,
} from '../resolver/property-descriptor.js';
import {
  classKey,
  namedClass,
  unnamedClass,
  type ClassOrigin,
  type ClassSource,
} from '../schema/class-source.js';
import { ConfigError, type ParseError } from '../types/errors.js';
import { err, isErr, ok, type Result } from '../types/result.js';
import { parseJson, type ExactJsonValue } from '../util/json.js';
import type { ObjectHandle, SchemaHost } from './reflection-host.js';

export type UsageFlag = keyof typeof PropertyUsage;

export interface ManifestProperty {
  name: string;
  kind: ValueKind;
  className?: string;
  hint?: PropertyHint;
  hintString?: string;
  /** Bit mask, or the names of PropertyUsage flags */
  usage?: number | UsageFlag[];
}

export interface ManifestClass {
  name?: string;
  location?: string;
  origin?: ClassOrigin;
  abstract?: boolean;
  properties: ManifestProperty[];
  enums?: Record<string, Record<string, number>>;
}

export interface ManifestDocument {
  classes: ManifestClass[];
}

export const MANIFEST_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  required: ['classes'],
  additionalProperties: false,
  properties: {
    classes: {
      type: 'array',
      items: {
        type: 'object',
        required: ['properties'],
        additionalProperties: false,
        oneOf: [
          { type: 'object', required: ['name'] },
          { type: 'object', required: ['location'] },
        ],
        properties: {
          name: { type: 'string', minLength: 1 },
          location: { type: 'string', minLength: 1 },
          origin: { type: 'string', enum: ['native', 'script'] },
          abstract: { type: 'boolean' },
          properties: {
            type: 'array',
            items: {
              type: 'object',
              required: ['name', 'kind'],
              additionalProperties: false,
              properties: {
                name: { type: 'string' },
                kind: { type: 'string', enum: [...VALUE_KINDS] },
                className: { type: 'string' },
                hint: { type: 'string', enum: [...PROPERTY_HINTS] },
                hintString: { type: 'string' },
                usage: {
                  anyOf: [
                    { type: 'integer', minimum: 0 },
                    {
                      type: 'array',
                      items: { type: 'string', enum: Object.keys(PropertyUsage) },
                    },
                  ],
                },
              },
            },
          },
          enums: {
            type: 'object',
            additionalProperties: {
              type: 'object',
              additionalProperties: { type: 'integer' },
            },
          },
        },
      },
    },
  },
} as const;

const validateManifest = new Ajv2020({ logger: false }).compile<ManifestDocument>(
  MANIFEST_SCHEMA
);

const USAGE_FLAGS: ReadonlyMap<string, number> = new Map(Object.entries(PropertyUsage));

function usageMask(usage: ManifestProperty['usage']): number {
  if (usage === undefined) return PropertyUsage.DEFAULT;
  if (typeof usage === 'number') return usage;
  return usage.reduce((mask, flag) => mask | (USAGE_FLAGS.get(flag) ?? 0), 0);
}

/** Instance created by a ManifestHost */
export class ManifestObject {
  readonly properties = new Map<string, NativeValue>();

  constructor(
    readonly className: string,
    readonly source: ClassSource
  ) {}

  get(name: string): NativeValue | undefined {
    return this.properties.get(name);
  }
}

interface RegisteredClass {
  source: ClassSource;
  label: string;
  manifest: ManifestClass;
  declared: Set<string>;
}

export class ManifestHost implements SchemaHost {
  private readonly byKey = new Map<string, RegisteredClass>();

  private constructor(document: ManifestDocument) {
    for (const manifest of document.classes) {
      const source = manifest.name
        ? namedClass(manifest.name, manifest.origin ?? 'script')
        : unnamedClass(manifest.location ?? '');
      this.byKey.set(classKey(source.id), {
        source,
        label: manifest.name ?? manifest.location ?? '',
        manifest,
        declared: new Set(manifest.properties.map((property) => property.name)),
      });
    }
  }

  static fromDocument(value: unknown): Result<ManifestHost, ConfigError> {
    if (!validateManifest(value)) {
      const first = validateManifest.errors?.[0];
      return err(
        new ConfigError({
          message: `Invalid class manifest: ${first ? `${first.instancePath || '/'} ${first.message ?? ''}`.trim() : 'unknown error'}`,
          context: { setting: 'manifest', path: first?.instancePath },
        })
      );
    }

    const seen = new Set<string>();
    for (const manifest of value.classes) {
      const label = manifest.name ?? manifest.location ?? '';
      if (seen.has(label)) {
        return err(
          new ConfigError({
            message: `Class "${label}" is declared more than once in the manifest`,
            context: { setting: 'manifest', definition: label },
          })
        );
      }
      seen.add(label);
    }
    return ok(new ManifestHost(value));
  }

  static fromJson(
    text: string,
    input = '<manifest>'
  ): Result<ManifestHost, ConfigError | ParseError> {
    const parsed = parseJson(text, input);
    if (isErr(parsed)) {
      return parsed;
    }
    return ManifestHost.fromDocument(parsed.value);
  }

  findClass(name: string): ClassSource | undefined {
    return this.byKey.get(classKey({ kind: 'named', name }))?.source;
  }

  /** Source of an unnamed class, by script location */
  findScript(location: string): ClassSource | undefined {
    return this.byKey.get(classKey({ kind: 'unnamed', location }))?.source;
  }

  propertyList(source: ClassSource): PropertyDescriptor[] {
    return this.require(source).manifest.properties.map((property) =>
      propertyDescriptor({
        name: property.name,
        kind: property.kind,
        className: property.className ?? '',
        hint: property.hint ?? 'none',
        hintString: property.hintString ?? '',
        usage: usageMask(property.usage),
      })
    );
  }

  enumVariants(
    source: ClassSource,
    enumName: string
  ): ReadonlyArray<readonly [string, number]> | undefined {
    const variants = this.require(source).manifest.enums?.[enumName];
    return variants ? Object.entries(variants) : undefined;
  }

  construct(source: ClassSource): ObjectHandle {
    const registered = this.require(source);
    if (registered.manifest.abstract) {
      throw new Error(`Class "${registered.label}" is abstract`);
    }
    return new ManifestObject(registered.label, registered.source);
  }

  setProperty(handle: ObjectHandle, name: string, value: NativeValue): void {
    if (!(handle instanceof ManifestObject)) {
      throw new Error('Handle was not created by this host');
    }
    const registered = this.byKey.get(classKey(handle.source.id));
    if (!registered?.declared.has(name)) {
      throw new Error(`Class "${handle.className}" has no property "${name}"`);
    }
    handle.properties.set(name, value);
  }

  /** Plain JSON view of an instantiated object, for output */
  describeObject = (className: string, handle: object): ExactJsonValue => {
    if (!(handle instanceof ManifestObject)) {
      return { $class: className };
    }
    const out: Record<string, ExactJsonValue> = { $class: className };
    for (const [name, value] of handle.properties) {
      out[name] = toPlain(value, this.describeObject);
    }
    return out;
  };

  private require(source: ClassSource): RegisteredClass {
    const registered = this.byKey.get(classKey(source.id));
    if (!registered) {
      throw new Error(`Class "${classKey(source.id)}" is not in the manifest`);
    }
    return registered;
  }
}

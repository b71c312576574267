/**
 * Fluent construction of hand-written definitions, for schemas that do not
 * come from a host class.
 *
 * @example
 * const point = SchemaBuilder.object()
 *   .description('A labelled point')
 *   .property('label', Def.string())
 *   .property('position', Def.builtin('Vector2'))
 *   .done();
 */

import {
  Def,
  withDescription,
  type EnumDefinition,
  type ObjectDefinition,
  type Type,
} from './definition.js';

export class ObjectBuilder {
  private readonly properties = new Map<string, Type>();
  private text?: string;

  description(text: string): this {
    this.text = text;
    return this;
  }

  property(name: string, type: Type, description?: string): this {
    this.properties.set(
      name,
      description === undefined ? type : withDescription(type, description)
    );
    return this;
  }

  done(): ObjectDefinition {
    const definition = Def.object(this.properties);
    return this.text === undefined
      ? definition
      : withDescription(definition, this.text);
  }
}

export class EnumBuilder {
  private readonly variants = new Map<string, number>();
  private text?: string;

  description(text: string): this {
    this.text = text;
    return this;
  }

  /** Add a variant; without a value it takes the next integer */
  variant(name: string, value?: number): this {
    const next =
      value ?? (this.variants.size === 0 ? 0 : Math.max(...this.variants.values()) + 1);
    this.variants.set(name, next);
    return this;
  }

  done(): EnumDefinition {
    const definition = Def.stringEnum(this.variants);
    return this.text === undefined
      ? definition
      : withDescription(definition, this.text);
  }
}

export const SchemaBuilder = {
  object: (): ObjectBuilder => new ObjectBuilder(),
  stringEnum: (): EnumBuilder => new EnumBuilder(),
} as const;

import {
  ConfigError,
  PROPERTY_HINTS,
  PropertyUsage,
  VALUE_KINDS,
  isPropertyHint,
  isValueKind,
  propertyDescriptor,
  type PropertyDescriptor,
} from '@reflect-schema/core';

export interface CommonFlags {
  manifest: string;
  config?: string;
  debug?: boolean;
  printMetrics?: boolean;
}

export interface ClassTargetFlags extends CommonFlags {
  class?: string;
  location?: string;
}

export interface GenerateFlags extends ClassTargetFlags {
  compact?: boolean;
  responseFormat?: string;
}

export interface InputFlags extends ClassTargetFlags {
  input: string;
}

export interface TypeFlags extends CommonFlags {
  kind?: string;
  className?: string;
  hint?: string;
  hintString?: string;
  enum?: boolean;
  arrayOf?: string;
  compact?: boolean;
}

export type ClassTarget =
  | { kind: 'named'; name: string }
  | { kind: 'unnamed'; location: string };

/**
 * Exactly one of --class and --location
 */
export function resolveClassTarget(flags: ClassTargetFlags): ClassTarget {
  if (flags.class !== undefined && flags.location !== undefined) {
    throw new ConfigError({
      message: 'Use either --class or --location, not both',
      context: { setting: '--class' },
    });
  }
  if (flags.class !== undefined) {
    return { kind: 'named', name: flags.class };
  }
  if (flags.location !== undefined) {
    return { kind: 'unnamed', location: flags.location };
  }
  throw new ConfigError({
    message: 'Missing --class <name> or --location <location>',
    context: { setting: '--class' },
  });
}

/**
 * Build the property descriptor described by the `type` command flags.
 * `--array-of <T>` is shorthand for a typed array of T.
 */
export function parseTypeDescriptor(flags: TypeFlags): PropertyDescriptor {
  if (flags.arrayOf !== undefined) {
    if (flags.kind !== undefined && flags.kind !== 'array') {
      throw new ConfigError({
        message: `--array-of cannot be combined with --kind ${flags.kind}`,
        context: { setting: '--array-of' },
      });
    }
    return propertyDescriptor({
      name: 'value',
      kind: 'array',
      hint: 'array_type',
      hintString: flags.arrayOf,
    });
  }

  const kind = flags.kind;
  if (kind === undefined || !isValueKind(kind)) {
    throw new ConfigError({
      message:
        kind === undefined
          ? 'Missing --kind <kind> or --array-of <type>'
          : `Unknown value kind "${kind}"`,
      context: {
        setting: '--kind',
        suggestion: `Use one of: ${VALUE_KINDS.join(', ')}`,
      },
    });
  }

  const hint = flags.hint ?? 'none';
  if (!isPropertyHint(hint)) {
    throw new ConfigError({
      message: `Unknown property hint "${hint}"`,
      context: {
        setting: '--hint',
        suggestion: `Use one of: ${PROPERTY_HINTS.join(', ')}`,
      },
    });
  }

  return propertyDescriptor({
    name: 'value',
    kind,
    className: flags.className ?? '',
    hint,
    hintString: flags.hintString ?? '',
    usage: flags.enum
      ? PropertyUsage.DEFAULT | PropertyUsage.CLASS_IS_ENUM
      : PropertyUsage.DEFAULT,
  });
}

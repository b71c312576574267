import { describe, expect, it } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import type { ReflectionHost } from '../../host/reflection-host.js';
import { namedClass } from '../../schema/class-source.js';
import { Def } from '../../schema/definition.js';
import {
  expectErr,
  manifestHost,
  OWNER_AND_PET,
  PERSON_WITH_GENDER,
  TREE_NODE,
} from '../../test-utils/manifest-fixtures.js';
import { resolveOptions, type SchemaOptions } from '../../types/options.js';
import { MetricsCollector } from '../../util/metrics.js';
import { generateClass, referenceClass } from '../class-generator.js';
import { createGenerationContext } from '../context.js';

function contextFor(host: ReflectionHost, options: SchemaOptions = {}, metrics?: MetricsCollector) {
  return createGenerationContext(host, resolveOptions(options), metrics);
}

describe('generateClass', () => {
  it('keeps host property order and drops bookkeeping entries', () => {
    const ctx = contextFor(manifestHost([PERSON_WITH_GENDER]));
    const definition = generateClass(namedClass('Person'), ctx).unwrap();
    expect([...definition.properties.keys()]).toEqual(['name', 'age', 'gender']);
  });

  it('keeps grouping entries when asked to', () => {
    const host = manifestHost([
      {
        name: 'Grouped',
        properties: [
          { name: 'Stats', kind: 'string', usage: ['GROUP'] },
          { name: 'hp', kind: 'int' },
        ],
      },
    ]);
    const kept = generateClass(
      namedClass('Grouped'),
      contextFor(host, { generation: { skipGroupingEntries: false } })
    ).unwrap();
    expect([...kept.properties.keys()]).toEqual(['Stats', 'hp']);
  });

  it('applies configured exclusion patterns', () => {
    const ctx = contextFor(manifestHost([PERSON_WITH_GENDER]), {
      generation: { excludePropertyPatterns: ['\\.gd$', '^age$'] },
    });
    const definition = generateClass(namedClass('Person'), ctx).unwrap();
    expect([...definition.properties.keys()]).toEqual(['name', 'gender']);
  });

  it('registers nested classes once and counts them', () => {
    const metrics = new MetricsCollector();
    const ctx = contextFor(manifestHost(OWNER_AND_PET), {}, metrics);
    const owner = generateClass(namedClass('Owner'), ctx).unwrap();
    expect(owner.properties.get('pets')).toEqual(Def.array(Def.ref('Pet')));
    expect([...ctx.defs.keys()]).toEqual(['Pet']);
    expect(ctx.cyclicReferences.size).toBe(0);
    expect(metrics.snapshotMetrics().classesGenerated).toBe(2);
  });

  it('terminates on self-referencing classes', () => {
    const ctx = contextFor(manifestHost([TREE_NODE]));
    const node = generateClass(namedClass('TreeNode'), ctx).unwrap();
    expect(node.properties.get('children')).toEqual(Def.array(Def.ref('TreeNode')));
    expect([...ctx.cyclicReferences]).toEqual(['TreeNode']);
    expect(ctx.inProgress.size).toBe(0);
    expect(ctx.depth).toBe(0);
  });

  it('terminates on mutually recursive classes', () => {
    const host = manifestHost([
      { name: 'A', properties: [{ name: 'b', kind: 'object', className: 'B' }] },
      { name: 'B', properties: [{ name: 'a', kind: 'object', className: 'A' }] },
    ]);
    const ctx = contextFor(host);
    const a = generateClass(namedClass('A'), ctx).unwrap();
    expect(a.properties.get('b')).toEqual(Def.ref('B'));
    expect(ctx.defs.get('B')?.kind).toBe('class');
    expect([...ctx.cyclicReferences]).toEqual(['A']);
  });

  it('fails beyond the configured depth', () => {
    const host = manifestHost([
      { name: 'A', properties: [{ name: 'b', kind: 'object', className: 'B' }] },
      { name: 'B', properties: [{ name: 'c', kind: 'object', className: 'C' }] },
      { name: 'C', properties: [{ name: 'n', kind: 'int' }] },
    ]);
    const ctx = contextFor(host, { generation: { maxDepth: 2 } });
    const error = expectErr(generateClass(namedClass('A'), ctx));
    expect(error.errorCode).toBe(ErrorCode.DEPTH_LIMIT_EXCEEDED);
    expect(error.message).toBe('Class nesting exceeds the maximum depth of 2 at "C"');
    expect(ctx.inProgress.size).toBe(0);
  });

  it('wraps property list failures', () => {
    const host: ReflectionHost = {
      findClass: () => undefined,
      propertyList: () => {
        throw new Error('script failed to load');
      },
      enumVariants: () => undefined,
    };
    const error = expectErr(generateClass(namedClass('Broken'), contextFor(host)));
    expect(error.errorCode).toBe(ErrorCode.PROPERTY_LIST_FAILED);
    expect(error.message).toBe('Host failed to list the properties of "Broken"');
    expect(error.cause?.message).toBe('script failed to load');
  });

  it('propagates the first resolution failure', () => {
    const host = manifestHost([
      {
        name: 'Bad',
        properties: [
          { name: 'ok', kind: 'int' },
          { name: 'signal', kind: 'signal' },
        ],
      },
    ]);
    const error = expectErr(generateClass(namedClass('Bad'), contextFor(host)));
    expect(error.errorCode).toBe(ErrorCode.UNSUPPORTED_KIND);
  });
});

describe('referenceClass', () => {
  it('returns a reference without regenerating a registered class', () => {
    const metrics = new MetricsCollector();
    const ctx = contextFor(manifestHost(OWNER_AND_PET), {}, metrics);
    expect(referenceClass(namedClass('Pet'), ctx).unwrap()).toEqual(Def.ref('Pet'));
    expect(referenceClass(namedClass('Pet'), ctx).unwrap()).toEqual(Def.ref('Pet'));
    expect(metrics.snapshotMetrics().classesGenerated).toBe(1);
  });
});

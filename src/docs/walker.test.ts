/**
 * Unit tests for the module spec walker
 */

import { describe, it, expect, jest } from '@jest/globals';
import { createExclusion, isExcluded, parseSpecs, walkSpecs } from './walker.js';
import { ValidationError } from '../errors/index.js';
import { FakeModuleHost, collect, createTestLogger } from '../__tests__/utils.js';

function createPackageHost(): FakeModuleHost {
  return new FakeModuleHost({
    pkg: {},
    'pkg.a': {},
    'pkg.a.deep': {},
    'pkg.b': {},
    'pkg.sub': {},
    'pkg.sub.x': {},
    other: {},
  });
}

describe('parseSpecs', () => {
  it('should split plain names from exclusions', () => {
    const parsed = parseSpecs(['pkg', '!pkg.sub', 'other']);

    expect(parsed.includes).toEqual(['pkg', 'other']);
    expect(parsed.exclusions.map(rule => rule.pattern)).toEqual(['pkg.sub']);
  });

  it('should de-duplicate plain names keeping the first position', () => {
    expect(parseSpecs(['b', 'a', 'b']).includes).toEqual(['b', 'a']);
  });

  it('should reject malformed names', () => {
    expect(() => parseSpecs(['pkg..sub'])).toThrow(ValidationError);
    expect(() => parseSpecs(['pkg..sub'])).toThrow('Invalid module spec: "pkg..sub"');
    expect(() => parseSpecs([''])).toThrow(ValidationError);
  });

  it('should reject malformed exclusions', () => {
    expect(() => parseSpecs(['!'])).toThrow('Invalid exclusion spec: "!"');
    expect(() => parseSpecs(['!pkg/sub'])).toThrow(ValidationError);
  });
});

describe('createExclusion', () => {
  it('should match a name and its descendants', () => {
    const rule = createExclusion('pkg.sub');

    expect(rule.matches('pkg.sub')).toBe(true);
    expect(rule.matches('pkg.sub.x')).toBe(true);
    expect(rule.matches('pkg.subway')).toBe(false);
    expect(rule.matches('pkg')).toBe(false);
  });

  it('should match only descendants with a trailing dot', () => {
    const rule = createExclusion('pkg.');

    expect(rule.matches('pkg')).toBe(false);
    expect(rule.matches('pkg.a')).toBe(true);
    expect(rule.matches('pkg.a.deep')).toBe(true);
  });

  it('should match globs against full names and their descendants', () => {
    const rule = createExclusion('pkg.*_test');

    expect(rule.matches('pkg.io_test')).toBe(true);
    expect(rule.matches('pkg.io_test.helpers')).toBe(true);
    expect(rule.matches('pkg.io')).toBe(false);
    expect(createExclusion('p?g').matches('pkg')).toBe(true);
  });

  it('should treat dollar signs literally in globs', () => {
    const rule = createExclusion('$*');

    expect(rule.matches('$internal')).toBe(true);
    expect(rule.matches('internal')).toBe(false);
  });
});

describe('isExcluded', () => {
  it('should report whether any rule matches', () => {
    const rules = [createExclusion('a'), createExclusion('b.c')];

    expect(isExcluded('a.x', rules)).toBe(true);
    expect(isExcluded('b.c', rules)).toBe(true);
    expect(isExcluded('b', rules)).toBe(false);
    expect(isExcluded('a', [])).toBe(false);
  });
});

describe('walkSpecs', () => {
  it('should yield each spec followed by its submodules depth-first', async () => {
    const names = await collect(walkSpecs(['pkg', 'other'], createPackageHost()));

    expect(names).toEqual(['pkg', 'pkg.a', 'pkg.a.deep', 'pkg.b', 'pkg.sub', 'pkg.sub.x', 'other']);
  });

  it('should skip an excluded subtree', async () => {
    const names = await collect(walkSpecs(['pkg', '!pkg.sub'], createPackageHost()));

    expect(names).toEqual(['pkg', 'pkg.a', 'pkg.a.deep', 'pkg.b']);
  });

  it('should apply exclusions listed after the names they exclude', async () => {
    const names = await collect(walkSpecs(['pkg', '!pkg.a', '!pkg.b'], createPackageHost()));

    expect(names).toEqual(['pkg', 'pkg.sub', 'pkg.sub.x']);
  });

  it('should not descend into excluded modules', async () => {
    const host = createPackageHost();

    await collect(walkSpecs(['pkg', '!pkg.sub'], host));

    expect(host.introspected).not.toContain('pkg.sub');
  });

  it('should yield every name at most once', async () => {
    const names = await collect(walkSpecs(['pkg', 'pkg.sub', 'pkg'], createPackageHost()));

    expect(names).toEqual(['pkg', 'pkg.a', 'pkg.a.deep', 'pkg.b', 'pkg.sub', 'pkg.sub.x']);
  });

  it('should skip names the host cannot find with a warning', async () => {
    const logger = createTestLogger();
    const warn = jest.spyOn(logger, 'warn');

    const names = await collect(walkSpecs(['missing', 'other'], createPackageHost(), { logger }));

    expect(names).toEqual(['other']);
    expect(warn).toHaveBeenCalledWith('Cannot find spec for missing, skipping', { module: 'missing' });
  });

  it('should fail when nothing matches', async () => {
    await expect(collect(walkSpecs(['missing'], createPackageHost()))).rejects.toThrow(
      'No modules found matching spec'
    );
    await expect(collect(walkSpecs(['pkg', '!pkg'], createPackageHost()))).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it('should validate specs before anything is pulled', () => {
    expect(() => walkSpecs(['pkg', 'bad name'], createPackageHost())).toThrow(ValidationError);
  });

  it('should only introspect as names are pulled', async () => {
    const host = createPackageHost();
    const iterator = walkSpecs(['pkg'], host)[Symbol.asyncIterator]();

    expect(host.introspected).toEqual([]);

    const first = await iterator.next();
    expect(first.value).toBe('pkg');
    expect(host.introspected).toEqual([]);

    await iterator.next();
    expect(host.introspected).toEqual(['pkg']);
  });
});

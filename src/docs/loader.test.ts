/**
 * Unit tests for the module loader
 */

import { describe, it, expect } from '@jest/globals';
import { ancestorPrefixes, compareModuleNames, isCovered, loadModules, type LoadStatus } from './loader.js';
import { walkSpecs } from './walker.js';
import { FakeModuleHost } from '../__tests__/utils.js';

describe('ancestorPrefixes', () => {
  it('should list proper prefixes from the top', () => {
    expect(ancestorPrefixes('a.b.c')).toEqual(['a', 'a.b']);
    expect(ancestorPrefixes('a')).toEqual([]);
  });
});

describe('isCovered', () => {
  it('should cover a name and everything below it', () => {
    const invalid = new Set(['a.b']);

    expect(isCovered('a.b', invalid)).toBe(true);
    expect(isCovered('a.b.c', invalid)).toBe(true);
    expect(isCovered('a', invalid)).toBe(false);
    expect(isCovered('a.bc', invalid)).toBe(false);
  });
});

describe('compareModuleNames', () => {
  it('should order top-level names before nested ones', () => {
    expect(['c.y', 'b', 'a.x', 'a'].sort(compareModuleNames)).toEqual(['a', 'b', 'a.x', 'c.y']);
  });

  it('should compare by code unit within a tier', () => {
    expect(['b', 'B', '_a'].sort(compareModuleNames)).toEqual(['B', '_a', 'b']);
  });
});

describe('loadModules', () => {
  it('should return every module in build order', async () => {
    const host = new FakeModuleHost({ c: {}, 'c.y': {}, a: {}, 'a.x': {}, b: {} });

    const modules = await loadModules(['c', 'c.y', 'a', 'a.x', 'b'], host);

    expect([...modules.keys()]).toEqual(['a', 'b', 'c', 'a.x', 'c.y']);
    expect(modules.get('a')?.isPackage).toBe(true);
  });

  it('should prune the ancestors and descendants of a failed import', async () => {
    const host = new FakeModuleHost({
      pkg: {},
      'pkg.a': {},
      'pkg.b': { fails: 'import' },
      'pkg.b.c': {},
      other: {},
    });

    const modules = await loadModules(['pkg', 'pkg.a', 'pkg.b', 'pkg.b.c', 'other'], host);

    expect([...modules.keys()]).toEqual(['other']);
    expect(host.imported).toEqual(['pkg', 'pkg.a', 'pkg.b', 'other']);
  });

  it('should drop a package whose top-level import fails', async () => {
    const host = new FakeModuleHost({ broken: { fails: 'import' }, 'broken.sub': {}, ok: {} });

    const modules = await loadModules(walkSpecs(['broken', 'ok'], host), host);

    expect([...modules.keys()]).toEqual(['ok']);
    expect(host.imported).toEqual(['broken', 'ok']);
  });

  it('should not retry names already marked invalid', async () => {
    const host = new FakeModuleHost({ x: { fails: 'import' } });

    const modules = await loadModules(['x', 'x'], host);

    expect(modules.size).toBe(0);
    expect(host.imported).toEqual(['x']);
  });

  it('should drop already loaded siblings of a failed leaf', async () => {
    const host = new FakeModuleHost({
      top: {},
      'top.left': {},
      'top.right': { fails: 'import' },
      solo: {},
    });

    const modules = await loadModules(['solo', 'top', 'top.left', 'top.right'], host);

    expect([...modules.keys()]).toEqual(['solo']);
  });

  it('should propagate errors that are not import failures', async () => {
    const host = new FakeModuleHost({ good: {}, bad: { fails: 'fatal' }, later: {} });

    await expect(loadModules(['good', 'bad', 'later'], host)).rejects.toThrow('fatal failure in bad');
    expect(host.imported).toEqual(['good', 'bad']);
  });

  it('should report progress for every candidate', async () => {
    const host = new FakeModuleHost({ p: {}, 'p.bad': { fails: 'import' }, 'p.bad.leaf': {} });
    const events: Array<[string, LoadStatus]> = [];

    await loadModules(['p', 'p.bad', 'p.bad.leaf'], host, {
      onProgress: (name, status) => events.push([name, status]),
    });

    expect(events).toEqual([
      ['p', 'loaded'],
      ['p.bad', 'failed'],
      ['p.bad.leaf', 'skipped'],
    ]);
  });

  it('should pull candidates lazily from an async stream', async () => {
    const host = new FakeModuleHost({ pkg: {}, 'pkg.sub': {}, 'pkg.sub.leaf': {} });

    const modules = await loadModules(walkSpecs(['pkg', '!pkg.sub.leaf'], host), host);

    expect([...modules.keys()]).toEqual(['pkg', 'pkg.sub']);
  });
});

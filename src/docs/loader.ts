/**
 * Module Loader
 * Imports candidate modules, pruning every subtree below an import failure
 */

import { ModuleImportError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type { DocModule, ModuleHost } from '../types/module.js';

export type LoadStatus = 'loaded' | 'failed' | 'skipped';

export interface LoadOptions {
  logger?: Logger;
  onProgress?: (name: string, status: LoadStatus) => void;
}

/**
 * Proper dotted prefixes of a name: `a.b.c` -> [`a`, `a.b`]
 */
export function ancestorPrefixes(name: string): string[] {
  const parts = name.split('.');
  const prefixes: string[] = [];
  for (let i = 1; i < parts.length; i++) {
    prefixes.push(parts.slice(0, i).join('.'));
  }
  return prefixes;
}

/**
 * True when `name` or one of its ancestors is in `invalid`
 */
export function isCovered(name: string, invalid: ReadonlySet<string>): boolean {
  return invalid.has(name) || ancestorPrefixes(name).some(prefix => invalid.has(prefix));
}

/**
 * Top-level names first, then nested names; each tier in code-unit order
 */
export function compareModuleNames(a: string, b: string): number {
  const nestedA = a.includes('.') ? 1 : 0;
  const nestedB = b.includes('.') ? 1 : 0;
  if (nestedA !== nestedB) {
    return nestedA - nestedB;
  }
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Import every candidate in order.
 *
 * A `ModuleImportError` marks the failing name and all of its ancestors invalid;
 * later candidates under an invalid prefix are skipped, and modules that loaded
 * before the failure are dropped from the result. Any other error aborts loading.
 */
export async function loadModules(
  candidates: AsyncIterable<string> | Iterable<string>,
  host: ModuleHost,
  options: LoadOptions = {}
): Promise<Map<string, DocModule>> {
  const { logger, onProgress } = options;
  const loaded = new Map<string, DocModule>();
  const invalid = new Set<string>();

  for await (const name of candidates) {
    if (isCovered(name, invalid)) {
      logger?.debug(`Skipping ${name}, a parent module failed to import`);
      onProgress?.(name, 'skipped');
      continue;
    }

    try {
      loaded.set(name, await host.importModule(name));
      onProgress?.(name, 'loaded');
    } catch (error) {
      if (!(error instanceof ModuleImportError)) {
        throw error;
      }

      logger?.debug(error.message, { module: name });
      for (const prefix of ancestorPrefixes(name)) {
        invalid.add(prefix);
      }
      invalid.add(name);
      onProgress?.(name, 'failed');
    }
  }

  const names = [...loaded.keys()]
    .filter(name => !isCovered(name, invalid))
    .sort(compareModuleNames);

  const result = new Map<string, DocModule>();
  for (const name of names) {
    const module = loaded.get(name);
    if (module) {
      result.set(name, module);
    }
  }
  return result;
}

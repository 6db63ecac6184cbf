/**
 * Module Spec Walker
 * Expands module specs into a lazy stream of candidate module names
 */

import { ValidationError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type { ModuleHost } from '../types/module.js';

const NAME_PATTERN = /^[A-Za-z0-9_$@-]+(\.[A-Za-z0-9_$@-]+)*$/;
const EXCLUDE_PATTERN = /^[A-Za-z0-9_$@*?-]+(\.[A-Za-z0-9_$@*?-]+)*\.?$/;

/**
 * One `!`-prefixed exclusion
 */
export interface ExclusionRule {
  pattern: string;
  matches(name: string): boolean;
}

export interface ParsedSpecs {
  /** Plain names, de-duplicated, in input order */
  includes: string[];
  exclusions: ExclusionRule[];
}

export interface WalkOptions {
  logger?: Logger;
}

/**
 * Validate and split a spec list. Throws `ValidationError` on the first malformed token.
 */
export function parseSpecs(specs: readonly string[]): ParsedSpecs {
  const includes: string[] = [];
  const exclusions: ExclusionRule[] = [];
  const seen = new Set<string>();

  for (const raw of specs) {
    const spec = raw.trim();

    if (spec.startsWith('!')) {
      const pattern = spec.slice(1);
      if (!EXCLUDE_PATTERN.test(pattern)) {
        throw new ValidationError(`Invalid exclusion spec: "${raw}"`, { spec: raw });
      }
      exclusions.push(createExclusion(pattern));
      continue;
    }

    if (!NAME_PATTERN.test(spec)) {
      throw new ValidationError(`Invalid module spec: "${raw}"`, { spec: raw });
    }
    if (!seen.has(spec)) {
      seen.add(spec);
      includes.push(spec);
    }
  }

  return { includes, exclusions };
}

/**
 * Build the matcher for an exclusion pattern (without its `!`).
 *
 * `pkg.sub` matches itself and its descendants, `pkg.` only the descendants of `pkg`,
 * and `*` / `?` are globs over the full dotted name.
 */
export function createExclusion(pattern: string): ExclusionRule {
  if (pattern.endsWith('.')) {
    return { pattern, matches: name => name.startsWith(pattern) };
  }

  if (!/[*?]/.test(pattern)) {
    return { pattern, matches: name => name === pattern || name.startsWith(`${pattern}.`) };
  }

  const source = pattern
    .split('')
    .map(char => {
      if (char === '*') return '.*';
      if (char === '?') return '.';
      return char.replace(/[.$\\^+|()[\]{}-]/g, '\\$&');
    })
    .join('');
  const regex = new RegExp(`^${source}(\\..*)?$`);

  return { pattern, matches: name => regex.test(name) };
}

/**
 * True when any rule excludes `name`
 */
export function isExcluded(name: string, exclusions: readonly ExclusionRule[]): boolean {
  return exclusions.some(rule => rule.matches(name));
}

/**
 * Stream candidate module names for a spec list.
 *
 * Specs are validated immediately; host introspection only happens as names are pulled.
 * Every plain spec yields itself followed by its submodule tree, depth-first.
 */
export function walkSpecs(
  specs: readonly string[],
  host: ModuleHost,
  options: WalkOptions = {}
): AsyncIterable<string> {
  const parsed = parseSpecs(specs);
  return walkParsedSpecs(parsed, host, options);
}

async function* walkParsedSpecs(
  { includes, exclusions }: ParsedSpecs,
  host: ModuleHost,
  { logger }: WalkOptions
): AsyncGenerator<string> {
  const yielded = new Set<string>();

  async function* walkTree(name: string): AsyncGenerator<string> {
    for (const child of await host.submodules(name)) {
      if (yielded.has(child) || isExcluded(child, exclusions)) {
        continue;
      }
      yielded.add(child);
      yield child;
      yield* walkTree(child);
    }
  }

  for (const name of includes) {
    if (yielded.has(name) || isExcluded(name, exclusions)) {
      continue;
    }

    if (!(await host.exists(name))) {
      logger?.warn(`Cannot find spec for ${name}, skipping`, { module: name });
      continue;
    }

    yielded.add(name);
    yield name;
    yield* walkTree(name);
  }

  if (yielded.size === 0) {
    throw new ValidationError('No modules found matching spec', {
      specs: includes,
    });
  }
}

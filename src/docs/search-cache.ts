/**
 * Search fragment cache, one `.json` file of index entries per module
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { PersistentCache } from './cache.js';
import { ErrorCode, SearchIndexError, toError } from '../errors/index.js';
import type { DocModule, ModuleMap } from '../types/module.js';
import type { RenderEngine, SearchEngine, VisibilityPredicate } from '../types/engine.js';
import type { JsonValue, SearchIndexEntry } from '../types/search.js';

/**
 * Module name paired with the module whose fragment it names
 */
export type FragmentKey = readonly [name: string, module: DocModule];

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

export const FragmentSchema = z.array(z.record(z.string(), JsonValueSchema));

export class SearchFragmentCache extends PersistentCache<FragmentKey, SearchIndexEntry[]> {
  private readonly renderEngine: RenderEngine;
  private readonly searchEngine: SearchEngine;
  private readonly isPublic: VisibilityPredicate;

  constructor(root: string, modules: ModuleMap, renderEngine: RenderEngine, searchEngine: SearchEngine) {
    super(root);
    this.renderEngine = renderEngine;
    this.searchEngine = searchEngine;

    // Built once and shared by every compute
    const context = renderEngine.createTemplateContext(modules);
    this.isPublic = member => context.isPublic(member);
  }

  protected keyPath([name]: FragmentKey): string {
    return path.join(...name.split('.')) + '.json';
  }

  protected async save(filePath: string, value: SearchIndexEntry[]): Promise<void> {
    await fs.writeFile(filePath, JSON.stringify(value), 'utf-8');
  }

  protected async load(filePath: string): Promise<SearchIndexEntry[]> {
    const content = await fs.readFile(filePath, 'utf-8');
    return FragmentSchema.parse(JSON.parse(content));
  }

  async compute([name, module]: FragmentKey): Promise<SearchIndexEntry[]> {
    try {
      return this.searchEngine.extractEntries(
        new Map([[name, module]]),
        this.isPublic,
        this.renderEngine.options.docformat
      );
    } catch (error) {
      throw new SearchIndexError(
        `Failed to index ${name}: ${toError(error).message}`,
        ErrorCode.SEARCH_INDEX_ERROR,
        { module: name },
        toError(error)
      );
    }
  }
}

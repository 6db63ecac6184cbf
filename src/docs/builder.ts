/**
 * Site Builder
 * Loads modules, renders them through the page cache and assembles the index and search payload
 */

import { constants as fsConstants } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { HtmlPageCache, modulePagePath } from './html-cache.js';
import { loadModules, type LoadStatus } from './loader.js';
import { SearchFragmentCache } from './search-cache.js';
import { parseSpecs, walkSpecs } from './walker.js';
import {
  ConfigurationError,
  ErrorCode,
  RenderError,
  SearchIndexError,
  toError,
} from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type { RenderEngine, RenderOptions, SearchEngine } from '../types/engine.js';
import type { ModuleHost, ModuleMap } from '../types/module.js';
import type { SearchIndexEntry } from '../types/search.js';

/**
 * Directory under the output root holding every cache
 */
export const CACHE_DIR = '.cache';

export type BuildPhase = 'load' | 'render' | 'index';

export interface BuildProgressEvent {
  phase: BuildPhase;
  name: string;
  status: LoadStatus | 'cached' | 'rendered' | 'indexed';
}

export interface SiteBuilderDependencies {
  host: ModuleHost;
  renderEngine: RenderEngine;
  searchEngine: SearchEngine;
  logger: Logger;
  onProgress?: (event: BuildProgressEvent) => void;
}

export interface BuildOptions extends Partial<RenderOptions> {
  outputDir: string;
}

export interface BuildSummary {
  /** Names of every documented module */
  modules: Set<string>;
  /** Pages rendered in this run */
  rendered: number;
  /** Pages taken from the cache */
  reused: number;
  /** Search fragments computed in this run */
  indexed: number;
  /** Search fragments taken from the cache */
  indexReused: number;
}

export function cacheRoot(outputDir: string): string {
  return path.join(outputDir, CACHE_DIR);
}

export class SiteBuilder {
  private readonly deps: SiteBuilderDependencies;

  constructor(deps: SiteBuilderDependencies) {
    this.deps = deps;
  }

  /**
   * Build the docs for the given module specs
   */
  async build(specs: readonly string[], options: BuildOptions): Promise<BuildSummary> {
    const { host, renderEngine, logger } = this.deps;
    const { outputDir, ...renderOptions } = options;

    parseSpecs(specs);
    await this.prepareOutput(outputDir);

    renderEngine.configure(renderOptions);

    logger.info('Loading modules...');
    const modules = await loadModules(walkSpecs(specs, host, { logger }), host, {
      logger,
      onProgress: (name, status) => this.report({ phase: 'load', name, status }),
    });
    logger.info(`Loaded ${modules.size} modules`);

    const pages = await this.renderModules(modules, outputDir);

    const index = this.renderIndex(modules);
    if (index) {
      await fs.writeFile(path.join(outputDir, 'index.html'), index, 'utf-8');
    }

    const search = await this.renderSearch(modules, path.join(cacheRoot(outputDir), 'search'));
    if (search.script) {
      await fs.writeFile(path.join(outputDir, 'search.js'), search.script, 'utf-8');
    }

    return {
      modules: new Set(modules.keys()),
      rendered: pages.rendered,
      reused: pages.reused,
      indexed: search.indexed,
      indexReused: search.reused,
    };
  }

  private async prepareOutput(outputDir: string): Promise<void> {
    try {
      await fs.mkdir(outputDir, { recursive: true });
      await fs.access(outputDir, fsConstants.W_OK);
    } catch (error) {
      throw new ConfigurationError(
        `Output directory is not writable: ${outputDir}`,
        { outputDir },
        toError(error),
        ErrorCode.OUTPUT_NOT_WRITABLE
      );
    }
  }

  /**
   * Render every module into the page cache and publish it under the output root
   */
  private async renderModules(
    modules: ModuleMap,
    outputDir: string
  ): Promise<{ rendered: number; reused: number }> {
    const { renderEngine, logger } = this.deps;
    const cache = new HtmlPageCache(path.join(cacheRoot(outputDir), 'html'), modules, renderEngine);
    let rendered = 0;
    let reused = 0;

    logger.info(`Rendering ${modules.size} modules...`);
    for (const module of modules.values()) {
      if (await cache.has(module)) {
        reused++;
        this.report({ phase: 'render', name: module.fullname, status: 'cached' });
      } else {
        this.report({ phase: 'render', name: module.fullname, status: 'rendered' });
        await cache.set(module, await cache.compute(module));
        rendered++;
      }

      const target = path.join(outputDir, modulePagePath(module.fullname));
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.copyFile(cache.pathFor(module), target);
    }
    logger.info(`Rendered ${rendered} modules, ${reused} from cache`);

    return { rendered, reused };
  }

  private renderIndex(modules: ModuleMap): string {
    try {
      return this.deps.renderEngine.renderIndex(modules);
    } catch (error) {
      throw new RenderError(
        `Failed to render module index: ${toError(error).message}`,
        ErrorCode.RENDER_INDEX_ERROR,
        undefined,
        toError(error)
      );
    }
  }

  /**
   * Renders the search payload. Does nothing at all when search is disabled.
   */
  private async renderSearch(
    modules: ModuleMap,
    searchCacheRoot: string
  ): Promise<{ script: string; indexed: number; reused: number }> {
    const { renderEngine, searchEngine, logger } = this.deps;
    if (!renderEngine.options.search) {
      return { script: '', indexed: 0, reused: 0 };
    }

    const cache = new SearchFragmentCache(searchCacheRoot, modules, renderEngine, searchEngine);
    const entries: SearchIndexEntry[] = [];

    logger.info(`Indexing ${modules.size} modules...`);
    for (const [name, module] of modules) {
      entries.push(...(await cache.get([name, module])));
      this.report({ phase: 'index', name, status: 'indexed' });
    }

    logger.info('Compiling search index...');
    let script: string;
    try {
      script = renderEngine.renderSearchScript(searchEngine.precompile(entries));
    } catch (error) {
      throw new SearchIndexError(
        `Failed to compile search index: ${toError(error).message}`,
        ErrorCode.SEARCH_PRECOMPILE_ERROR,
        { entries: entries.length },
        toError(error)
      );
    }

    const stats = cache.getStats();
    return { script, indexed: stats.misses, reused: stats.hits };
  }

  private report(event: BuildProgressEvent): void {
    this.deps.logger.debug(`${event.phase} ${event.name}: ${event.status}`);
    this.deps.onProgress?.(event);
  }
}

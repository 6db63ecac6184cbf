/**
 * Rendered page cache, one `.html` file per module
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { PersistentCache } from './cache.js';
import { ErrorCode, RenderError, toError } from '../errors/index.js';
import type { DocModule, ModuleMap } from '../types/module.js';
import type { RenderEngine } from '../types/engine.js';

/**
 * Relative page path of a dotted module name: `pkg.sub` -> `pkg/sub.html`
 */
export function modulePagePath(fullname: string): string {
  return path.join(...fullname.split('.')) + '.html';
}

export class HtmlPageCache extends PersistentCache<DocModule, string> {
  private readonly modules: ModuleMap;
  private readonly engine: RenderEngine;

  constructor(root: string, modules: ModuleMap, engine: RenderEngine) {
    super(root);
    this.modules = modules;
    this.engine = engine;
  }

  protected keyPath(module: DocModule): string {
    return modulePagePath(module.fullname);
  }

  protected async save(filePath: string, value: string): Promise<void> {
    await fs.writeFile(filePath, value, 'utf-8');
  }

  protected async load(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }

  async compute(module: DocModule): Promise<string> {
    try {
      return this.engine.renderModule(module, this.modules);
    } catch (error) {
      throw new RenderError(
        `Failed to render ${module.fullname}: ${toError(error).message}`,
        ErrorCode.RENDER_ERROR,
        { module: module.fullname },
        toError(error)
      );
    }
  }
}

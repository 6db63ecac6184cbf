/**
 * Interfaces of the rendering and search collaborators
 */

import type { DocFormat } from '../config/schema.js';
import type { DocMember, DocModule, ModuleMap } from './module.js';
import type { SearchIndexEntry, SearchPayload } from './search.js';

export interface RenderOptions {
  math: boolean;
  mermaid: boolean;
  /** Global switch for search index generation */
  search: boolean;
  docformat: DocFormat;
}

export type VisibilityPredicate = (member: DocMember) => boolean;

/**
 * Context shared by every page of one build
 */
export interface TemplateContext {
  isPublic: VisibilityPredicate;
}

export interface RenderEngine {
  readonly options: Readonly<RenderOptions>;

  configure(options: Partial<RenderOptions>): void;

  renderModule(module: DocModule, allModules: ModuleMap): string;

  /** Landing page; empty string when there is nothing to list */
  renderIndex(allModules: ModuleMap): string;

  /** Potentially expensive; callers build it once per build */
  createTemplateContext(allModules: ModuleMap): TemplateContext;

  renderSearchScript(payload: SearchPayload): string;
}

export interface SearchEngine {
  extractEntries(
    modules: ModuleMap,
    isPublic: VisibilityPredicate,
    docformat: DocFormat
  ): SearchIndexEntry[];

  precompile(entries: SearchIndexEntry[]): SearchPayload;
}

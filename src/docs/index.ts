/**
 * Documentation build pipeline
 */

// Core modules
export * from './builder.js';
export * from './cache.js';
export * from './html-cache.js';
export * from './loader.js';
export * from './search-cache.js';
export * from './walker.js';

// Re-export types
export type { DocMember, DocModule, MemberKind, ModuleHost, ModuleMap } from '../types/module.js';
export type {
  RenderEngine,
  RenderOptions,
  SearchEngine,
  TemplateContext,
  VisibilityPredicate,
} from '../types/engine.js';
export type { JsonValue, SearchIndexEntry, SearchPayload } from '../types/search.js';

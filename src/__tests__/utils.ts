/**
 * Test utilities and helper functions
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ModuleImportError } from '../errors/index.js';
import type { DocFormat } from '../config/index.js';
import { Logger } from '../logger/index.js';
import { HtmlRenderEngine } from '../render/engine.js';
import { TermSearchEngine } from '../render/search.js';
import type { RenderOptions, TemplateContext, VisibilityPredicate } from '../types/engine.js';
import type { DocMember, DocModule, MemberKind, ModuleHost, ModuleMap } from '../types/module.js';
import type { SearchIndexEntry } from '../types/search.js';

/**
 * Create a mock member for testing
 */
export function createMockMember(
  moduleName: string,
  name: string,
  kind: MemberKind = 'function',
  overrides?: Partial<DocMember>
): DocMember {
  return {
    name,
    qualname: `${moduleName}.${name}`,
    kind,
    ...(kind === 'function' ? { signature: '(input)' } : {}),
    ...overrides,
  };
}

/**
 * Create a mock module for testing
 */
export function createMockModule(fullname: string, overrides?: Partial<DocModule>): DocModule {
  return {
    fullname,
    name: fullname.split('.').pop() ?? fullname,
    members: [createMockMember(fullname, 'run')],
    isPackage: false,
    ...overrides,
  };
}

export interface FakeModuleSpec {
  members?: DocMember[];
  doc?: string;
  /** `import` raises an import-time error, `fatal` any other error */
  fails?: 'import' | 'fatal';
}

/**
 * In-memory module host. A module's submodules are the names exactly one level below it.
 */
export class FakeModuleHost implements ModuleHost {
  readonly imported: string[] = [];
  readonly introspected: string[] = [];
  private readonly modules: Map<string, FakeModuleSpec>;
  private readonly stdlib: string[];

  constructor(modules: Record<string, FakeModuleSpec>, stdlib: string[] = []) {
    this.modules = new Map(Object.entries(modules));
    this.stdlib = stdlib;
  }

  async standardLibrary(): Promise<string[]> {
    return [...this.stdlib];
  }

  async exists(name: string): Promise<boolean> {
    return this.modules.has(name);
  }

  async submodules(name: string): Promise<string[]> {
    this.introspected.push(name);
    return [...this.modules.keys()]
      .filter(other => other.startsWith(`${name}.`) && !other.slice(name.length + 1).includes('.'))
      .sort();
  }

  async importModule(name: string): Promise<DocModule> {
    this.imported.push(name);
    const spec = this.modules.get(name);

    if (!spec || spec.fails === 'import') {
      throw new ModuleImportError(name, new Error(`cannot load ${name}`));
    }
    if (spec.fails === 'fatal') {
      throw new Error(`fatal failure in ${name}`);
    }

    return createMockModule(name, {
      members: spec.members ?? [createMockMember(name, 'run')],
      doc: spec.doc,
      isPackage: (await this.submodules(name)).length > 0,
    });
  }
}

/**
 * Logger that only reports errors
 */
export function createTestLogger(): Logger {
  return new Logger({ level: 'error', format: 'simple', maxFiles: 1, maxSize: '1m' });
}

/**
 * Collect an async iterable into an array
 */
export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const item of items) {
    result.push(item);
  }
  return result;
}

export async function createTempDir(prefix: string = 'modsite-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Bundled render engine that records which pages it rendered
 */
export class RecordingRenderEngine extends HtmlRenderEngine {
  readonly rendered: string[] = [];
  readonly configured: Partial<RenderOptions>[] = [];
  contextsCreated = 0;

  override configure(options: Partial<RenderOptions>): void {
    this.configured.push({ ...options });
    super.configure(options);
  }

  override renderModule(module: DocModule, allModules: ModuleMap): string {
    this.rendered.push(module.fullname);
    return super.renderModule(module, allModules);
  }

  override createTemplateContext(allModules: ModuleMap): TemplateContext {
    this.contextsCreated++;
    return super.createTemplateContext(allModules);
  }
}

/**
 * Bundled search engine that records the arguments of every extraction
 */
export class RecordingSearchEngine extends TermSearchEngine {
  readonly extracted: Array<{ names: string[]; docformat: DocFormat }> = [];

  override extractEntries(
    modules: ModuleMap,
    isPublic: VisibilityPredicate,
    docformat: DocFormat
  ): SearchIndexEntry[] {
    this.extracted.push({ names: [...modules.keys()], docformat });
    return super.extractEntries(modules, isPublic, docformat);
  }
}

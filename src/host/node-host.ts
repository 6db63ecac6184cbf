/**
 * Node.js module host
 * Resolves dotted names against builtins and installed packages and imports them with require
 */

import { existsSync } from 'fs';
import * as fs from 'fs/promises';
import { builtinModules, createRequire } from 'module';
import * as path from 'path';
import { ErrorCode, ModsiteError, ModuleImportError, toError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type { DocMember, DocModule, MemberKind, ModuleHost } from '../types/module.js';

/**
 * `pkg.sub.leaf` -> `pkg/sub/leaf`
 */
export function toSpecifier(name: string): string {
  return name.split('.').join('/');
}

/**
 * `pkg/sub/leaf` -> `pkg.sub.leaf`
 */
export function toDottedName(specifier: string): string {
  return specifier.split('/').join('.');
}

/**
 * Package part of a specifier, honouring scopes: `@scope/pkg/sub` -> `@scope/pkg`
 */
export function packageNameOf(specifier: string): string {
  const parts = specifier.split('/');
  return specifier.startsWith('@') ? parts.slice(0, 2).join('/') : parts[0] ?? specifier;
}

interface PackageInfo {
  name: string;
  /** Literal subpath exports without the leading `./`, e.g. `sub/leaf` */
  subpaths: string[];
}

export class NodeModuleHost implements ModuleHost {
  readonly root: string;
  private readonly requireFromRoot: NodeJS.Require;
  private readonly packages = new Map<string, PackageInfo | null>();
  private readonly logger: Logger | undefined;

  constructor(root: string = process.cwd(), logger?: Logger) {
    this.root = path.resolve(root);
    this.logger = logger;
    this.requireFromRoot = createRequire(path.join(this.root, 'package.json'));
  }

  async standardLibrary(): Promise<string[]> {
    // `node:`-only builtins have no dotted name
    return builtinModules
      .filter(name => !name.startsWith('_') && !name.includes('/_') && !name.includes(':'))
      .map(toDottedName)
      .sort();
  }

  async exists(name: string): Promise<boolean> {
    const specifier = toSpecifier(name);
    if (isBuiltin(specifier)) {
      return true;
    }

    const pkg = await this.findPackage(packageNameOf(specifier));
    if (!pkg) {
      return false;
    }
    if (specifier === pkg.name) {
      return true;
    }
    return pkg.subpaths.includes(specifier.slice(pkg.name.length + 1));
  }

  async submodules(name: string): Promise<string[]> {
    const specifier = toSpecifier(name);

    let candidates: string[];
    if (isBuiltin(specifier)) {
      candidates = builtinModules.filter(builtin => !builtin.includes('/_'));
    } else {
      const pkg = await this.findPackage(packageNameOf(specifier));
      if (!pkg) {
        return [];
      }
      candidates = [pkg.name, ...pkg.subpaths.map(subpath => `${pkg.name}/${subpath}`)];
    }

    return nearestDescendants(specifier, candidates).map(toDottedName).sort();
  }

  async importModule(name: string): Promise<DocModule> {
    const specifier = toSpecifier(name);

    let exported: unknown;
    try {
      exported = this.requireFromRoot(specifier);
    } catch (error) {
      throw new ModuleImportError(name, toError(error));
    }

    let isPackage: boolean;
    try {
      isPackage = (await this.submodules(name)).length > 0;
    } catch (error) {
      throw new ModsiteError(
        `Failed to inspect ${name}: ${toError(error).message}`,
        ErrorCode.MODULE_INTROSPECTION_ERROR,
        undefined,
        { module: name },
        toError(error)
      );
    }

    return {
      fullname: name,
      name: name.split('.').pop() ?? name,
      members: describeExports(name, exported),
      isPackage,
    };
  }

  /**
   * Locate an installed package's manifest on the lookup paths of the root.
   * An unreadable manifest makes the package unknown.
   */
  private async findPackage(packageName: string): Promise<PackageInfo | null> {
    const known = this.packages.get(packageName);
    if (known !== undefined) {
      return known;
    }

    let info: PackageInfo | null = null;
    for (const dir of this.requireFromRoot.resolve.paths(packageName) ?? []) {
      const manifest = path.join(dir, packageName, 'package.json');
      if (!existsSync(manifest)) continue;

      try {
        const parsed: unknown = JSON.parse(await fs.readFile(manifest, 'utf-8'));
        info = { name: packageName, subpaths: exportedSubpaths(parsed) };
      } catch (error) {
        this.logger?.warn(`Cannot read package manifest ${manifest}: ${toError(error).message}`, {
          package: packageName,
        });
      }
      break;
    }

    this.packages.set(packageName, info);
    return info;
  }
}

function isBuiltin(specifier: string): boolean {
  return builtinModules.includes(specifier);
}

/**
 * Descendants of `specifier` that have no other candidate between them and it
 */
function nearestDescendants(specifier: string, candidates: readonly string[]): string[] {
  const below = candidates.filter(candidate => candidate.startsWith(`${specifier}/`));
  return below.filter(
    candidate => !below.some(other => other !== candidate && candidate.startsWith(`${other}/`))
  );
}

/**
 * Literal `./x` keys of a manifest's `exports` map.
 * Wildcards and subpaths containing a dot (`./package.json`, `./x.js`) have no dotted name;
 * segments starting with `_` are private.
 */
function exportedSubpaths(manifest: unknown): string[] {
  if (typeof manifest !== 'object' || manifest === null || !('exports' in manifest)) {
    return [];
  }

  const exportsField = manifest.exports;
  if (typeof exportsField !== 'object' || exportsField === null || Array.isArray(exportsField)) {
    return [];
  }

  return Object.keys(exportsField)
    .filter(key => key.startsWith('./') && !key.includes('*'))
    .map(key => key.slice(2))
    .filter(subpath => subpath.length > 0 && !subpath.includes('.'))
    .filter(subpath => !subpath.split('/').some(segment => segment.startsWith('_')));
}

/**
 * Own enumerable exports, sorted by name
 */
export function describeExports(moduleName: string, exported: unknown): DocMember[] {
  if ((typeof exported !== 'object' && typeof exported !== 'function') || exported === null) {
    return [];
  }

  return Object.keys(exported)
    .filter(key => key !== 'default' && key !== '__esModule')
    .sort()
    .map(key => describeMember(moduleName, key, Object.getOwnPropertyDescriptor(exported, key)));
}

function describeMember(
  moduleName: string,
  name: string,
  descriptor: PropertyDescriptor | undefined
): DocMember {
  // Accessors are not invoked; some builtins warn or throw when read
  const value: unknown = descriptor && 'value' in descriptor ? descriptor.value : undefined;
  const kind = memberKind(value);
  const member: DocMember = { name, qualname: `${moduleName}.${name}`, kind };

  if (typeof value === 'function') {
    member.signature = functionSignature(value);
  }

  return member;
}

function memberKind(value: unknown): MemberKind {
  if (typeof value === 'function') {
    return /^class[\s{]/.test(Function.prototype.toString.call(value)) ? 'class' : 'function';
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return 'namespace';
  }
  return 'variable';
}

function functionSignature(fn: Function): string {
  const source = Function.prototype.toString.call(fn);
  const match = /^[^(]*\(([^)]*)\)/.exec(source);
  const params = match?.[1]?.replace(/\s+/g, ' ').trim() ?? '';
  return `(${params})`;
}

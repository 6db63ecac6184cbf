/**
 * Type definitions for resolved modules
 */

/**
 * Kind of an exported member, as far as runtime introspection can tell
 */
export type MemberKind = 'class' | 'function' | 'namespace' | 'variable';

/**
 * One exported member of a module
 */
export interface DocMember {
  name: string;
  /** `<module fullname>.<name>` */
  qualname: string;
  kind: MemberKind;
  /** Parameter list for callables, e.g. `(path, options)` */
  signature?: string;
  doc?: string;
}

/**
 * A successfully imported module, identified by its dotted `fullname`
 */
export interface DocModule {
  fullname: string;
  /** Last segment of `fullname` */
  name: string;
  members: DocMember[];
  /** True when the host reports submodules below this module */
  isPackage: boolean;
  doc?: string;
}

/**
 * Loaded modules keyed by dotted name, in build order
 */
export type ModuleMap = ReadonlyMap<string, DocModule>;

/**
 * Host environment that knows which modules exist and how to import them
 */
export interface ModuleHost {
  /** Names of the implicitly included standard library modules */
  standardLibrary(): Promise<string[]>;

  /** Whether `name` resolves to something importable, without importing it */
  exists(name: string): Promise<boolean>;

  /** Direct submodule names of `name`, in lexical order */
  submodules(name: string): Promise<string[]>;

  /**
   * Import a module.
   * Import-time failures must be raised as `ModuleImportError`; anything else is fatal.
   */
  importModule(name: string): Promise<DocModule>;
}

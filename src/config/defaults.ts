import type { Config } from './schema.js';

/**
 * Standard library subtrees that are excluded unless explicitly configured otherwise.
 * Loading them either emits runtime warnings or pulls in experimental APIs.
 */
export const DEFAULT_IGNORE: readonly string[] = ['!punycode', '!sys', '!wasi', '!trace_events'];

/**
 * Default configuration values
 * These are used when no environment variables or config files override them
 */
export const defaultConfig: Config = {
  logging: {
    level: 'info',
    format: 'simple',
    dir: undefined,
    maxFiles: 5,
    maxSize: '10m',
  },
  build: {
    outputDir: 'docs',
    root: '.',
    includeStdlib: true,
    cache: true,
    ignore: [...DEFAULT_IGNORE],
  },
  render: {
    math: true,
    mermaid: true,
    search: true,
    docformat: 'markdown',
  },
};

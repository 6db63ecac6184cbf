/**
 * CLI Argument Parser
 * Defines the command line options using Commander
 */

import * as path from 'path';
import { Command } from 'commander';
import type { Config } from './config/index.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  EXECUTION_ERROR: 1,
  CONFIG_ERROR: 2,
} as const;

export interface CliOptions {
  modules: string[];
  /** Absolute output directory */
  output: string;
  /** Exclusion specs, each starting with `!` */
  ignore: string[];
  stdlib: boolean;
  cache: boolean;
  open: boolean;
}

interface ProgramOptions {
  output?: string;
  ignore: string[];
  stdlib: boolean;
  cache: boolean;
  open: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Prefix an ignore value with `!` unless it already has one
 */
export function toExclusion(spec: string): string {
  return spec.startsWith('!') ? spec : `!${spec}`;
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  return new Command()
    .name('modsite')
    .description('Generate HTML documentation for importable modules')
    .version('0.1.0')
    .argument('[modules...]', 'List of modules to document')
    .option('-o, --output <dir>', 'Output directory for the generated documentation')
    .option('--ignore <spec>', 'Module to ignore, with its submodules (repeatable)', collect, [])
    .option('--no-stdlib', 'Do not include the standard library modules')
    .option('--no-cache', 'Rebuild the cache')
    .option('--open', 'Open the generated documentation in the default web browser', false)
    .exitOverride();
}

/**
 * Parse user arguments (without the node and script entries) on top of the loaded config
 */
export function parseArgs(args: readonly string[], config: Config): CliOptions {
  const program = createProgram();
  program.parse([...args], { from: 'user' });
  const opts = program.opts<ProgramOptions>();

  return {
    modules: [...program.args],
    output: path.resolve(opts.output ?? config.build.outputDir),
    ignore: [...config.build.ignore, ...opts.ignore.map(toExclusion)],
    stdlib: config.build.includeStdlib && opts.stdlib,
    cache: config.build.cache && opts.cache,
    open: opts.open,
  };
}

/**
 * Module list handed to the builder: standard library, then exclusions, then explicit modules
 */
export function resolveModuleSpecs(options: CliOptions, standardLibrary: readonly string[]): string[] {
  return [...(options.stdlib ? standardLibrary : []), ...options.ignore, ...options.modules];
}

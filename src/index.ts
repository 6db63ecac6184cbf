#!/usr/bin/env node

/**
 * modsite - Entry Point
 * Builds a static documentation site for importable modules
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { CommanderError } from 'commander';
import { EXIT_CODES, parseArgs, resolveModuleSpecs } from './cli.js';
import { getConfig } from './config/index.js';
import { SiteBuilder, cacheRoot } from './docs/builder.js';
import { ConfigurationError, ValidationError, toError } from './errors/index.js';
import { NodeModuleHost } from './host/node-host.js';
import { getLogger, type Logger } from './logger/index.js';
import { HtmlRenderEngine } from './render/engine.js';
import { TermSearchEngine } from './render/search.js';
import { openInViewer } from './utils/exec.js';

async function main(): Promise<number> {
  let logger: Logger | undefined;
  try {
    const config = getConfig();
    logger = getLogger(config.logging);

    const options = parseArgs(process.argv.slice(2), config);
    const host = new NodeModuleHost(config.build.root, logger);
    const specs = resolveModuleSpecs(options, options.stdlib ? await host.standardLibrary() : []);

    if (!options.cache) {
      logger.info('Removing cache', { path: cacheRoot(options.output) });
      await fs.rm(cacheRoot(options.output), { recursive: true, force: true });
    }

    const builder = new SiteBuilder({
      host,
      renderEngine: new HtmlRenderEngine(),
      searchEngine: new TermSearchEngine(),
      logger,
    });

    const summary = await builder.build(specs, {
      outputDir: options.output,
      ...config.render,
    });

    console.log(`Documented ${summary.modules.size} modules`);

    if (options.open) {
      const result = await openInViewer(path.join(options.output, 'index.html'));
      if (result.exitCode !== 0) {
        logger.warn('Could not open the documentation', { stderr: result.stderr });
      }
    }

    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.CONFIG_ERROR;
    }

    if (error instanceof ConfigurationError || error instanceof ValidationError) {
      console.error('Configuration error:', error.message);
      return EXIT_CODES.CONFIG_ERROR;
    }

    // Without a config there is no logger yet
    if (logger) {
      logger.error('Build failed', toError(error));
    } else {
      console.error('Fatal error:', toError(error).message);
    }
    return EXIT_CODES.EXECUTION_ERROR;
  }
}

void main().then(code => {
  process.exitCode = code;
});

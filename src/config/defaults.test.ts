/**
 * Unit tests for default configuration
 */

import { describe, it, expect } from '@jest/globals';
import { DEFAULT_IGNORE, defaultConfig } from './defaults.js';
import { ConfigSchema } from './schema.js';

describe('Default Configuration', () => {
  it('should have valid logging defaults', () => {
    expect(defaultConfig.logging.level).toBe('info');
    expect(defaultConfig.logging.format).toBe('simple');
    expect(defaultConfig.logging.dir).toBeUndefined();
    expect(defaultConfig.logging.maxFiles).toBe(5);
    expect(defaultConfig.logging.maxSize).toBe('10m');
  });

  it('should have valid build defaults', () => {
    expect(defaultConfig.build.outputDir).toBe('docs');
    expect(defaultConfig.build.root).toBe('.');
    expect(defaultConfig.build.includeStdlib).toBe(true);
    expect(defaultConfig.build.cache).toBe(true);
    expect(defaultConfig.build.ignore).toEqual(['!punycode', '!sys', '!wasi', '!trace_events']);
  });

  it('should have valid render defaults', () => {
    expect(defaultConfig.render.math).toBe(true);
    expect(defaultConfig.render.mermaid).toBe(true);
    expect(defaultConfig.render.search).toBe(true);
    expect(defaultConfig.render.docformat).toBe('markdown');
  });

  it('should not share the ignore list with DEFAULT_IGNORE', () => {
    expect(defaultConfig.build.ignore).not.toBe(DEFAULT_IGNORE);
  });

  it('should pass schema validation', () => {
    expect(ConfigSchema.safeParse(defaultConfig).success).toBe(true);
  });
});

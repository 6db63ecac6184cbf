import { z } from 'zod';

/**
 * Configuration Schema using Zod for runtime validation
 * Ensures type safety and validation of all configuration values
 */

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'simple', 'pretty']);
export const DocFormatSchema = z.enum(['markdown', 'plaintext']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: LogFormatSchema.default('simple'),
  dir: z.string().min(1).optional(),
  maxFiles: z.number().int().min(1).default(5),
  maxSize: z.string().regex(/^\d+[bkmg]$/i).default('10m'),
});

export const BuildConfigSchema = z.object({
  outputDir: z.string().min(1).default('docs'),
  root: z.string().min(1).default('.'),
  includeStdlib: z.boolean().default(true),
  cache: z.boolean().default(true),
  ignore: z.array(z.string().startsWith('!')).default([]),
});

export const RenderConfigSchema = z.object({
  math: z.boolean().default(true),
  mermaid: z.boolean().default(true),
  search: z.boolean().default(true),
  docformat: DocFormatSchema.default('markdown'),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  logging: LoggingConfigSchema,
  build: BuildConfigSchema,
  render: RenderConfigSchema,
});

/**
 * TypeScript type derived from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;
export type DocFormat = z.infer<typeof DocFormatSchema>;

/**
 * Schema of the optional `.tfmigrate.yaml` project file.
 */
import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Provider schema generations the tool knows about. */
export const VersionSchema = z.enum(['v4', 'v5']);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Configuration file discovery. */
export const FilePatternsSchema = z.object({
  /** Glob patterns for configuration files to migrate */
  include: z.array(z.string()).default(['**/*.tf']),
  /** Glob patterns for files to leave alone */
  exclude: z.array(z.string()).default([]),
});

export const ConfigSchema = z
  .object({
    source_version: VersionSchema.default('v4'),
    target_version: VersionSchema.default('v5'),
    files: withDefaults(FilePatternsSchema),
    /** State file relative to the project root; terraform.tfstate when unset */
    state_file: z.string().optional(),
    /** Keep a `.backup` copy of every rewritten file */
    backup: z.boolean().default(true),
    log_level: LogLevelSchema.default('info'),
  })
  .refine((config) => config.source_version !== config.target_version, {
    message: 'source_version and target_version must differ',
    path: ['target_version'],
  });

export type Config = z.infer<typeof ConfigSchema>;
export type Version = z.infer<typeof VersionSchema>;

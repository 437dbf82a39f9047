/**
 * Configuration schema for `.sonar/config.yaml`.
 * Every field is defaulted here, so `ConfigSchema.parse({})` is a complete config.
 */
import { z } from 'zod';

/**
 * Makes an object field optional and applies its inner defaults when missing.
 * In Zod 4, .default({}) skips inner defaults, so undefined/null are mapped to {} first.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Output style passed to the Sass backend. */
export const SassStyleSchema = z.enum(['expanded', 'compressed']);

/** Settings for the `sass` backend. */
export const SassSettingsSchema = z.object({
  style: SassStyleSchema.default('expanded'),
  /** Extra directories searched for `@import`/`@use` */
  load_paths: z.array(z.string()).default([]),
  /** Append an inline source map comment to the compiled CSS */
  source_map: z.boolean().default(false),
  /** Emit `@charset`/BOM for non-ASCII output */
  charset: z.boolean().default(true),
});

/** Per-backend settings, one typed block per registered backend. */
export const BackendSettingsSchema = z.object({
  sass: withDefaults(SassSettingsSchema),
});

/** Where cache records are kept. */
export const CacheStoreKindSchema = z.enum(['file', 'memory']);

export const CacheSettingsSchema = z.object({
  store: CacheStoreKindSchema.default('file'),
  /** JSON record file, relative to the project root */
  path: z.string().default('.sonar/cache/records.json'),
});

export const ConfigSchema = z.object({
  /** Root directory for compiled artifacts; each theme gets a subdirectory */
  destination: z.string().default('.sonar/css'),
  /** Directory relative file fragments are resolved against */
  base_dir: z.string().default('.'),
  key_prefix: z.string().regex(/^[A-Za-z0-9_-]+$/).default('sonar'),
  /** Production mode: trust existing artifacts without checking source mtimes */
  live_mode: z.boolean().default(false),
  /** Emit normalized source and compiled output as diagnostic records */
  debug: z.boolean().default(false),
  /** Compiler backend id; unknown ids fall back to the no-backend adapter */
  backend: z.string().default('none'),
  compile_timeout_ms: z.number().int().positive().default(30_000),
  cache: withDefaults(CacheSettingsSchema),
  backends: withDefaults(BackendSettingsSchema),
});

export type SassStyle = z.infer<typeof SassStyleSchema>;
export type SassSettings = z.infer<typeof SassSettingsSchema>;
export type BackendSettings = z.infer<typeof BackendSettingsSchema>;
export type CacheSettings = z.infer<typeof CacheSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;

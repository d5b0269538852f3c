/**
 * Configuration schema. Keys in the YAML document are snake_case.
 */
import { z } from 'zod';

/**
 * Helper to make an object field optional while still applying the inner
 * schema's defaults when the field is missing or null.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

const PatternList = z.array(z.string().min(1)).default([]);

/** Prefix token: letters, digits, '-' and '_', starting with a letter. */
export const PrefixSchema = z
  .string()
  .regex(/^[A-Za-z][A-Za-z0-9_-]*$/, 'prefix must start with a letter and contain only letters, digits, "-" or "_"');

/** One implementation of a spec. */
export const ImplConfigSchema = z.object({
  name: z.string().min(1),
  include: PatternList,
  exclude: PatternList,
  /** Test files; only verify-style annotations belong here */
  test_include: PatternList,
});

/** One specification. */
export const SpecConfigSchema = z.object({
  name: z.string().min(1),
  prefix: PrefixSchema,
  /** Canonical URL of the specification, for display */
  source_url: z.string().url().optional(),
  /** Glob patterns for the markdown documents declaring rules */
  include: PatternList,
  impls: z.array(ImplConfigSchema).default([]),
});

/** Unit-detection strategy family for a language. */
export const UnitFamilySchema = z.enum(['brace', 'indent', 'line']);

/** Comment syntax override for one file extension. */
export const LanguageOverrideSchema = z.object({
  family: UnitFamilySchema.default('brace'),
  line: z.array(z.string().min(1)).default([]),
  block: z.array(z.tuple([z.string().min(1), z.string().min(1)])).default([]),
  quotes: z.array(z.string().length(1)).default(['"', "'"]),
});

export const ScanSettingsSchema = z.object({
  /** Parallel file reads per rebuild (default: 75% of CPUs, min 2, max 16) */
  concurrency: z.number().int().min(1).max(64).optional(),
});

export const WatchSettingsSchema = z.object({
  debounce_ms: z.number().int().min(0).default(200),
});

export const ConfigSchema = z
  .object({
    specs: z.array(SpecConfigSchema).default([]),
    /** Extension (with leading dot) → comment syntax */
    languages: z
      .record(z.string().regex(/^\.[A-Za-z0-9_+-]+$/, 'language keys are extensions such as ".ts"'), LanguageOverrideSchema)
      .default({}),
    scan: withDefaults(ScanSettingsSchema),
    watch: withDefaults(WatchSettingsSchema),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.specs.forEach((spec, index) => {
      if (seen.has(spec.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['specs', index, 'name'],
          message: `duplicate spec name "${spec.name}"`,
        });
      }
      seen.add(spec.name);

      const implNames = new Set<string>();
      spec.impls.forEach((impl, implIndex) => {
        if (implNames.has(impl.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['specs', index, 'impls', implIndex, 'name'],
            message: `duplicate impl name "${impl.name}" in spec "${spec.name}"`,
          });
        }
        implNames.add(impl.name);
      });
    });
  });

export type ImplConfig = z.infer<typeof ImplConfigSchema>;
export type SpecConfig = z.infer<typeof SpecConfigSchema>;
export type UnitFamily = z.infer<typeof UnitFamilySchema>;
export type LanguageOverride = z.infer<typeof LanguageOverrideSchema>;
export type Config = z.infer<typeof ConfigSchema>;
/** Config as written by hand, before defaults are applied. */
export type ConfigInput = z.input<typeof ConfigSchema>;

import { z } from 'zod';

// =============================================================================
// Lookup
// =============================================================================

export const LookupConfigSchema = z.object({
  baseUrl: z.string().url().default('https://ipinfo.io/json'),
  token: z
    .string()
    .optional()
    .transform((token) => token || undefined),
  timeout: z.number().int().positive().default(10000),
});

// =============================================================================
// Display & outputs
// =============================================================================

export const DisplayConfigSchema = z.object({
  enabled: z.boolean().default(true),
});

const FileOutputConfigSchema = (defaultPath: string) =>
  z.object({
    enabled: z.boolean().default(true),
    path: z.string().min(1).default(defaultPath),
  });

export const OutputsConfigSchema = z.object({
  json: FileOutputConfigSchema('ipinfo_data.json').default({}),
  csv: FileOutputConfigSchema('ipinfo_data.csv').default({}),
});

// =============================================================================
// Main Config Schema
// =============================================================================

export const GeoLookupConfigSchema = z.object({
  lookup: LookupConfigSchema.default({}),
  display: DisplayConfigSchema.default({}),
  outputs: OutputsConfigSchema.default({}),
});

// =============================================================================
// Type Exports
// =============================================================================

export type LookupConfig = z.infer<typeof LookupConfigSchema>;
export type DisplayConfig = z.infer<typeof DisplayConfigSchema>;
export type FileOutputConfig = z.infer<ReturnType<typeof FileOutputConfigSchema>>;
export type OutputsConfig = z.infer<typeof OutputsConfigSchema>;
export type GeoLookupConfig = z.infer<typeof GeoLookupConfigSchema>;

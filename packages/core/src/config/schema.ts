import { z } from 'zod';

export const ScriptunitConfigSchema = z
  .object({
    verbosity: z.enum(['quiet', 'summary', 'normal', 'verbose']).optional(),
    color: z.enum(['auto', 'always', 'never']).optional(),
    timeoutMs: z.number().int().positive().optional(),
    failOnError: z.boolean().optional()
  })
  .strict();

export type ScriptunitConfig = z.infer<typeof ScriptunitConfigSchema>;

export type ConfigFormat = 'jsonc' | 'json';

export type LoadedConfig = {
  /** Absolute path of the file the config came from, absent when none was found */
  path?: string;
  format?: ConfigFormat;
  config: ScriptunitConfig;
};

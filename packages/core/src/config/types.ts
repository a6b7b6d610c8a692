import { z } from 'zod';

export const CONFIG_FILENAMES = ['feedwire.jsonc', 'feedwire.json'] as const;

export type ConfigFormat = 'jsonc' | 'json';

/**
 * Shape of feedwire.jsonc, before defaults.
 */
export const FeedConfigInputSchema = z
  .object({
    baseUrl: z.string().optional(),
    proId: z.string().optional(),
    proToken: z.string().optional(),
    timeoutMs: z.number().int().nonnegative().optional(),
    headers: z.record(z.string(), z.string()).optional()
  })
  .strict();

export type FeedConfigInput = z.infer<typeof FeedConfigInputSchema>;

export type ResolvedFeedConfig = {
  baseUrl: string;
  proId?: string;
  proToken?: string;
  timeoutMs: number;
  headers: Record<string, string>;
};

export type LoadedConfig = {
  path?: string;
  format?: ConfigFormat;
  config: FeedConfigInput;
};

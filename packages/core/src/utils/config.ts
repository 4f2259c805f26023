import { z } from 'zod';
import { loadConfig } from 'zod-config';
import { envAdapter } from 'zod-config/env-adapter';

/**
 * Centralised configuration schema for Threadtree.
 *
 * All hard-coded defaults belong here – this doubles as live documentation.
 */
export const configSchema = z.object({
  // Runtime environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Log verbosity
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // Serialization layout
  JSON_INDENT: z.coerce.number().int().min(0).max(10).default(4),
  XML_INDENT: z.coerce.number().int().min(0).max(10).default(4),

  // Spaces per depth level in printed traversals
  PRINT_INDENT: z.coerce.number().int().min(0).max(16).default(4),
});

export type AppConfig = z.infer<typeof configSchema>;

// The resolved configuration object, fully validated & typed.
// Top-level await makes sure that every importer sees a ready-to-use value.
export const cfg: AppConfig = await loadConfig({
  schema: configSchema,
  adapters: [envAdapter()],
});

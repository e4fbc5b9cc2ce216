import { z } from 'zod';
import { loadConfig } from 'zod-config';
import { dotEnvAdapter } from 'zod-config/dotenv-adapter';
import { envAdapter } from 'zod-config/env-adapter';
import { DEFAULT_NULL_MARKERS } from '../entities/TreeConstants.js';

// Environment values arrive as strings; `z.coerce.boolean()` would read "false" as true.
const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

const nullMarkerList = z
  .union([z.array(z.number().int()), z.string()])
  .transform((value, ctx) => {
    if (Array.isArray(value)) return value;

    const markers: number[] = [];
    for (const token of value.split(',')) {
      const trimmed = token.trim();
      if (!/^-?\d+$/.test(trimmed)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Invalid null marker "${trimmed}" (expected an integer)`,
        });
        return z.NEVER;
      }
      markers.push(Number.parseInt(trimmed, 10));
    }
    return markers;
  })
  .pipe(z.array(z.number().int()).nonempty('At least one null marker is required'));

/**
 * Centralised configuration schema for Treeloom.
 *
 * All hard-coded defaults belong here – this doubles as live documentation.
 */
export const configSchema = z.object({
  // Runtime environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Log verbosity
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // CLI mode - when true, reduces logging verbosity for better user experience
  CLI_MODE: booleanFlag.default(false),

  // Values read as "no child here" in level-order input, e.g. "-1,-999"
  TREE_NULL_MARKERS: nullMarkerList.default(DEFAULT_NULL_MARKERS.join(',')),

  // Check node counts against input length for pre/post-order (and leftovers for level-order)
  TREE_STRICT_VALIDATION: booleanFlag.default(false),
});

export type AppConfig = z.infer<typeof configSchema>;

// The resolved configuration object, fully validated & typed.
// Top-level await makes sure that every importer sees a ready-to-use value.
export const cfg: AppConfig = await loadConfig({
  schema: configSchema,
  adapters: [
    // Order matters: later adapters win -> env overrides `.env` defaults.
    dotEnvAdapter({ path: '.env', silent: true }),
    envAdapter(),
  ],
});

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

dotenvConfig();

export const DEFAULT_SPITCH_API_URL = 'https://api.spitch.app/v1/speech';

const configSchema = z.object({
  // Spitch
  spitch: z.object({
    apiUrl: z.string().url(),
    apiKey: z.string().optional(),
  }),

  // Awarri (both values are checked at call time, not here)
  awarri: z.object({
    apiUrl: z.string().url().optional(),
    apiKey: z.string().optional(),
  }),

  // Provider HTTP calls
  http: z.object({
    timeoutMs: z.number().int().positive().default(30000),
  }),

  // Generation
  generation: z.object({
    maxTextLength: z.number().int().positive().default(500),
  }),

  // API server
  server: z.object({
    port: z.number().int().min(0).max(65535).default(3000),
  }),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Empty strings in .env files mean "not set".
 */
function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    spitch: {
      apiUrl: optional(env.SPITCH_API_URL) ?? DEFAULT_SPITCH_API_URL,
      apiKey: optional(env.SPITCH_API_KEY),
    },
    awarri: {
      apiUrl: optional(env.AWARRI_TTS_URL),
      apiKey: optional(env.AWARRI_API_KEY),
    },
    http: {
      timeoutMs: parseInt(env.TTS_TIMEOUT_MS ?? '30000', 10),
    },
    generation: {
      maxTextLength: parseInt(env.MAX_TEXT_LENGTH ?? '500', 10),
    },
    server: {
      port: parseInt(env.PORT ?? '3000', 10),
    },
  };

  return configSchema.parse(rawConfig);
}

export const config = parseConfig();

/**
 * Re-read .env over the current environment and parse again
 */
export function reloadConfig(): Config {
  dotenvConfig({ override: true });
  return parseConfig();
}

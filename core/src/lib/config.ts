/**
 * Environment configuration
 *
 * Reads Ollama connection settings and default chain call options
 * from environment variables, validated with Zod.
 */

import { z } from 'zod';
import type { ChainCallOptions } from './chain/options';

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';
export const DEFAULT_OLLAMA_MODEL = 'qwen2.5:7b';

const envSchema = z.object({
  OLLAMA_BASE_URL: z.string().url().default(DEFAULT_OLLAMA_BASE_URL),
  OLLAMA_MODEL: z.string().min(1).default(DEFAULT_OLLAMA_MODEL),
  CHAIN_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
  CHAIN_MAX_TOKENS: z.coerce.number().int().positive().optional(),
  CHAIN_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  DEBUG: z
    .string()
    .optional()
    .transform((value) => value === 'true'),
});

export interface AppConfig {
  ollama: {
    baseUrl: string;
    model: string;
  };
  callOptions: ChainCallOptions;
  debug: boolean;
}

/**
 * Load configuration from the environment
 *
 * Empty strings count as unset.
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new Error(
      `Invalid configuration: ${result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`
    );
  }

  const parsed = result.data;
  const callOptions: ChainCallOptions = {};
  if (parsed.CHAIN_TEMPERATURE !== undefined) {
    callOptions.temperature = parsed.CHAIN_TEMPERATURE;
  }
  if (parsed.CHAIN_MAX_TOKENS !== undefined) {
    callOptions.maxTokens = parsed.CHAIN_MAX_TOKENS;
  }
  if (parsed.CHAIN_TIMEOUT_MS !== undefined) {
    callOptions.timeoutMs = parsed.CHAIN_TIMEOUT_MS;
  }

  return {
    ollama: {
      baseUrl: parsed.OLLAMA_BASE_URL.replace(/\/$/, ''),
      model: parsed.OLLAMA_MODEL,
    },
    callOptions,
    debug: parsed.DEBUG,
  };
}

/**
 * Chain call options
 *
 * Tunables that are meaningful at call time rather than at model
 * construction. They are folded into the model when a chain is built.
 */

import { z } from 'zod';
import { mergeCallOptions } from '../llm/types';
import type { CallOptions, StreamingFunc } from '../llm/types';

export interface ChainCallOptions {
  maxTokens?: number;
  temperature?: number;
  stopWords?: string[];
  topK?: number;
  topP?: number;
  seed?: number;
  minLength?: number;
  maxLength?: number;
  repetitionPenalty?: number;
  timeoutMs?: number; // Forwarded to the model client, which enforces it
  streamingFunc?: StreamingFunc;
}

/**
 * Strict schema: unknown keys are rejected
 */
export const chainCallOptionsSchema: z.ZodType<ChainCallOptions> = z
  .object({
    maxTokens: z.number().int().positive().optional(),
    temperature: z.number().min(0).optional(),
    stopWords: z.array(z.string()).optional(),
    topK: z.number().int().positive().optional(),
    topP: z.number().min(0).max(1).optional(),
    seed: z.number().int().optional(),
    minLength: z.number().int().nonnegative().optional(),
    maxLength: z.number().int().positive().optional(),
    repetitionPenalty: z.number().optional(),
    timeoutMs: z.number().int().positive().optional(),
    streamingFunc: z
      .custom<StreamingFunc>((value) => typeof value === 'function', {
        message: 'Expected a function',
      })
      .optional(),
  })
  .strict();

/**
 * Validate untyped call options (e.g. from JSON or a config file)
 *
 * @throws ZodError if an option is unknown or out of range
 */
export function parseChainCallOptions(input: unknown): ChainCallOptions {
  return chainCallOptionsSchema.parse(input);
}

/**
 * Convert chain options to model-level options. Every field maps 1:1;
 * unset fields are left out so they never override the model's own.
 */
export function toLLMOptions(options: ChainCallOptions): CallOptions {
  const llmOptions: CallOptions = {
    maxTokens: options.maxTokens,
    temperature: options.temperature,
    stopWords: options.stopWords,
    topK: options.topK,
    topP: options.topP,
    seed: options.seed,
    minLength: options.minLength,
    maxLength: options.maxLength,
    repetitionPenalty: options.repetitionPenalty,
    timeoutMs: options.timeoutMs,
    streamingFunc: options.streamingFunc,
  };

  return mergeCallOptions({}, llmOptions);
}

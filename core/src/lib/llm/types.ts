/**
 * LLM Client Interface
 *
 * Abstraction for model providers (Ollama, hosted APIs, test doubles).
 * Chains only depend on this contract, never on a concrete client.
 */

import type { GenerateResult, Message, StreamData } from '../../../../shared/types/messages';

/**
 * Callback receiving each streamed text chunk
 */
export type StreamingFunc = (chunk: string) => void | Promise<void>;

/**
 * Model-level call options
 */
export interface CallOptions {
  maxTokens?: number; // Maximum tokens to generate
  temperature?: number; // 0.0-1.0, lower = more deterministic
  stopWords?: string[];
  topK?: number;
  topP?: number;
  seed?: number;
  minLength?: number;
  maxLength?: number;
  repetitionPenalty?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  timeoutMs?: number; // Abort the request after this many milliseconds
  streamingFunc?: StreamingFunc;
}

/**
 * Per-request options
 */
export interface RequestOptions {
  signal?: AbortSignal; // Aborting cancels the in-flight request
}

/**
 * LLM client interface
 *
 * Implementations: OllamaClient
 */
export interface LLM {
  /**
   * Generate a complete response for the given messages
   *
   * @throws LLMError (or any error) if the request fails
   */
  generate(messages: Message[], request?: RequestOptions): Promise<GenerateResult>;

  /**
   * Open a streamed generation.
   *
   * The promise settles once the stream is established; iteration then
   * yields items lazily and may throw mid-stream.
   */
  stream(messages: Message[], request?: RequestOptions): Promise<AsyncIterable<StreamData>>;

  /**
   * Fold options into the client's own configuration
   */
  addOptions(options: CallOptions): void;
}

/**
 * Failure raised by a model client
 */
export class LLMError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'LLMError';
    this.status = options?.status;
  }
}

/**
 * Merge incoming options over the current ones.
 * Defined incoming values win; undefined never erases an existing value.
 */
export function mergeCallOptions(current: CallOptions, incoming: CallOptions): CallOptions {
  const merged: CallOptions = { ...current };
  for (const [key, value] of Object.entries(incoming)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  return merged;
}

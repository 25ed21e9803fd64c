/**
 * Ollama LLM Client
 *
 * Implementation of LLM for local Ollama instances (chat endpoint).
 * Default: http://localhost:11434 with qwen2.5:7b model
 */

import { z } from 'zod';
import type { GenerateResult, Message, StreamData, TokenUsage } from '../../../../shared/types/messages';
import type { AppConfig } from '../config';
import { DEFAULT_OLLAMA_BASE_URL, DEFAULT_OLLAMA_MODEL } from '../config';
import { toLLMOptions } from '../chain/options';
import { logDebug, logWarn } from '../logging';
import { LLMError, mergeCallOptions } from './types';
import type { CallOptions, LLM, RequestOptions } from './types';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface OllamaClientConfig {
  baseUrl?: string;
  model?: string;
  options?: CallOptions;
  fetchImpl?: FetchLike; // for testing/override
}

/**
 * One line of an Ollama /api/chat response (whole body when not streaming)
 */
const ollamaChatChunkSchema = z
  .object({
    model: z.string().optional(),
    message: z
      .object({
        role: z.string(),
        content: z.string(),
      })
      .optional(),
    done: z.boolean().default(false),
    prompt_eval_count: z.number().optional(),
    eval_count: z.number().optional(),
    error: z.string().optional(),
  })
  .passthrough();

type OllamaChatChunk = z.infer<typeof ollamaChatChunkSchema>;

/**
 * Ollama generation options (the `options` field of a request)
 */
interface OllamaModelOptions {
  temperature?: number;
  num_predict?: number;
  stop?: string[];
  top_k?: number;
  top_p?: number;
  seed?: number;
  repeat_penalty?: number;
  frequency_penalty?: number;
  presence_penalty?: number;
}

function toOllamaOptions(options: CallOptions): OllamaModelOptions {
  return {
    temperature: options.temperature,
    num_predict: options.maxTokens,
    stop: options.stopWords,
    top_k: options.topK,
    top_p: options.topP,
    seed: options.seed,
    repeat_penalty: options.repetitionPenalty,
    frequency_penalty: options.frequencyPenalty,
    presence_penalty: options.presencePenalty,
  };
}

function toTokenUsage(chunk: OllamaChatChunk): TokenUsage | undefined {
  if (chunk.prompt_eval_count === undefined && chunk.eval_count === undefined) {
    return undefined;
  }
  const promptTokens = chunk.prompt_eval_count ?? 0;
  const completionTokens = chunk.eval_count ?? 0;
  return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
}

interface AbortLink {
  signal: AbortSignal;
  dispose: () => void;
}

/**
 * Abort signal that fires on the caller's signal or after the timeout
 */
function linkAbort(signal: AbortSignal | undefined, timeoutMs: number | undefined): AbortLink {
  const controller = new AbortController();
  const onAbort = () => controller.abort(signal?.reason);

  if (signal?.aborted) {
    controller.abort(signal.reason);
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  const timer =
    timeoutMs === undefined
      ? undefined
      : setTimeout(
          () => controller.abort(new LLMError(`Ollama request timed out after ${timeoutMs}ms`)),
          timeoutMs
        );

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
      signal?.removeEventListener('abort', onAbort);
    },
  };
}

interface ChunkReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  cancel(reason?: unknown): Promise<void>;
}

/**
 * Newline-delimited JSON response body, one item per line
 *
 * The reader and the abort link are held from construction, so closing the
 * iterator releases them even if nothing was read yet.
 */
class OllamaChatStream implements AsyncIterableIterator<StreamData> {
  private readonly decoder = new TextDecoder();
  private buffer = '';
  private lines: string[] = [];
  private drained = false; // body fully read
  private closed = false;

  constructor(
    private readonly reader: ChunkReader,
    private readonly abort: AbortLink,
    private readonly toStreamData: (line: string) => StreamData,
    private readonly toError: (error: unknown) => LLMError
  ) {}

  [Symbol.asyncIterator](): this {
    return this;
  }

  async next(): Promise<IteratorResult<StreamData, undefined>> {
    if (this.closed) {
      return { done: true, value: undefined };
    }

    try {
      const line = await this.nextLine();
      if (line === undefined) {
        await this.close();
        return { done: true, value: undefined };
      }
      return { done: false, value: this.toStreamData(line) };
    } catch (error) {
      const failure = this.toError(error);
      await this.close();
      throw failure;
    }
  }

  async return(): Promise<IteratorResult<StreamData, undefined>> {
    await this.close();
    return { done: true, value: undefined };
  }

  private async nextLine(): Promise<string | undefined> {
    while (true) {
      const line = this.lines.shift();
      if (line !== undefined) {
        return line;
      }
      if (this.drained) {
        return undefined;
      }

      const chunk = await this.reader.read();
      if (chunk.done) {
        this.drained = true;
        this.push(this.decoder.decode() + '\n');
      } else {
        this.push(this.decoder.decode(chunk.value, { stream: true }));
      }
    }
  }

  private push(text: string): void {
    this.buffer += text;
    let newline: number;
    while ((newline = this.buffer.indexOf('\n')) >= 0) {
      const line = this.buffer.slice(0, newline).trim();
      this.buffer = this.buffer.slice(newline + 1);
      if (line) {
        this.lines.push(line);
      }
    }
  }

  private async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.lines = [];
    this.abort.dispose();
    if (!this.drained) {
      await this.reader
        .cancel()
        .catch((error: unknown) => logDebug('Ollama stream cancel failed', error));
    }
  }
}

/**
 * Ollama API client
 *
 * Connects to a local Ollama instance running on localhost:11434
 */
export class OllamaClient implements LLM {
  readonly baseUrl: string;
  readonly model: string;
  private options: CallOptions;
  private fetchImpl: FetchLike;

  constructor(config: OllamaClientConfig = {}) {
    this.baseUrl = (
      config.baseUrl ?? (process.env.OLLAMA_BASE_URL || DEFAULT_OLLAMA_BASE_URL)
    ).replace(/\/$/, '');
    this.model = config.model ?? (process.env.OLLAMA_MODEL || DEFAULT_OLLAMA_MODEL);
    this.options = config.options ?? {};
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  /**
   * Create a client from loaded configuration, with its default call options applied
   */
  static fromConfig(config: AppConfig, fetchImpl?: FetchLike): OllamaClient {
    return new OllamaClient({
      baseUrl: config.ollama.baseUrl,
      model: config.ollama.model,
      options: toLLMOptions(config.callOptions),
      fetchImpl,
    });
  }

  /**
   * Current call options (copy)
   */
  getOptions(): CallOptions {
    return { ...this.options };
  }

  addOptions(options: CallOptions): void {
    if (options.minLength !== undefined || options.maxLength !== undefined) {
      logWarn('Ollama does not support minLength/maxLength; ignoring them');
    }
    this.options = mergeCallOptions(this.options, options);
  }

  /**
   * Complete a chat using Ollama
   *
   * With a streamingFunc configured the response is streamed and every
   * chunk is handed to it before the full generation is returned.
   */
  async generate(messages: Message[], request?: RequestOptions): Promise<GenerateResult> {
    const streamingFunc = this.options.streamingFunc;
    if (streamingFunc) {
      const stream = await this.stream(messages, request);
      let generation = '';
      let tokens: TokenUsage | undefined;
      for await (const item of stream) {
        if (item.content) {
          await streamingFunc(item.content);
          generation += item.content;
        }
        tokens = item.tokens ?? tokens;
      }
      return tokens ? { generation, tokens, model: this.model } : { generation, model: this.model };
    }

    const abort = linkAbort(request?.signal, this.options.timeoutMs);
    try {
      const response = await this.post(messages, false, abort.signal);
      const data = this.parseChunk(await response.json());

      if (!data.done) {
        throw new LLMError('Ollama response incomplete');
      }

      const generation = data.message?.content ?? '';
      const tokens = toTokenUsage(data);
      return tokens ? { generation, tokens, model: this.model } : { generation, model: this.model };
    } catch (error) {
      throw this.toLLMError(error, abort.signal);
    } finally {
      abort.dispose();
    }
  }

  /**
   * Stream a chat completion from Ollama (newline-delimited JSON)
   */
  async stream(messages: Message[], request?: RequestOptions): Promise<AsyncIterable<StreamData>> {
    const abort = linkAbort(request?.signal, this.options.timeoutMs);
    let response: Response;
    try {
      response = await this.post(messages, true, abort.signal);
    } catch (error) {
      abort.dispose();
      throw this.toLLMError(error, abort.signal);
    }

    const body = response.body;
    if (!body) {
      abort.dispose();
      throw new LLMError('Ollama stream has no body');
    }
    return new OllamaChatStream(
      body.getReader(),
      abort,
      (line) => this.toStreamData(line),
      (error) => this.toLLMError(error, abort.signal)
    );
  }

  /**
   * Check if Ollama is available
   */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/api/tags`, {
        method: 'GET',
      });
      return response.ok;
    } catch (error) {
      logDebug('Ollama health check failed', error);
      return false;
    }
  }

  private async post(messages: Message[], stream: boolean, signal: AbortSignal): Promise<Response> {
    logDebug(`Ollama request (${this.model}, stream=${stream})`, messages);
    const response = await this.fetchImpl(`${this.baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        messages,
        stream,
        options: toOllamaOptions(this.options),
      }),
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new LLMError(`Ollama API error (${response.status}): ${errorText}`, {
        status: response.status,
      });
    }
    return response;
  }

  private toStreamData(line: string): StreamData {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      throw new LLMError(`Invalid stream chunk from Ollama: ${line}`, { cause: error });
    }

    const chunk = this.parseChunk(raw);
    const tokens = chunk.done ? toTokenUsage(chunk) : undefined;
    const content = chunk.message?.content ?? '';
    return tokens ? { content, value: chunk, tokens } : { content, value: chunk };
  }

  private parseChunk(raw: unknown): OllamaChatChunk {
    const result = ollamaChatChunkSchema.safeParse(raw);
    if (!result.success) {
      throw new LLMError(
        `Unexpected Ollama response: ${result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`
      );
    }
    if (result.data.error) {
      throw new LLMError(`Ollama error: ${result.data.error}`);
    }
    return result.data;
  }

  private toLLMError(error: unknown, signal: AbortSignal): LLMError {
    if (error instanceof LLMError) {
      return error;
    }
    if (signal.aborted) {
      return signal.reason instanceof LLMError
        ? signal.reason
        : new LLMError('Ollama request aborted', { cause: error });
    }
    if (error instanceof Error) {
      // Check if it's a connection error
      if (error.message.includes('fetch failed') || error.message.includes('ECONNREFUSED')) {
        return new LLMError(`Cannot connect to Ollama at ${this.baseUrl}. Is Ollama running?`, {
          cause: error,
        });
      }
      return new LLMError(error.message, { cause: error });
    }
    return new LLMError('Unknown error calling Ollama', { cause: error });
  }
}

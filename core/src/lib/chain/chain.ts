/**
 * Chain Interface
 *
 * Uniform surface over a bag of named inputs. `call` returns the full
 * parsed result, `invoke` only the raw text, `stream` the raw items.
 */

import type { GenerateResult, PromptArgs, StreamData } from '../../../../shared/types/messages';

export const DEFAULT_OUTPUT_KEY = 'output';
export const DEFAULT_RESULT_KEY = 'generateResult';

/**
 * Per-call options
 */
export interface ChainRequestOptions {
  signal?: AbortSignal; // Aborting cancels the model request
}

export interface Chain {
  /**
   * Variable names the chain expects, in the formatter's order
   */
  inputKeys(): string[];

  /**
   * Single-element list holding the output key
   */
  outputKeys(): string[];

  /**
   * Run the chain and return the model result with `generation` parsed
   *
   * @throws ChainError (MissingInput, Format, Model, Parse)
   */
  call(args: PromptArgs, request?: ChainRequestOptions): Promise<GenerateResult>;

  /**
   * Run the chain and return the raw generation (no output parsing)
   *
   * @throws ChainError (MissingInput, Format, Model)
   */
  invoke(args: PromptArgs, request?: ChainRequestOptions): Promise<string>;

  /**
   * Open a stream of raw items. Setup failures reject the promise;
   * later failures are thrown by the iterator as ChainError('Model').
   */
  stream(args: PromptArgs, request?: ChainRequestOptions): Promise<AsyncIterable<StreamData>>;

  /**
   * Run `call` and key the result: `{ [outputKey]: generation, generateResult: result }`
   */
  execute(args: PromptArgs, request?: ChainRequestOptions): Promise<Record<string, unknown>>;
}

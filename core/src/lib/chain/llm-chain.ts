/**
 * LLM Chain
 *
 * Composes a prompt formatter, a model client and an output parser
 * behind the Chain interface. Built (and validated) by LLMChainBuilder.
 */

import type {
  GenerateResult,
  Message,
  PromptArgs,
  StreamData,
} from '../../../../shared/types/messages';
import type { LLM } from '../llm/types';
import type { FormatPrompter, PromptValue } from '../prompt/types';
import type { OutputParser } from '../output-parsers/types';
import { SimpleParser } from '../output-parsers/simple';
import { logDebug } from '../logging';
import type { Chain, ChainRequestOptions } from './chain';
import { DEFAULT_OUTPUT_KEY, DEFAULT_RESULT_KEY } from './chain';
import { ChainError } from './errors';
import { toLLMOptions } from './options';
import type { ChainCallOptions } from './options';

/**
 * Model stream seen through the chain: failures while pulling become
 * ChainError('Model'), and closing it closes the model's iterator.
 */
class ChainStream implements AsyncIterableIterator<StreamData> {
  constructor(private readonly source: AsyncIterator<StreamData>) {}

  [Symbol.asyncIterator](): this {
    return this;
  }

  async next(): Promise<IteratorResult<StreamData, undefined>> {
    let result: IteratorResult<StreamData>;
    try {
      result = await this.source.next();
    } catch (error) {
      throw ChainError.model(error);
    }
    return result.done ? { done: true, value: undefined } : result;
  }

  async return(): Promise<IteratorResult<StreamData, undefined>> {
    try {
      await this.source.return?.();
    } catch (error) {
      throw ChainError.model(error);
    }
    return { done: true, value: undefined };
  }

  /**
   * Close the model stream and rethrow the consumer's error as is
   */
  async throw(error: unknown): Promise<IteratorResult<StreamData, undefined>> {
    await this.return();
    throw error;
  }
}

export class LLMChain implements Chain {
  constructor(
    private readonly prompt: FormatPrompter,
    private readonly llm: LLM,
    readonly outputKey: string,
    private readonly outputParser: OutputParser<string>
  ) {}

  inputKeys(): string[] {
    return this.prompt.inputVariables();
  }

  outputKeys(): string[] {
    return [this.outputKey];
  }

  async call(args: PromptArgs, request?: ChainRequestOptions): Promise<GenerateResult> {
    const messages = await this.render(args);
    const output = await this.generate(messages, request);

    let generation: string;
    try {
      generation = await this.outputParser.parse(output.generation);
    } catch (error) {
      throw ChainError.parse(error);
    }

    return { ...output, generation };
  }

  /**
   * Raw generation; the output parser is deliberately not applied
   */
  async invoke(args: PromptArgs, request?: ChainRequestOptions): Promise<string> {
    const messages = await this.render(args);
    const output = await this.generate(messages, request);
    return output.generation;
  }

  async stream(
    args: PromptArgs,
    request?: ChainRequestOptions
  ): Promise<AsyncIterable<StreamData>> {
    const messages = await this.render(args);

    let source: AsyncIterable<StreamData>;
    try {
      source = await this.llm.stream(messages, request);
    } catch (error) {
      throw ChainError.model(error);
    }

    return new ChainStream(source[Symbol.asyncIterator]());
  }

  async execute(args: PromptArgs, request?: ChainRequestOptions): Promise<Record<string, unknown>> {
    const result = await this.call(args, request);
    return {
      [this.outputKey]: result.generation,
      [DEFAULT_RESULT_KEY]: result,
    };
  }

  /**
   * Check inputs, format the prompt and convert it to chat messages
   */
  private async render(args: PromptArgs): Promise<Message[]> {
    for (const key of this.inputKeys()) {
      if (!Object.hasOwn(args, key)) {
        throw ChainError.missingInput(key);
      }
    }

    let prompt: PromptValue;
    try {
      prompt = await this.prompt.formatPrompt(args);
    } catch (error) {
      throw ChainError.format(error);
    }

    logDebug(`Prompt: ${prompt.toString()}`);
    return prompt.toChatMessages();
  }

  private async generate(
    messages: Message[],
    request?: ChainRequestOptions
  ): Promise<GenerateResult> {
    try {
      return await this.llm.generate(messages, request);
    } catch (error) {
      throw ChainError.model(error);
    }
  }
}

/**
 * Single-use builder for LLMChain
 */
export class LLMChainBuilder {
  private parts: {
    prompt?: FormatPrompter;
    llm?: LLM;
    outputKey?: string;
    options?: ChainCallOptions;
    outputParser?: OutputParser<string>;
  } = {};
  private consumed = false;

  prompt(prompt: FormatPrompter): this {
    this.assertNotConsumed();
    this.parts.prompt = prompt;
    return this;
  }

  llm(llm: LLM): this {
    this.assertNotConsumed();
    this.parts.llm = llm;
    return this;
  }

  outputKey(outputKey: string): this {
    this.assertNotConsumed();
    this.parts.outputKey = outputKey;
    return this;
  }

  /**
   * Call options, folded into the model once at build time
   */
  options(options: ChainCallOptions): this {
    this.assertNotConsumed();
    this.parts.options = options;
    return this;
  }

  outputParser(outputParser: OutputParser<string>): this {
    this.assertNotConsumed();
    this.parts.outputParser = outputParser;
    return this;
  }

  /**
   * Validate the wiring and construct the chain. Consumes the builder.
   *
   * @throws ChainError('MissingObject') if the prompt or LLM is not set
   */
  build(): LLMChain {
    this.assertNotConsumed();
    this.consumed = true;

    const { prompt, llm, outputKey, options, outputParser } = this.parts;
    this.parts = {};

    if (!prompt) {
      throw ChainError.missingObject('Prompt must be set');
    }
    if (!llm) {
      throw ChainError.missingObject('LLM must be set');
    }

    if (options) {
      const llmOptions = toLLMOptions(options);
      logDebug('Folding call options into LLM', llmOptions);
      llm.addOptions(llmOptions);
    }

    return new LLMChain(
      prompt,
      llm,
      outputKey ?? DEFAULT_OUTPUT_KEY,
      outputParser ?? new SimpleParser()
    );
  }

  private assertNotConsumed(): void {
    if (this.consumed) {
      throw new Error('LLMChainBuilder has already been built');
    }
  }
}

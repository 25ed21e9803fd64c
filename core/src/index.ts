/**
 * Prompt-to-model chain core
 *
 * Public entry point.
 */

export type { Chain, ChainRequestOptions } from './lib/chain/chain';
export { DEFAULT_OUTPUT_KEY, DEFAULT_RESULT_KEY } from './lib/chain/chain';
export { ChainError, isChainError } from './lib/chain/errors';
export type { ChainErrorKind } from './lib/chain/errors';
export { LLMChain, LLMChainBuilder } from './lib/chain/llm-chain';
export { chainCallOptionsSchema, parseChainCallOptions, toLLMOptions } from './lib/chain/options';
export type { ChainCallOptions } from './lib/chain/options';

export * from './lib/llm';

export { PromptError, PromptValue } from './lib/prompt/types';
export type { FormatPrompter } from './lib/prompt/types';
export { MessageTemplate, PromptTemplate } from './lib/prompt/template';
export { MessageFormatter } from './lib/prompt/formatter';
export type { MessageOrTemplate } from './lib/prompt/formatter';

export { OutputParserError } from './lib/output-parsers/types';
export type { OutputParser } from './lib/output-parsers/types';
export { SimpleParser } from './lib/output-parsers/simple';
export { JsonOutputParser } from './lib/output-parsers/json';

export { loadConfig } from './lib/config';
export type { AppConfig } from './lib/config';
export { logDebug, logWarn } from './lib/logging';

export { aiMessage, humanMessage, systemMessage } from '../../shared/types/messages';
export type {
  GenerateResult,
  Message,
  MessageRole,
  PromptArgs,
  PromptArgValue,
  StreamData,
  TokenUsage,
} from '../../shared/types/messages';

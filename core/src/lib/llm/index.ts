export { OllamaClient } from './ollama';
export type { FetchLike, OllamaClientConfig } from './ollama';
export { LLMError, mergeCallOptions } from './types';
export type { CallOptions, LLM, RequestOptions, StreamingFunc } from './types';

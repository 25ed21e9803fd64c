/**
 * Chain Data Types
 *
 * Messages, generation results and stream items exchanged between
 * prompt formatters, model clients and chains.
 */

// ============================================================================
// Messages
// ============================================================================

/**
 * Chat roles understood by the model clients
 */
export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * A single chat message
 */
export interface Message {
  role: MessageRole;
  content: string;
}

export function systemMessage(content: string): Message {
  return { role: 'system', content };
}

export function humanMessage(content: string): Message {
  return { role: 'user', content };
}

export function aiMessage(content: string): Message {
  return { role: 'assistant', content };
}

// ============================================================================
// Prompt Arguments
// ============================================================================

export type PromptArgValue = string | number | boolean;

/**
 * Variable name → value, supplied at call time
 */
export type PromptArgs = Record<string, PromptArgValue>;

// ============================================================================
// Model Output
// ============================================================================

/**
 * Token accounting reported by the model (passed through, never computed)
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Result of a one-shot generation.
 *
 * Fields other than `generation` are model metadata and travel
 * through a chain untouched.
 */
export interface GenerateResult {
  generation: string;
  tokens?: TokenUsage;
  [meta: string]: unknown;
}

/**
 * One incremental item of a streamed generation
 */
export interface StreamData {
  content: string; // Text delta carried by this item
  value: unknown; // Raw chunk as received from the model
  tokens?: TokenUsage; // Usually only on the final item
}

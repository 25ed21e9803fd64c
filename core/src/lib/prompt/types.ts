/**
 * Prompt formatter interface
 *
 * A formatter declares the variables it consumes and renders them into
 * a PromptValue, which converts to an ordered list of chat messages.
 */

import { humanMessage } from '../../../../shared/types/messages';
import type { Message, PromptArgs } from '../../../../shared/types/messages';

/**
 * Rendered prompt
 */
export class PromptValue {
  private readonly messages: Message[];

  private constructor(messages: Message[]) {
    this.messages = messages;
  }

  static fromString(text: string): PromptValue {
    return new PromptValue([humanMessage(text)]);
  }

  static fromMessages(messages: Message[]): PromptValue {
    return new PromptValue(messages.map((message) => ({ ...message })));
  }

  toChatMessages(): Message[] {
    return this.messages.map((message) => ({ ...message }));
  }

  toString(): string {
    return this.messages.map((message) => `${message.role}: ${message.content}`).join('\n');
  }
}

/**
 * Formatter interface
 *
 * Implementations: PromptTemplate, MessageFormatter
 */
export interface FormatPrompter {
  /**
   * Variable names this formatter needs, in a stable order
   */
  inputVariables(): string[];

  /**
   * Render the prompt
   *
   * @throws PromptError if a variable is missing or the template is invalid
   */
  formatPrompt(args: PromptArgs): PromptValue | Promise<PromptValue>;
}

export class PromptError extends Error {
  readonly variable?: string;

  constructor(message: string, options?: { variable?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'PromptError';
    this.variable = options?.variable;
  }
}

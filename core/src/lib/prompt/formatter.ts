/**
 * Message Formatter
 *
 * Builds a chat prompt from fixed messages and message templates,
 * kept in the order they were given.
 */

import type { Message, PromptArgs } from '../../../../shared/types/messages';
import { MessageTemplate } from './template';
import { PromptValue } from './types';
import type { FormatPrompter } from './types';

export type MessageOrTemplate = Message | MessageTemplate;

export class MessageFormatter implements FormatPrompter {
  private readonly items: MessageOrTemplate[];

  constructor(items: MessageOrTemplate[] = []) {
    this.items = [...items];
  }

  /**
   * Union of all template variables, in order of first appearance
   */
  inputVariables(): string[] {
    const variables: string[] = [];
    for (const item of this.items) {
      if (item instanceof MessageTemplate) {
        for (const variable of item.inputVariables()) {
          if (!variables.includes(variable)) {
            variables.push(variable);
          }
        }
      }
    }
    return variables;
  }

  formatPrompt(args: PromptArgs): PromptValue {
    return PromptValue.fromMessages(
      this.items.map((item) => (item instanceof MessageTemplate ? item.format(args) : item))
    );
  }
}

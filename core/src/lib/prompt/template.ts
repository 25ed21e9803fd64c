/**
 * F-string prompt templates
 *
 * `{name}` is replaced by the argument of that name; `{{` and `}}`
 * render as literal braces.
 */

import type { Message, MessageRole, PromptArgs } from '../../../../shared/types/messages';
import { PromptError, PromptValue } from './types';
import type { FormatPrompter } from './types';

type TemplatePart = { type: 'literal'; text: string } | { type: 'variable'; name: string };

function parseFString(template: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let literal = '';
  let i = 0;

  const flush = () => {
    if (literal) {
      parts.push({ type: 'literal', text: literal });
      literal = '';
    }
  };

  while (i < template.length) {
    const char = template[i];

    if (char === '{') {
      if (template[i + 1] === '{') {
        literal += '{';
        i += 2;
        continue;
      }
      const close = template.indexOf('}', i + 1);
      if (close < 0) {
        throw new PromptError(`Unclosed '{' at position ${i} in template`);
      }
      const name = template.slice(i + 1, close).trim();
      if (!name) {
        throw new PromptError(`Empty variable name at position ${i} in template`);
      }
      flush();
      parts.push({ type: 'variable', name });
      i = close + 1;
      continue;
    }

    if (char === '}') {
      if (template[i + 1] === '}') {
        literal += '}';
        i += 2;
        continue;
      }
      throw new PromptError(`Single '}' at position ${i} in template`);
    }

    literal += char;
    i += 1;
  }

  flush();
  return parts;
}

/**
 * Template rendered into a single user message
 */
export class PromptTemplate implements FormatPrompter {
  readonly template: string;
  private readonly parts: TemplatePart[];
  private readonly variables: string[];

  /**
   * @param variables - Declared variables; discovered from the template when omitted
   * @throws PromptError if the template is malformed
   */
  constructor(template: string, variables?: string[]) {
    this.template = template;
    this.parts = parseFString(template);

    const discovered: string[] = [];
    for (const part of this.parts) {
      if (part.type === 'variable' && !discovered.includes(part.name)) {
        discovered.push(part.name);
      }
    }
    this.variables = variables ? [...variables] : discovered;
  }

  static fromTemplate(template: string): PromptTemplate {
    return new PromptTemplate(template);
  }

  inputVariables(): string[] {
    return [...this.variables];
  }

  /**
   * Render to a string. Extra arguments are ignored.
   */
  format(args: PromptArgs): string {
    for (const variable of this.variables) {
      if (!Object.hasOwn(args, variable)) {
        throw new PromptError(`Missing variable: ${variable}`, { variable });
      }
    }

    return this.parts
      .map((part) => {
        if (part.type === 'literal') {
          return part.text;
        }
        if (!Object.hasOwn(args, part.name)) {
          throw new PromptError(`Missing variable: ${part.name}`, { variable: part.name });
        }
        return String(args[part.name]);
      })
      .join('');
  }

  formatPrompt(args: PromptArgs): PromptValue {
    return PromptValue.fromString(this.format(args));
  }
}

/**
 * Template for one chat message with a fixed role
 */
export class MessageTemplate {
  readonly role: MessageRole;
  readonly prompt: PromptTemplate;

  constructor(role: MessageRole, prompt: PromptTemplate | string) {
    this.role = role;
    this.prompt = typeof prompt === 'string' ? PromptTemplate.fromTemplate(prompt) : prompt;
  }

  static system(prompt: PromptTemplate | string): MessageTemplate {
    return new MessageTemplate('system', prompt);
  }

  static human(prompt: PromptTemplate | string): MessageTemplate {
    return new MessageTemplate('user', prompt);
  }

  static ai(prompt: PromptTemplate | string): MessageTemplate {
    return new MessageTemplate('assistant', prompt);
  }

  inputVariables(): string[] {
    return this.prompt.inputVariables();
  }

  format(args: PromptArgs): Message {
    return { role: this.role, content: this.prompt.format(args) };
  }
}

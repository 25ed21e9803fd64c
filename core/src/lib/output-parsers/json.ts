/**
 * JSON Output Parser
 *
 * Extracts the JSON object embedded in a model response and validates it
 * with a Zod schema. Models often wrap the object in prose or
 * code fences; only the first balanced object is kept.
 */

import { z } from 'zod';
import { OutputParserError } from './types';
import type { OutputParser } from './types';

/**
 * First balanced `{...}` in the text; braces inside JSON strings do not count
 */
function extractFirstObject(text: string): string | undefined {
  const start = text.indexOf('{');
  if (start < 0) {
    return undefined;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
    } else if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }
  return undefined;
}

export class JsonOutputParser<T> implements OutputParser<string> {
  constructor(private schema: z.ZodType<T, z.ZodTypeDef, unknown>) {}

  /**
   * Parser that accepts any JSON object
   */
  static untyped(): JsonOutputParser<unknown> {
    return new JsonOutputParser(z.unknown());
  }

  /**
   * Parse and validate, returning the object as compact JSON
   */
  async parse(output: string): Promise<string> {
    return JSON.stringify(await this.parseJson(output));
  }

  /**
   * Parse and validate, returning the typed value
   *
   * @throws OutputParserError if no valid JSON object is found or validation fails
   */
  async parseJson(output: string): Promise<T> {
    // Extract JSON from response
    const json = extractFirstObject(output);
    if (json === undefined) {
      throw new OutputParserError('LLM did not return valid JSON', { output });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (error) {
      throw new OutputParserError(
        `Failed to parse JSON from LLM response: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { output, cause: error }
      );
    }

    // Validate against schema
    const validation = this.schema.safeParse(parsed);
    if (!validation.success) {
      throw new OutputParserError(
        `Output validation failed: ${validation.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`,
        { output }
      );
    }
    return validation.data;
  }
}

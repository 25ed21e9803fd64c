/**
 * Output Parser Tests
 *
 * Identity parser and JSON extraction from model responses
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { SimpleParser } from '../src/lib/output-parsers/simple';
import { JsonOutputParser } from '../src/lib/output-parsers/json';
import { OutputParserError } from '../src/lib/output-parsers/types';

describe('SimpleParser', () => {
  it('returns its input unchanged', async () => {
    const parser = new SimpleParser();

    expect(await parser.parse('')).toBe('');
    expect(await parser.parse('  keep\nwhitespace ')).toBe('  keep\nwhitespace ');
  });
});

describe('JsonOutputParser', () => {
  const answerSchema = z.object({
    answer: z.string(),
    confidence: z.number().min(0).max(1).optional(),
  });

  it('extracts JSON from a text response', async () => {
    const parser = new JsonOutputParser(answerSchema);

    const result = await parser.parseJson(`
      Here is the answer:
      {
        "answer": "Lisbon",
        "confidence": 0.9
      }
      Let me know if you need more.
    `);

    expect(result).toEqual({ answer: 'Lisbon', confidence: 0.9 });
  });

  it('returns compact JSON from parse', async () => {
    const parser = new JsonOutputParser(answerSchema);

    expect(await parser.parse('```json\n{ "answer": "yes" }\n```')).toBe('{"answer":"yes"}');
  });

  it('drops fields the schema does not know', async () => {
    const parser = new JsonOutputParser(answerSchema);

    expect(await parser.parse('{"answer": "yes", "extra": true}')).toBe('{"answer":"yes"}');
  });

  it('takes the first object when the response holds several', async () => {
    const parser = new JsonOutputParser(answerSchema);

    expect(await parser.parse('{"answer": "first"} then {"answer": "second"}')).toBe('{"answer":"first"}');
  });

  it('ignores braces inside strings', async () => {
    const parser = new JsonOutputParser(answerSchema);

    expect(await parser.parseJson('{"answer": "a } and a \\" {"} trailing }')).toEqual({
      answer: 'a } and a " {',
    });
  });

  it('throws when the object is never closed', async () => {
    const parser = new JsonOutputParser(answerSchema);

    await expect(parser.parse('{"answer": "cut off')).rejects.toThrow('LLM did not return valid JSON');
  });

  it('accepts any object when untyped', async () => {
    const parser = JsonOutputParser.untyped();

    expect(await parser.parse('{"a": [1, 2], "b": null}')).toBe('{"a":[1,2],"b":null}');
  });

  it('throws when the response has no JSON', async () => {
    const parser = new JsonOutputParser(answerSchema);

    await expect(parser.parse('This is not JSON at all')).rejects.toThrow('LLM did not return valid JSON');
  });

  it('throws when the JSON is malformed', async () => {
    const parser = new JsonOutputParser(answerSchema);

    const error = await parser.parse('{ answer: yes }').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(OutputParserError);
    expect(error).toHaveProperty('output', '{ answer: yes }');
    expect(String(error)).toContain('Failed to parse JSON from LLM response');
  });

  it('throws when validation fails', async () => {
    const parser = new JsonOutputParser(answerSchema);

    await expect(parser.parse('{"answer": 5}')).rejects.toThrow(
      'Output validation failed: answer: Expected string, received number'
    );
  });
});

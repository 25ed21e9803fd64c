/**
 * Output parser interface
 *
 * Post-processes the raw text generated by a model.
 */

export interface OutputParser<T = string> {
  /**
   * @throws OutputParserError if the output cannot be parsed
   */
  parse(output: string): Promise<T>;
}

export class OutputParserError extends Error {
  readonly output?: string; // Raw model output, for debugging

  constructor(message: string, options?: { output?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'OutputParserError';
    this.output = options?.output;
  }
}

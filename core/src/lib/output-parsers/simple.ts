import type { OutputParser } from './types';

/**
 * Identity parser: returns the output unchanged
 */
export class SimpleParser implements OutputParser<string> {
  async parse(output: string): Promise<string> {
    return output;
  }
}

/**
 * Chain error taxonomy
 *
 * Every failure a chain surfaces is a ChainError of one of these kinds.
 * The original failure from the formatter, model or parser is kept in `cause`.
 */

export type ChainErrorKind =
  | 'MissingObject' // Builder: required part not wired
  | 'MissingInput' // Caller: required prompt variable absent
  | 'Format' // Prompt formatting failed
  | 'Model' // Model client failed (setup or mid-stream)
  | 'Parse'; // Output parser failed

export class ChainError extends Error {
  readonly kind: ChainErrorKind;
  readonly variable?: string;

  constructor(
    kind: ChainErrorKind,
    message: string,
    options?: { cause?: unknown; variable?: string }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'ChainError';
    this.kind = kind;
    this.variable = options?.variable;
  }

  static missingObject(which: string): ChainError {
    return new ChainError('MissingObject', which);
  }

  static missingInput(variable: string): ChainError {
    return new ChainError('MissingInput', `Missing input variable: ${variable}`, { variable });
  }

  static format(cause: unknown): ChainError {
    return ChainError.wrap('Format', 'Prompt format error', cause);
  }

  static model(cause: unknown): ChainError {
    return ChainError.wrap('Model', 'LLM error', cause);
  }

  static parse(cause: unknown): ChainError {
    return ChainError.wrap('Parse', 'Output parser error', cause);
  }

  private static wrap(kind: ChainErrorKind, label: string, cause: unknown): ChainError {
    if (cause instanceof ChainError) {
      return cause;
    }
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new ChainError(kind, `${label}: ${detail}`, { cause });
  }
}

export function isChainError(error: unknown, kind?: ChainErrorKind): error is ChainError {
  return error instanceof ChainError && (kind === undefined || error.kind === kind);
}

import { describeContext, ParserError } from './ParserError.js';
import type { ParserContext } from './ParserError.js';

export type AppErrorCode = 'READ_ERROR' | 'WRITE_ERROR' | 'PARSING_ERROR' | 'INVALID_ARGUMENTS';

/**
 * User-facing error raised by the codecs and the tools around them.
 *
 * Transport failures (`ReadError`, `WriteError`) are reported as they came
 * from the stream. Format faults are always wrapped in a `ParsingError` that
 * says where in the input the fault was found.
 */
export abstract class AppError extends Error {
  readonly code: AppErrorCode;

  protected constructor(message: string, code: AppErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = this.constructor.name;
  }
}

export class ReadError extends AppError {
  constructor(readonly reason: Error) {
    super(`read error, ${reason.message}`, 'READ_ERROR', { cause: reason });
  }
}

export class WriteError extends AppError {
  constructor(readonly reason: Error) {
    super(`write error, ${reason.message}`, 'WRITE_ERROR', { cause: reason });
  }
}

export class ParsingError extends AppError {
  constructor(
    readonly context: ParserContext,
    readonly source: ParserError,
  ) {
    super(`${source.message}:\n${describeContext(context)}`, 'PARSING_ERROR', { cause: source });
  }
}

export class InvalidArgumentsError extends AppError {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'INVALID_ARGUMENTS');
  }
}

export const toError = (value: unknown): Error => {
  return value instanceof Error ? value : new Error(String(value));
};

export const unexpectedEndOfInput = (): ReadError => {
  return new ReadError(new Error('unexpected end of input'));
};

/** Runs `action`, attaching `context` to any format fault it raises. */
export const withParserContext = <T>(context: ParserContext, action: () => T): T => {
  try {
    return action();
  } catch (error) {
    if (error instanceof ParserError) {
      throw new ParsingError(context, error);
    }
    throw error;
  }
};

import type { Writable } from 'node:stream';
import { parseArgs } from 'node:util';
import type { ParseArgsConfig } from 'node:util';
import { z } from 'zod';
import { TRANSACTION_FORMATS } from '../application/ports/TransactionCodecPort.js';
import { InvalidArgumentsError, toError } from '../domain/errors/AppError.js';

export interface CliStreams {
  stdout: Writable;
  stderr: Writable;
}

export const processStreams = (): CliStreams => ({ stdout: process.stdout, stderr: process.stderr });

export const FormatSchema = z.enum(['binary', 'text', 'csv']);

type StringOptions = NonNullable<ParseArgsConfig['options']>;

/** Parses `--flag value` pairs and validates them against `schema`. */
export const readArguments = <T extends z.ZodTypeAny>(
  argv: string[],
  flags: readonly string[],
  schema: T,
): z.infer<T> => {
  const options: StringOptions = {};
  for (const flag of flags) {
    options[flag] = { type: 'string' };
  }

  let values: unknown;
  try {
    values = parseArgs({ args: argv, options, strict: true, allowPositionals: false }).values;
  } catch (error) {
    throw new InvalidArgumentsError(toError(error).message);
  }

  const parsed = schema.safeParse(values);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const flag = issue.path.join('.');
      return issue.code === 'invalid_enum_value'
        ? `--${flag} must be one of ${TRANSACTION_FORMATS.join(', ')}`
        : `--${flag}: ${issue.message}`;
    });
    throw new InvalidArgumentsError('invalid arguments', issues);
  }

  return parsed.data;
};

export const reportFailure = (streams: CliStreams, error: unknown): number => {
  streams.stderr.write(`Error occurred during application execution: ${toError(error).message}\n`);
  return 1;
};

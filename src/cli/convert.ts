import { z } from 'zod';
import { AppContainer } from '../infrastructure/bootstrap/AppContainer.js';
import { openFileSource } from '../infrastructure/io/StreamTransport.js';
import { FormatSchema, processStreams, readArguments, reportFailure } from './arguments.js';
import type { CliStreams } from './arguments.js';

const ConvertArgsSchema = z.object({
  input: z.string().min(1),
  'input-format': FormatSchema,
  'output-format': FormatSchema,
});

/**
 * `tx-convert --input <path> --input-format <fmt> --output-format <fmt>`
 *
 * Converted records go to stdout, progress and errors to stderr. Resolves to
 * the process exit status.
 */
export const runConvert = async (
  argv: string[],
  streams: CliStreams = processStreams(),
  container?: AppContainer,
): Promise<number> => {
  try {
    const args = readArguments(argv, ['input', 'input-format', 'output-format'], ConvertArgsSchema);
    const app = container ?? new AppContainer();

    streams.stderr.write(
      `Converting from '${args.input}':${args['input-format']} to :${args['output-format']}\n`,
    );

    await app.conversionService.convert({
      input: openFileSource(args.input),
      inputFormat: args['input-format'],
      output: streams.stdout,
      outputFormat: args['output-format'],
      onIngested: (count) => {
        streams.stderr.write(`${count} records successfully ingested\n`);
      },
    });
    return 0;
  } catch (error) {
    return reportFailure(streams, error);
  }
};

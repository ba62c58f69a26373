import { z } from 'zod';
import type { ComparisonReportDTO } from '../application/dto/ComparisonReportDTO.js';
import { AppContainer } from '../infrastructure/bootstrap/AppContainer.js';
import { openFileSource } from '../infrastructure/io/StreamTransport.js';
import { FormatSchema, processStreams, readArguments, reportFailure } from './arguments.js';
import type { CliStreams } from './arguments.js';

const CompareArgsSchema = z.object({
  file1: z.string().min(1),
  format1: FormatSchema,
  file2: z.string().min(1),
  format2: FormatSchema,
});

export const formatComparisonReport = (report: ComparisonReportDTO): string[] => {
  if (report.identical) {
    return ['All transaction records are identical.'];
  }

  return [
    `There are ${report.unmatched.length} unique transactions that don't match between the files`,
    ...report.unmatched.map(
      ({ record, presentIn }) =>
        `There is no equivalent for transaction ${record.id} in the file '#${presentIn}'`,
    ),
  ];
};

/** `tx-compare --file1 <path> --format1 <fmt> --file2 <path> --format2 <fmt>` */
export const runCompare = async (
  argv: string[],
  streams: CliStreams = processStreams(),
  container?: AppContainer,
): Promise<number> => {
  try {
    const args = readArguments(argv, ['file1', 'format1', 'file2', 'format2'], CompareArgsSchema);
    const app = container ?? new AppContainer();

    streams.stdout.write(
      `Comparing 2 files\n\t1:'${args.file1}':${args.format1}\n\t2:'${args.file2}':${args.format2}\n\n`,
    );

    const report = await app.comparisonService.compare(
      { source: openFileSource(args.file1), format: args.format1 },
      { source: openFileSource(args.file2), format: args.format2 },
    );

    streams.stdout.write(`${formatComparisonReport(report).join('\n')}\n`);
    return 0;
  } catch (error) {
    return reportFailure(streams, error);
  }
};

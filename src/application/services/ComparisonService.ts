import type { Logger } from 'pino';
import { recordKey } from '../../domain/entities/TxRecord.js';
import type { TxRecord } from '../../domain/entities/TxRecord.js';
import type { ComparisonReportDTO, UnmatchedRecordDTO } from '../dto/ComparisonReportDTO.js';
import type { FormatRegistryPort } from '../ports/FormatRegistryPort.js';
import type { ByteSource, TransactionFormat } from '../ports/TransactionCodecPort.js';

export interface ComparedInput {
  source: ByteSource;
  format: TransactionFormat;
}

interface Tally {
  record: TxRecord;
  net: number;
}

/**
 * Multiset difference of two record collections. A record counts +1 for each
 * occurrence in the first collection and -1 for each in the second; whatever
 * does not cancel out is reported, in order of first appearance.
 */
export const diffRecords = (
  first: readonly TxRecord[],
  second: readonly TxRecord[],
): ComparisonReportDTO => {
  const tallies = new Map<string, Tally>();

  const count = (record: TxRecord, delta: number) => {
    const key = recordKey(record);
    const tally = tallies.get(key) ?? { record, net: 0 };
    tally.net += delta;
    tallies.set(key, tally);
  };

  first.forEach((record) => count(record, 1));
  second.forEach((record) => count(record, -1));

  const unmatched: UnmatchedRecordDTO[] = [];
  for (const { record, net } of tallies.values()) {
    if (net !== 0) {
      unmatched.push({ record, presentIn: net > 0 ? 1 : 2, surplus: Math.abs(net) });
    }
  }

  return {
    firstCount: first.length,
    secondCount: second.length,
    identical: unmatched.length === 0,
    unmatched,
  };
};

export class ComparisonService {
  constructor(
    private readonly formats: FormatRegistryPort,
    private readonly logger: Logger,
  ) {}

  async compare(first: ComparedInput, second: ComparedInput): Promise<ComparisonReportDTO> {
    const firstRecords = await this.formats.get(first.format).parse(first.source);
    const secondRecords = await this.formats.get(second.format).parse(second.source);

    const report = diffRecords(firstRecords, secondRecords);

    this.logger.info(
      {
        firstCount: report.firstCount,
        secondCount: report.secondCount,
        unmatched: report.unmatched.length,
      },
      'Collections compared',
    );

    return report;
  }
}

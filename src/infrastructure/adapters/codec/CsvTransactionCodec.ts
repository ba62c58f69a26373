import type { TransactionCodecPort } from '../../../application/ports/TransactionCodecPort.js';
import { createTxRecord } from '../../../domain/entities/TxRecord.js';
import type { TxRecord } from '../../../domain/entities/TxRecord.js';
import { TX_FIELD_KEYS } from '../../../domain/entities/TxFieldKey.js';
import { ParsingError, withParserContext } from '../../../domain/errors/AppError.js';
import { ParserError } from '../../../domain/errors/ParserError.js';
import {
  formatKind,
  formatStatus,
  parseKind,
  parseSigned64,
  parseStatus,
  parseUnsigned64,
  quote,
  unquote,
} from '../../../domain/services/TxValueParser.js';
import { readLines } from '../../io/LineReader.js';

const DELIMITER = ',';

export const CSV_HEADER = TX_FIELD_KEYS.join(DELIMITER);

/**
 * Plain comma-separated format. There is no quoting or escaping: a comma
 * inside a description splits the row and the row is rejected.
 */
export class CsvTransactionCodec implements TransactionCodecPort {
  decode(input: Buffer): TxRecord[] {
    const [header, ...rows] = readLines(input);
    if (header === undefined) {
      return [];
    }

    if (header !== CSV_HEADER) {
      throw new ParsingError({ type: 'line', lineNumber: 1, line: header }, ParserError.invalidFileHeader());
    }

    return rows.map((row, index) =>
      withParserContext({ type: 'line', lineNumber: index + 2, line: row }, () => this.parseRow(row)),
    );
  }

  encode(records: readonly TxRecord[]): Buffer {
    const lines = [CSV_HEADER];

    for (const record of records) {
      lines.push(
        [
          record.id.toString(),
          formatKind(record.kind),
          record.from.toString(),
          record.to.toString(),
          record.amount.toString(),
          record.ts.toString(),
          formatStatus(record.status),
          quote(record.description),
        ].join(DELIMITER),
      );
    }

    return Buffer.from(`${lines.join('\n')}\n`, 'utf8');
  }

  private parseRow(row: string): TxRecord {
    const values = row.trim().split(DELIMITER).map((value) => value.trim());
    if (values.length !== TX_FIELD_KEYS.length) {
      throw ParserError.incompleteRecord();
    }

    const [id, kind, from, to, amount, ts, status, description] = values;

    return createTxRecord({
      id: parseUnsigned64(id),
      kind: parseKind(kind),
      from: parseUnsigned64(from),
      to: parseUnsigned64(to),
      amount: parseSigned64(amount),
      ts: parseUnsigned64(ts),
      status: parseStatus(status),
      description: unquote(description),
    });
  }
}

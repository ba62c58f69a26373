import type { TransactionCodecPort } from '../../../application/ports/TransactionCodecPort.js';
import { createTxRecord } from '../../../domain/entities/TxRecord.js';
import type { TxKind, TxRecord, TxStatus } from '../../../domain/entities/TxRecord.js';
import type { TxFieldKey } from '../../../domain/entities/TxFieldKey.js';
import { withParserContext } from '../../../domain/errors/AppError.js';
import { ParserError } from '../../../domain/errors/ParserError.js';
import {
  formatKind,
  formatStatus,
  parseFieldKey,
  parseKind,
  parseSigned64,
  parseStatus,
  parseUnsigned64,
  quote,
  unquote,
} from '../../../domain/services/TxValueParser.js';
import { readLines } from '../../io/LineReader.js';

const FIELD_DELIMITER = ':';
const COMMENT_PREFIX = '#';

/** Collects at most one value per field for the record currently being read. */
class RecordBuilder {
  private dirty = false;
  private id?: bigint;
  private kind?: TxKind;
  private from?: bigint;
  private to?: bigint;
  private amount?: bigint;
  private ts?: bigint;
  private status?: TxStatus;
  private description?: string;

  get hasFields(): boolean {
    return this.dirty;
  }

  acceptLine(line: string): void {
    const delimiterAt = line.indexOf(FIELD_DELIMITER);
    if (delimiterAt < 0) {
      throw ParserError.noFieldDelimiter();
    }

    const field = parseFieldKey(line.slice(0, delimiterAt).trim());
    this.set(field, line.slice(delimiterAt + 1).trim());
  }

  build(): TxRecord {
    const { id, kind, from, to, amount, ts, status, description } = this;

    if (id === undefined) throw ParserError.missingField('TX_ID');
    if (kind === undefined) throw ParserError.missingField('TX_TYPE');
    if (from === undefined) throw ParserError.missingField('FROM_USER_ID');
    if (to === undefined) throw ParserError.missingField('TO_USER_ID');
    if (amount === undefined) throw ParserError.missingField('AMOUNT');
    if (ts === undefined) throw ParserError.missingField('TIMESTAMP');
    if (status === undefined) throw ParserError.missingField('STATUS');
    if (description === undefined) throw ParserError.missingField('DESCRIPTION');

    return createTxRecord({ id, kind, from, to, amount, ts, status, description });
  }

  private has(field: TxFieldKey): boolean {
    switch (field) {
      case 'TX_ID':
        return this.id !== undefined;
      case 'TX_TYPE':
        return this.kind !== undefined;
      case 'FROM_USER_ID':
        return this.from !== undefined;
      case 'TO_USER_ID':
        return this.to !== undefined;
      case 'AMOUNT':
        return this.amount !== undefined;
      case 'TIMESTAMP':
        return this.ts !== undefined;
      case 'STATUS':
        return this.status !== undefined;
      case 'DESCRIPTION':
        return this.description !== undefined;
    }
  }

  private set(field: TxFieldKey, value: string): void {
    if (this.has(field)) {
      throw ParserError.duplicate(field);
    }
    this.dirty = true;

    switch (field) {
      case 'TX_ID':
        this.id = parseUnsigned64(value);
        break;
      case 'TX_TYPE':
        this.kind = parseKind(value);
        break;
      case 'FROM_USER_ID':
        this.from = parseUnsigned64(value);
        break;
      case 'TO_USER_ID':
        this.to = parseUnsigned64(value);
        break;
      case 'AMOUNT':
        this.amount = parseSigned64(value);
        break;
      case 'TIMESTAMP':
        this.ts = parseUnsigned64(value);
        break;
      case 'STATUS':
        this.status = parseStatus(value);
        break;
      case 'DESCRIPTION':
        this.description = unquote(value);
        break;
    }
  }
}

/**
 * Key/value text format. Records are blocks of `KEY: value` lines separated
 * by blank lines; fields may come in any order and `#` starts a comment line.
 */
export class TextTransactionCodec implements TransactionCodecPort {
  decode(input: Buffer): TxRecord[] {
    const records: TxRecord[] = [];
    let builder = new RecordBuilder();
    let lineNumber = 0;
    let rawLine = '';

    for (rawLine of readLines(input)) {
      lineNumber += 1;
      const line = rawLine.trim();
      const context = { type: 'line', lineNumber, line: rawLine } as const;

      if (line.startsWith(COMMENT_PREFIX)) {
        continue;
      }

      if (line.length === 0) {
        if (builder.hasFields) {
          records.push(withParserContext(context, () => builder.build()));
        }
        builder = new RecordBuilder();
        continue;
      }

      withParserContext(context, () => builder.acceptLine(line));
    }

    if (builder.hasFields) {
      records.push(withParserContext({ type: 'line', lineNumber, line: rawLine }, () => builder.build()));
    }

    return records;
  }

  encode(records: readonly TxRecord[]): Buffer {
    const blocks = records.map((record) => {
      const lines = [
        this.field('TX_ID', record.id.toString()),
        this.field('TX_TYPE', formatKind(record.kind)),
        this.field('FROM_USER_ID', record.from.toString()),
        this.field('TO_USER_ID', record.to.toString()),
        this.field('AMOUNT', record.amount.toString()),
        this.field('TIMESTAMP', record.ts.toString()),
        this.field('STATUS', formatStatus(record.status)),
        this.field('DESCRIPTION', quote(record.description)),
      ];
      return `${lines.join('\n')}\n\n`;
    });

    return Buffer.from(blocks.join(''), 'utf8');
  }

  private field(key: TxFieldKey, value: string): string {
    return `${key}${FIELD_DELIMITER} ${value}`;
  }
}

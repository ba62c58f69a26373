import { TextDecoder } from 'node:util';
import type { TransactionCodecPort } from '../../../application/ports/TransactionCodecPort.js';
import { createTxRecord } from '../../../domain/entities/TxRecord.js';
import type { TxRecord } from '../../../domain/entities/TxRecord.js';
import { ParsingError, unexpectedEndOfInput, withParserContext } from '../../../domain/errors/AppError.js';
import { ParserError } from '../../../domain/errors/ParserError.js';
import {
  kindFromByte,
  kindToByte,
  statusFromByte,
  statusToByte,
} from '../../../domain/services/TxValueParser.js';

export const RECORD_MAGIC = Buffer.from('YPBN', 'ascii');

const FRAME_HEADER_SIZE = 4 + 4;

/** id + kind + from + to + amount + ts + status + description length */
export const FIXED_BODY_SIZE = 8 + 1 + 8 + 8 + 8 + 8 + 1 + 4;

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** Sequential big-endian reader that knows its absolute offset in the input. */
class ByteCursor {
  private offset = 0;

  constructor(
    private readonly buffer: Buffer,
    private readonly base = 0,
  ) {}

  get position(): number {
    return this.base + this.offset;
  }

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  take(length: number): Buffer {
    if (length > this.remaining) {
      throw unexpectedEndOfInput();
    }
    const slice = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  u8(): number {
    return this.take(1).readUInt8(0);
  }

  u32(): number {
    return this.take(4).readUInt32BE(0);
  }

  u64(): bigint {
    return this.take(8).readBigUInt64BE(0);
  }

  i64(): bigint {
    return this.take(8).readBigInt64BE(0);
  }
}

export class BinaryTransactionCodec implements TransactionCodecPort {
  decode(input: Buffer): TxRecord[] {
    const cursor = new ByteCursor(input);
    const records: TxRecord[] = [];

    // Running out of input exactly on a frame boundary is the normal end.
    while (cursor.remaining > 0) {
      const frameStart = cursor.position;
      const magic = cursor.take(RECORD_MAGIC.length);
      if (!magic.equals(RECORD_MAGIC)) {
        throw new ParsingError(
          { type: 'position', position: frameStart },
          ParserError.invalidRecordHeader(magic.toString('hex').toUpperCase()),
        );
      }

      const bodyLength = cursor.u32();
      if (bodyLength < FIXED_BODY_SIZE) {
        throw new ParsingError({ type: 'position', position: cursor.position }, ParserError.incompleteRecord());
      }

      const bodyStart = cursor.position;
      records.push(this.decodeBody(new ByteCursor(cursor.take(bodyLength), bodyStart)));
    }

    return records;
  }

  encode(records: readonly TxRecord[]): Buffer {
    return Buffer.concat(records.map((record) => this.encodeFrame(record)));
  }

  // Field faults are located at the running offset, just past the bytes that were read.
  private decodeBody(body: ByteCursor): TxRecord {
    const id = body.u64();

    const kindCode = body.u8();
    const kind = withParserContext({ type: 'positionAndField', position: body.position, field: 'TX_TYPE' }, () =>
      kindFromByte(kindCode),
    );

    const from = body.u64();
    const to = body.u64();
    const amount = body.i64();
    const ts = body.u64();

    const statusCode = body.u8();
    const status = withParserContext(
      { type: 'positionAndField', position: body.position, field: 'STATUS' },
      () => statusFromByte(statusCode),
    );

    const descriptionLength = body.u32();
    const descriptionBytes = body.take(descriptionLength);
    const description = withParserContext(
      { type: 'positionAndField', position: body.position, field: 'DESCRIPTION' },
      () => this.decodeText(descriptionBytes),
    );

    return createTxRecord({ id, kind, from, to, amount, ts, status, description });
  }

  private decodeText(bytes: Buffer): string {
    try {
      return utf8.decode(bytes);
    } catch {
      throw ParserError.unparsableValue('non utf-8 string');
    }
  }

  private encodeFrame(record: TxRecord): Buffer {
    const description = Buffer.from(record.description, 'utf8');
    const bodyLength = FIXED_BODY_SIZE + description.length;
    const frame = Buffer.alloc(FRAME_HEADER_SIZE + bodyLength);

    let offset = RECORD_MAGIC.copy(frame, 0);
    offset = frame.writeUInt32BE(bodyLength, offset);
    offset = frame.writeBigUInt64BE(record.id, offset);
    offset = frame.writeUInt8(kindToByte(record.kind), offset);
    offset = frame.writeBigUInt64BE(record.from, offset);
    offset = frame.writeBigUInt64BE(record.to, offset);
    offset = frame.writeBigInt64BE(record.amount, offset);
    offset = frame.writeBigUInt64BE(record.ts, offset);
    offset = frame.writeUInt8(statusToByte(record.status), offset);
    offset = frame.writeUInt32BE(description.length, offset);
    description.copy(frame, offset);

    return frame;
  }
}

import type { Writable } from 'node:stream';
import type {
  ByteSource,
  TransactionCodecPort,
  TransactionFormat,
  TransactionFormatPort,
} from '../../../application/ports/TransactionCodecPort.js';
import type { FormatRegistryPort } from '../../../application/ports/FormatRegistryPort.js';
import type { TxRecord } from '../../../domain/entities/TxRecord.js';
import { readAll, writeAll } from '../../io/StreamTransport.js';
import { BinaryTransactionCodec } from './BinaryTransactionCodec.js';
import { CsvTransactionCodec } from './CsvTransactionCodec.js';
import { TextTransactionCodec } from './TextTransactionCodec.js';

/** Puts a stream-facing parse/write pair in front of an in-memory codec. */
export class StreamFormatAdapter implements TransactionFormatPort {
  constructor(private readonly codec: TransactionCodecPort) {}

  async parse(source: ByteSource): Promise<TxRecord[]> {
    const input = await readAll(source);
    return this.codec.decode(input);
  }

  async write(sink: Writable, records: readonly TxRecord[]): Promise<void> {
    await writeAll(sink, this.codec.encode(records));
  }
}

export const codecFor = (format: TransactionFormat): TransactionCodecPort => {
  switch (format) {
    case 'binary':
      return new BinaryTransactionCodec();
    case 'text':
      return new TextTransactionCodec();
    case 'csv':
      return new CsvTransactionCodec();
  }
};

export const selectFormat = (format: TransactionFormat): TransactionFormatPort => {
  return new StreamFormatAdapter(codecFor(format));
};

export type CodecOverrides = Partial<Record<TransactionFormat, TransactionCodecPort>>;

export class FormatRegistry implements FormatRegistryPort {
  private readonly formats = new Map<TransactionFormat, TransactionFormatPort>();

  constructor(private readonly overrides: CodecOverrides = {}) {}

  get(format: TransactionFormat): TransactionFormatPort {
    const cached = this.formats.get(format);
    if (cached) {
      return cached;
    }

    const adapter = new StreamFormatAdapter(this.overrides[format] ?? codecFor(format));
    this.formats.set(format, adapter);
    return adapter;
  }
}

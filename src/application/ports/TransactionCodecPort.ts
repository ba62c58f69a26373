import type { Writable } from 'node:stream';
import type { TxRecord } from '../../domain/entities/TxRecord.js';

export type TransactionFormat = 'binary' | 'text' | 'csv';

export const TRANSACTION_FORMATS: readonly TransactionFormat[] = ['binary', 'text', 'csv'];

export type ByteSource = AsyncIterable<Uint8Array | string>;

/** Pure in-memory codec: the whole input is decoded at once and the whole output is produced at once. */
export interface TransactionCodecPort {
  decode(input: Buffer): TxRecord[];
  encode(records: readonly TxRecord[]): Buffer;
}

/** Stream-facing contract the tools use: read every record from a source, or write them all to a sink. */
export interface TransactionFormatPort {
  parse(source: ByteSource): Promise<TxRecord[]>;
  write(sink: Writable, records: readonly TxRecord[]): Promise<void>;
}

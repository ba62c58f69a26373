import { Writable } from 'node:stream';
import pino from 'pino';
import type { TxRecord } from '../../src/domain/entities/TxRecord.js';

export const silentLogger = pino({ level: 'silent' });

export const paymentRecord: TxRecord = {
  id: 1n,
  kind: 'TRANSFER',
  from: 11n,
  to: 22n,
  amount: -500n,
  ts: 1_700_000n,
  status: 'PENDING',
  description: 'payment',
};

export const bonusRecord: TxRecord = {
  id: 2n,
  kind: 'DEPOSIT',
  from: 0n,
  to: 3n,
  amount: 99n,
  ts: 1700n,
  status: 'SUCCESS',
  description: 'bonus',
};

export const refundRecord: TxRecord = {
  id: 3n,
  kind: 'WITHDRAWAL',
  from: 18_446_744_073_709_551_615n,
  to: 0n,
  amount: -9_223_372_036_854_775_808n,
  ts: 0n,
  status: 'FAILURE',
  description: '',
};

/** Runs `action` and returns what it threw. */
export const thrownBy = (action: () => unknown): unknown => {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error('expected the action to throw');
};

export class MemorySink extends Writable {
  private readonly chunks: Buffer[] = [];

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(Buffer.from(chunk));
    callback();
  }

  get buffer(): Buffer {
    return Buffer.concat(this.chunks);
  }

  text(): string {
    return this.buffer.toString('utf8');
  }
}

import type { TransactionCodecPort } from '../../../application/ports/TransactionCodecPort.js';
import type { TxRecord } from '../../../domain/entities/TxRecord.js';

/** Accepts anything and yields nothing; stands in for a real format when wiring services. */
export class NoopTransactionCodec implements TransactionCodecPort {
  decode(): TxRecord[] {
    return [];
  }

  encode(): Buffer {
    return Buffer.alloc(0);
  }
}

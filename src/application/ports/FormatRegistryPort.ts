import type { TransactionFormat, TransactionFormatPort } from './TransactionCodecPort.js';

export interface FormatRegistryPort {
  get(format: TransactionFormat): TransactionFormatPort;
}

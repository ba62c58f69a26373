import type { TransactionFormat } from '../ports/TransactionCodecPort.js';

export interface ConversionResultDTO {
  inputFormat: TransactionFormat;
  outputFormat: TransactionFormat;
  recordsIngested: number;
}

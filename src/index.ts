export type { TxKind, TxRecord, TxRecordInput, TxStatus } from './domain/entities/TxRecord.js';
export { createTxRecord, isSameRecord, recordKey, TxRecordSchema } from './domain/entities/TxRecord.js';
export type { TxFieldKey } from './domain/entities/TxFieldKey.js';
export { TX_FIELD_KEYS } from './domain/entities/TxFieldKey.js';
export type { ParserContext, ParserFault, ParserFaultType } from './domain/errors/ParserError.js';
export { ParserError } from './domain/errors/ParserError.js';
export type { AppErrorCode } from './domain/errors/AppError.js';
export { AppError, InvalidArgumentsError, ParsingError, ReadError, WriteError } from './domain/errors/AppError.js';
export type {
  ByteSource,
  TransactionCodecPort,
  TransactionFormat,
  TransactionFormatPort,
} from './application/ports/TransactionCodecPort.js';
export { TRANSACTION_FORMATS } from './application/ports/TransactionCodecPort.js';
export type { ComparisonReportDTO, UnmatchedRecordDTO } from './application/dto/ComparisonReportDTO.js';
export { ComparisonService, diffRecords } from './application/services/ComparisonService.js';
export { ConversionService } from './application/services/ConversionService.js';
export { BinaryTransactionCodec } from './infrastructure/adapters/codec/BinaryTransactionCodec.js';
export { CsvTransactionCodec } from './infrastructure/adapters/codec/CsvTransactionCodec.js';
export { NoopTransactionCodec } from './infrastructure/adapters/codec/NoopTransactionCodec.js';
export { TextTransactionCodec } from './infrastructure/adapters/codec/TextTransactionCodec.js';
export { codecFor, FormatRegistry, selectFormat } from './infrastructure/adapters/codec/FormatSelector.js';

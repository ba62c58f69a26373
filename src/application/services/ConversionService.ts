import type { Writable } from 'node:stream';
import type { Logger } from 'pino';
import type { TxRecord } from '../../domain/entities/TxRecord.js';
import type { ConversionResultDTO } from '../dto/ConversionResultDTO.js';
import type { FormatRegistryPort } from '../ports/FormatRegistryPort.js';
import type { ByteSource, TransactionFormat } from '../ports/TransactionCodecPort.js';

export interface ConvertParams {
  input: ByteSource;
  inputFormat: TransactionFormat;
  output: Writable;
  outputFormat: TransactionFormat;
  /** Called once every record is read, before anything is written to `output`. */
  onIngested?: (recordsIngested: number) => void;
}

export class ConversionService {
  constructor(
    private readonly formats: FormatRegistryPort,
    private readonly logger: Logger,
  ) {}

  async ingest(source: ByteSource, format: TransactionFormat): Promise<TxRecord[]> {
    const records = await this.formats.get(format).parse(source);
    this.logger.info({ format, records: records.length }, 'Records ingested');
    return records;
  }

  async emit(sink: Writable, format: TransactionFormat, records: readonly TxRecord[]): Promise<void> {
    await this.formats.get(format).write(sink, records);
    this.logger.info({ format, records: records.length }, 'Records written');
  }

  async convert(params: ConvertParams): Promise<ConversionResultDTO> {
    const records = await this.ingest(params.input, params.inputFormat);
    params.onIngested?.(records.length);
    await this.emit(params.output, params.outputFormat, records);

    return {
      inputFormat: params.inputFormat,
      outputFormat: params.outputFormat,
      recordsIngested: records.length,
    };
  }
}

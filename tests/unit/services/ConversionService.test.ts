import { Readable } from 'node:stream';
import { describe, expect, it, vi } from 'vitest';
import { ConversionService } from '../../../src/application/services/ConversionService.js';
import { ParsingError, ReadError } from '../../../src/domain/errors/AppError.js';
import { codecFor, FormatRegistry } from '../../../src/infrastructure/adapters/codec/FormatSelector.js';
import { bonusRecord, MemorySink, paymentRecord, silentLogger } from '../../helpers/fixtures.js';

describe('ConversionService', () => {
  it('converts text records to csv', async () => {
    const service = new ConversionService(new FormatRegistry(), silentLogger);
    const output = new MemorySink();

    const result = await service.convert({
      input: Readable.from([codecFor('text').encode([paymentRecord, bonusRecord])]),
      inputFormat: 'text',
      output,
      outputFormat: 'csv',
    });

    expect(result).toEqual({ inputFormat: 'text', outputFormat: 'csv', recordsIngested: 2 });
    expect(output.text()).toBe(
      [
        'TX_ID,TX_TYPE,FROM_USER_ID,TO_USER_ID,AMOUNT,TIMESTAMP,STATUS,DESCRIPTION',
        '1,TRANSFER,11,22,-500,1700000,PENDING,"payment"',
        '2,DEPOSIT,0,3,99,1700,SUCCESS,"bonus"',
        '',
      ].join('\n'),
    );
  });

  it('reproduces binary input byte for byte', async () => {
    const service = new ConversionService(new FormatRegistry(), silentLogger);
    const encoded = codecFor('binary').encode([paymentRecord, bonusRecord]);
    const output = new MemorySink();

    await service.convert({ input: Readable.from([encoded]), inputFormat: 'binary', output, outputFormat: 'binary' });

    expect(output.buffer.equals(encoded)).toBe(true);
  });

  it('reports the record count before writing any output', async () => {
    const service = new ConversionService(new FormatRegistry(), silentLogger);
    const output = new MemorySink();
    const seen: Array<{ count: number; written: number }> = [];

    await service.convert({
      input: Readable.from([codecFor('csv').encode([paymentRecord, bonusRecord])]),
      inputFormat: 'csv',
      output,
      outputFormat: 'text',
      onIngested: (count) => seen.push({ count, written: output.buffer.length }),
    });

    expect(seen).toEqual([{ count: 2, written: 0 }]);
    expect(output.buffer.length).toBeGreaterThan(0);
  });

  it('does not report a count when parsing fails', async () => {
    const service = new ConversionService(new FormatRegistry(), silentLogger);
    const counts: number[] = [];

    await expect(
      service.convert({
        input: Readable.from(['TX_ID: 1\nTX_ID: 2\n']),
        inputFormat: 'text',
        output: new MemorySink(),
        outputFormat: 'csv',
        onIngested: (count) => counts.push(count),
      }),
    ).rejects.toBeInstanceOf(ParsingError);
    expect(counts).toEqual([]);
  });

  it('logs how many records were read and written', async () => {
    const info = vi.spyOn(silentLogger, 'info');
    const service = new ConversionService(new FormatRegistry(), silentLogger);

    await service.convert({
      input: Readable.from([codecFor('csv').encode([bonusRecord])]),
      inputFormat: 'csv',
      output: new MemorySink(),
      outputFormat: 'text',
    });

    expect(info).toHaveBeenCalledWith({ format: 'csv', records: 1 }, 'Records ingested');
    expect(info).toHaveBeenCalledWith({ format: 'text', records: 1 }, 'Records written');
    info.mockRestore();
  });

  it('writes nothing when the input cannot be read', async () => {
    async function* failing(): AsyncGenerator<Uint8Array> {
      yield* [];
      throw new Error('permission denied');
    }
    const service = new ConversionService(new FormatRegistry(), silentLogger);
    const output = new MemorySink();

    await expect(
      service.convert({ input: failing(), inputFormat: 'binary', output, outputFormat: 'csv' }),
    ).rejects.toBeInstanceOf(ReadError);
    expect(output.buffer).toHaveLength(0);
  });
});

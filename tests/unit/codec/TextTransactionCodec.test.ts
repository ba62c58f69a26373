import { describe, expect, it } from 'vitest';
import { ParsingError, ReadError } from '../../../src/domain/errors/AppError.js';
import { TextTransactionCodec } from '../../../src/infrastructure/adapters/codec/TextTransactionCodec.js';
import { bonusRecord, paymentRecord, refundRecord, thrownBy } from '../../helpers/fixtures.js';

const text = (...lines: string[]): Buffer => Buffer.from(lines.join('\n'), 'utf8');

const PAYMENT_BLOCK = [
  'TX_ID: 1',
  'TX_TYPE: TRANSFER',
  'FROM_USER_ID: 11',
  'TO_USER_ID: 22',
  'AMOUNT: -500',
  'TIMESTAMP: 1700000',
  'STATUS: PENDING',
  'DESCRIPTION: "payment"',
];

describe('TextTransactionCodec', () => {
  const codec = new TextTransactionCodec();

  it('writes fields in canonical order with a blank line after each record', () => {
    expect(codec.encode([paymentRecord]).toString('utf8')).toBe(`${PAYMENT_BLOCK.join('\n')}\n\n`);
  });

  it('reads back what it writes', () => {
    const records = [paymentRecord, bonusRecord, refundRecord];
    expect(codec.decode(codec.encode(records))).toEqual(records);
  });

  it('accepts fields in any order', () => {
    const input = text(
      'DESCRIPTION: "first"',
      'STATUS: SUCCESS',
      'TIMESTAMP: 5',
      'AMOUNT: 10',
      'TO_USER_ID: 2',
      'FROM_USER_ID: 0',
      'TX_TYPE: DEPOSIT',
      'TX_ID: 9',
    );

    expect(codec.decode(input)).toEqual([
      {
        id: 9n,
        kind: 'DEPOSIT',
        from: 0n,
        to: 2n,
        amount: 10n,
        ts: 5n,
        status: 'SUCCESS',
        description: 'first',
      },
    ]);
  });

  it('skips comments and extra blank lines, and tolerates CRLF and padding', () => {
    const input = Buffer.from(
      [
        '# exported ledger',
        '',
        '',
        '  TX_ID :   1  ',
        '# a comment does not close the record',
        ...PAYMENT_BLOCK.slice(1),
        '   ',
        '',
        '# trailing comment',
        '',
      ].join('\r\n'),
      'utf8',
    );

    expect(codec.decode(input)).toEqual([paymentRecord]);
  });

  it('closes the last record at end of input', () => {
    expect(codec.decode(text(...PAYMENT_BLOCK, '', ...PAYMENT_BLOCK))).toEqual([paymentRecord, paymentRecord]);
  });

  it('parses input without records to an empty list', () => {
    expect(codec.decode(Buffer.alloc(0))).toEqual([]);
    expect(codec.decode(text('# nothing here', '', '   '))).toEqual([]);
  });

  it('splits a line at the first colon only', () => {
    const lines = [...PAYMENT_BLOCK.slice(0, 7), 'DESCRIPTION: "rent: march"'];
    expect(codec.decode(text(...lines))).toEqual([{ ...paymentRecord, description: 'rent: march' }]);
  });

  it('reports a repeated key in an open record', () => {
    const error = thrownBy(() => codec.decode(text('TX_ID: 1', 'TX_TYPE: DEPOSIT', 'TX_ID: 2')));

    expect(error).toBeInstanceOf(ParsingError);
    expect(error).toMatchObject({
      context: { type: 'line', lineNumber: 3, line: 'TX_ID: 2' },
      source: { fault: { type: 'Duplicate', field: 'TX_ID' } },
      message: 'field TX_ID has duplicate:\nline #3, content: `TX_ID: 2`',
    });
  });

  it('allows the same key again once the record is closed', () => {
    expect(codec.decode(text(...PAYMENT_BLOCK, '', ...PAYMENT_BLOCK))).toHaveLength(2);
  });

  it('reports the first missing field in canonical order on the closing blank line', () => {
    const input = text(
      'DESCRIPTION: "partial"',
      'TX_ID: 1',
      'TIMESTAMP: 5',
      'TX_TYPE: DEPOSIT',
      'TO_USER_ID: 2',
      'FROM_USER_ID: 0',
      '',
      '',
    );

    expect(thrownBy(() => codec.decode(input))).toMatchObject({
      context: { type: 'line', lineNumber: 7, line: '' },
      source: { fault: { type: 'MissingField', field: 'AMOUNT' } },
      message: 'required field AMOUNT is missing:\nline #7, content: ``',
    });
  });

  it('reports a missing field at the last line when input ends', () => {
    const input = text(...PAYMENT_BLOCK.slice(0, 6), 'DESCRIPTION: "no status"');

    expect(thrownBy(() => codec.decode(input))).toMatchObject({
      context: { type: 'line', lineNumber: 7, line: 'DESCRIPTION: "no status"' },
      source: { fault: { type: 'MissingField', field: 'STATUS' } },
    });
  });

  it('rejects lines without a delimiter', () => {
    expect(thrownBy(() => codec.decode(text('TX_ID 1')))).toMatchObject({
      context: { type: 'line', lineNumber: 1, line: 'TX_ID 1' },
      source: { fault: { type: 'NoFieldDelimiter' } },
    });
  });

  it('rejects unknown keys', () => {
    expect(thrownBy(() => codec.decode(text('# header', 'tx_id: 1')))).toMatchObject({
      context: { type: 'line', lineNumber: 2, line: 'tx_id: 1' },
      source: { fault: { type: 'UnparsableKey', key: 'tx_id' } },
    });
  });

  it('rejects values that do not parse', () => {
    expect(thrownBy(() => codec.decode(text('AMOUNT: 12x')))).toMatchObject({
      source: { fault: { type: 'UnparsableValue', value: '12x' } },
    });
    expect(thrownBy(() => codec.decode(text('STATUS: done')))).toMatchObject({
      source: { fault: { type: 'UnparsableValue', value: 'done' } },
    });
  });

  it('requires a quoted description', () => {
    expect(thrownBy(() => codec.decode(text(...PAYMENT_BLOCK.slice(0, 7), 'DESCRIPTION: payment')))).toMatchObject(
      {
        context: { type: 'line', lineNumber: 8, line: 'DESCRIPTION: payment' },
        source: { fault: { type: 'ShellBeQuoted', value: 'payment' } },
      },
    );
  });

  it('treats invalid UTF-8 as a read error', () => {
    expect(thrownBy(() => codec.decode(Buffer.from([0x54, 0x58, 0xff, 0x0a])))).toBeInstanceOf(ReadError);
  });
});

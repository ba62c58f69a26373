import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { createTxRecord, isSameRecord, recordKey } from '../../../src/domain/entities/TxRecord.js';
import { paymentRecord, thrownBy } from '../../helpers/fixtures.js';

describe('TxRecord', () => {
  it('creates frozen records from valid input', () => {
    const record = createTxRecord({ ...paymentRecord });

    expect(record).toEqual(paymentRecord);
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('rejects values outside the 64-bit ranges', () => {
    expect(thrownBy(() => createTxRecord({ ...paymentRecord, id: -1n }))).toBeInstanceOf(ZodError);
    expect(thrownBy(() => createTxRecord({ ...paymentRecord, ts: 1n << 64n }))).toBeInstanceOf(ZodError);
    expect(thrownBy(() => createTxRecord({ ...paymentRecord, amount: 1n << 63n }))).toBeInstanceOf(ZodError);
  });

  it('compares every field', () => {
    expect(isSameRecord(paymentRecord, { ...paymentRecord })).toBe(true);
    expect(isSameRecord(paymentRecord, { ...paymentRecord, ts: paymentRecord.ts + 1n })).toBe(false);
    expect(isSameRecord(paymentRecord, { ...paymentRecord, description: 'payment ' })).toBe(false);
  });

  it('derives equal keys only for structurally equal records', () => {
    expect(recordKey(paymentRecord)).toBe(recordKey({ ...paymentRecord }));
    expect(recordKey(paymentRecord)).not.toBe(recordKey({ ...paymentRecord, status: 'SUCCESS' }));
    expect(recordKey({ ...paymentRecord, description: 'a","b' })).not.toBe(
      recordKey({ ...paymentRecord, description: 'a", "b' }),
    );
  });
});

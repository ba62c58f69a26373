import { z } from 'zod';

export type TxKind = 'DEPOSIT' | 'TRANSFER' | 'WITHDRAWAL';

export type TxStatus = 'SUCCESS' | 'FAILURE' | 'PENDING';

/**
 * A single financial transaction. 64-bit quantities are kept as `bigint` so
 * that every value the formats can carry round-trips without loss.
 */
export interface TxRecord {
  readonly id: bigint;
  readonly kind: TxKind;
  readonly from: bigint;
  readonly to: bigint;
  /** Minor currency units, sign is not tied to `kind`. */
  readonly amount: bigint;
  /** Milliseconds since the Unix epoch. */
  readonly ts: bigint;
  readonly status: TxStatus;
  readonly description: string;
}

export const U64_MAX = (1n << 64n) - 1n;
export const I64_MIN = -(1n << 63n);
export const I64_MAX = (1n << 63n) - 1n;

const unsigned64 = z.bigint().min(0n).max(U64_MAX);
const signed64 = z.bigint().min(I64_MIN).max(I64_MAX);

export const TxRecordSchema = z.object({
  id: unsigned64,
  kind: z.enum(['DEPOSIT', 'TRANSFER', 'WITHDRAWAL']),
  from: unsigned64,
  to: unsigned64,
  amount: signed64,
  ts: unsigned64,
  status: z.enum(['SUCCESS', 'FAILURE', 'PENDING']),
  description: z.string(),
});

export type TxRecordInput = z.input<typeof TxRecordSchema>;

export const createTxRecord = (input: TxRecordInput): TxRecord => {
  return Object.freeze(TxRecordSchema.parse(input));
};

// Field order matters: it is the identity used for multiset counting.
export const recordKey = (record: TxRecord): string => {
  return JSON.stringify([
    record.id.toString(),
    record.kind,
    record.from.toString(),
    record.to.toString(),
    record.amount.toString(),
    record.ts.toString(),
    record.status,
    record.description,
  ]);
};

export const isSameRecord = (left: TxRecord, right: TxRecord): boolean => {
  return (
    left.id === right.id &&
    left.kind === right.kind &&
    left.from === right.from &&
    left.to === right.to &&
    left.amount === right.amount &&
    left.ts === right.ts &&
    left.status === right.status &&
    left.description === right.description
  );
};

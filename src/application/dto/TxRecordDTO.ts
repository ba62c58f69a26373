import dayjs from 'dayjs';
import type { TxKind, TxRecord, TxStatus } from '../../domain/entities/TxRecord.js';

/** JSON-safe view of a record: 64-bit values as decimal strings. */
export interface TxRecordDTO {
  id: string;
  kind: TxKind;
  from: string;
  to: string;
  amount: string;
  timestamp: string;
  timestampIso: string | null;
  status: TxStatus;
  description: string;
}

const formatTimestamp = (ts: bigint): string | null => {
  if (ts > BigInt(Number.MAX_SAFE_INTEGER)) {
    return null;
  }

  const moment = dayjs(Number(ts));
  return moment.isValid() ? moment.toISOString() : null;
};

export const toTxRecordDTO = (record: TxRecord): TxRecordDTO => ({
  id: record.id.toString(),
  kind: record.kind,
  from: record.from.toString(),
  to: record.to.toString(),
  amount: record.amount.toString(),
  timestamp: record.ts.toString(),
  timestampIso: formatTimestamp(record.ts),
  status: record.status,
  description: record.description,
});

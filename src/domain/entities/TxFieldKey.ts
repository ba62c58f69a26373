export type TxFieldKey =
  | 'TX_ID'
  | 'TX_TYPE'
  | 'FROM_USER_ID'
  | 'TO_USER_ID'
  | 'AMOUNT'
  | 'TIMESTAMP'
  | 'STATUS'
  | 'DESCRIPTION';

/** Canonical order: output order of the text and CSV formats and the order missing fields are reported in. */
export const TX_FIELD_KEYS: readonly TxFieldKey[] = [
  'TX_ID',
  'TX_TYPE',
  'FROM_USER_ID',
  'TO_USER_ID',
  'AMOUNT',
  'TIMESTAMP',
  'STATUS',
  'DESCRIPTION',
];

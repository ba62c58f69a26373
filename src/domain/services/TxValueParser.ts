import { I64_MAX, I64_MIN, U64_MAX } from '../entities/TxRecord.js';
import type { TxKind, TxStatus } from '../entities/TxRecord.js';
import type { TxFieldKey } from '../entities/TxFieldKey.js';
import { ParserError } from '../errors/ParserError.js';

const unsignedDecimal = /^\+?\d+$/;
const signedDecimal = /^[+-]?\d+$/;

export const parseUnsigned64 = (text: string): bigint => {
  if (!unsignedDecimal.test(text)) {
    throw ParserError.unparsableValue(text);
  }
  const value = BigInt(text);
  if (value > U64_MAX) {
    throw ParserError.unparsableValue(text);
  }
  return value;
};

export const parseSigned64 = (text: string): bigint => {
  if (!signedDecimal.test(text)) {
    throw ParserError.unparsableValue(text);
  }
  const value = BigInt(text);
  if (value < I64_MIN || value > I64_MAX) {
    throw ParserError.unparsableValue(text);
  }
  return value;
};

export const parseKind = (token: string): TxKind => {
  switch (token) {
    case 'DEPOSIT':
    case 'TRANSFER':
    case 'WITHDRAWAL':
      return token;
    default:
      throw ParserError.unparsableValue(token);
  }
};

export const formatKind = (kind: TxKind): string => {
  switch (kind) {
    case 'DEPOSIT':
      return 'DEPOSIT';
    case 'TRANSFER':
      return 'TRANSFER';
    case 'WITHDRAWAL':
      return 'WITHDRAWAL';
  }
};

export const kindFromByte = (code: number): TxKind => {
  switch (code) {
    case 0:
      return 'DEPOSIT';
    case 1:
      return 'TRANSFER';
    case 2:
      return 'WITHDRAWAL';
    default:
      throw ParserError.unparsableValue(String(code));
  }
};

export const kindToByte = (kind: TxKind): number => {
  switch (kind) {
    case 'DEPOSIT':
      return 0;
    case 'TRANSFER':
      return 1;
    case 'WITHDRAWAL':
      return 2;
  }
};

export const parseStatus = (token: string): TxStatus => {
  switch (token) {
    case 'SUCCESS':
    case 'FAILURE':
    case 'PENDING':
      return token;
    default:
      throw ParserError.unparsableValue(token);
  }
};

export const formatStatus = (status: TxStatus): string => {
  switch (status) {
    case 'SUCCESS':
      return 'SUCCESS';
    case 'FAILURE':
      return 'FAILURE';
    case 'PENDING':
      return 'PENDING';
  }
};

export const statusFromByte = (code: number): TxStatus => {
  switch (code) {
    case 0:
      return 'SUCCESS';
    case 1:
      return 'FAILURE';
    case 2:
      return 'PENDING';
    default:
      throw ParserError.unparsableValue(String(code));
  }
};

export const statusToByte = (status: TxStatus): number => {
  switch (status) {
    case 'SUCCESS':
      return 0;
    case 'FAILURE':
      return 1;
    case 'PENDING':
      return 2;
  }
};

export const parseFieldKey = (token: string): TxFieldKey => {
  switch (token) {
    case 'TX_ID':
    case 'TX_TYPE':
    case 'FROM_USER_ID':
    case 'TO_USER_ID':
    case 'AMOUNT':
    case 'TIMESTAMP':
    case 'STATUS':
    case 'DESCRIPTION':
      return token;
    default:
      throw ParserError.unparsableKey(token);
  }
};

export const unquote = (value: string): string => {
  if (value.length < 2 || !value.startsWith('"') || !value.endsWith('"')) {
    throw ParserError.shellBeQuoted(value);
  }
  return value.slice(1, -1);
};

export const quote = (value: string): string => `"${value}"`;

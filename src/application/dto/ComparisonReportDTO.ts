import type { TxRecord } from '../../domain/entities/TxRecord.js';

/** 1 or 2: which of the compared files an occurrence came from. */
export type ComparedFile = 1 | 2;

export interface UnmatchedRecordDTO {
  record: TxRecord;
  /** The file holding the surplus occurrences; the other file lacks them. */
  presentIn: ComparedFile;
  /** How many more times the record occurs in `presentIn` than in the other file. */
  surplus: number;
}

export interface ComparisonReportDTO {
  firstCount: number;
  secondCount: number;
  identical: boolean;
  unmatched: UnmatchedRecordDTO[];
}

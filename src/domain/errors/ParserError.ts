import type { TxFieldKey } from '../entities/TxFieldKey.js';

export type ParserFault =
  | { type: 'MissingField'; field: TxFieldKey }
  | { type: 'UnparsableKey'; key: string }
  | { type: 'UnparsableValue'; value: string }
  | { type: 'Duplicate'; field: TxFieldKey }
  | { type: 'NoFieldDelimiter' }
  | { type: 'ShellBeQuoted'; value: string }
  | { type: 'InvalidFileHeader' }
  | { type: 'InvalidRecordHeader'; found: string }
  | { type: 'IncompleteRecord' };

export type ParserFaultType = ParserFault['type'];

/** Where in the input a fault was found. Line formats report lines, the binary format byte offsets. */
export type ParserContext =
  | { type: 'line'; lineNumber: number; line: string }
  | { type: 'position'; position: number }
  | { type: 'positionAndField'; position: number; field: TxFieldKey };

export const describeFault = (fault: ParserFault): string => {
  switch (fault.type) {
    case 'MissingField':
      return `required field ${fault.field} is missing`;
    case 'UnparsableKey':
      return `unknown key ${fault.key}`;
    case 'UnparsableValue':
      return `value ${fault.value} can't be parsed`;
    case 'Duplicate':
      return `field ${fault.field} has duplicate`;
    case 'NoFieldDelimiter':
      return 'key-value delimiter is expected';
    case 'ShellBeQuoted':
      return `string ->${fault.value}<- shall be double quoted`;
    case 'InvalidFileHeader':
      return 'invalid file header';
    case 'InvalidRecordHeader':
      return `invalid record header "${fault.found}"`;
    case 'IncompleteRecord':
      return "incomplete record (doesn't have all required fields)";
  }
};

export const describeContext = (context: ParserContext): string => {
  switch (context.type) {
    case 'line':
      return `line #${context.lineNumber}, content: \`${context.line}\``;
    case 'position':
      return `position #${context.position}`;
    case 'positionAndField':
      return `position #${context.position}, field being parsed: \`${context.field}\``;
  }
};

/**
 * A format-level fault with no location attached yet. Codecs catch it and
 * rethrow it as a `ParsingError` once they know where they are in the input.
 */
export class ParserError extends Error {
  readonly fault: ParserFault;

  constructor(fault: ParserFault) {
    super(describeFault(fault));
    this.fault = fault;
    this.name = 'ParserError';
  }

  static missingField(field: TxFieldKey): ParserError {
    return new ParserError({ type: 'MissingField', field });
  }

  static unparsableKey(key: string): ParserError {
    return new ParserError({ type: 'UnparsableKey', key });
  }

  static unparsableValue(value: string): ParserError {
    return new ParserError({ type: 'UnparsableValue', value });
  }

  static duplicate(field: TxFieldKey): ParserError {
    return new ParserError({ type: 'Duplicate', field });
  }

  static noFieldDelimiter(): ParserError {
    return new ParserError({ type: 'NoFieldDelimiter' });
  }

  static shellBeQuoted(value: string): ParserError {
    return new ParserError({ type: 'ShellBeQuoted', value });
  }

  static invalidFileHeader(): ParserError {
    return new ParserError({ type: 'InvalidFileHeader' });
  }

  static invalidRecordHeader(found: string): ParserError {
    return new ParserError({ type: 'InvalidRecordHeader', found });
  }

  static incompleteRecord(): ParserError {
    return new ParserError({ type: 'IncompleteRecord' });
  }
}

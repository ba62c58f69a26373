import { TextDecoder } from 'node:util';
import { ReadError } from '../../domain/errors/AppError.js';

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Splits UTF-8 input into lines. LF and CRLF endings are both accepted and a
 * final line terminator does not produce an extra empty line.
 */
export const readLines = (input: Buffer): string[] => {
  let text: string;
  try {
    text = utf8.decode(input);
  } catch {
    throw new ReadError(new Error('stream did not contain valid UTF-8'));
  }

  if (text.length === 0) {
    return [];
  }

  const lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (text.endsWith('\n')) {
    lines.pop();
  }
  return lines;
};

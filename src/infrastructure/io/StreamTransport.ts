import { createReadStream } from 'node:fs';
import type { Writable } from 'node:stream';
import type { ByteSource } from '../../application/ports/TransactionCodecPort.js';
import { ReadError, toError, WriteError } from '../../domain/errors/AppError.js';

export const readAll = async (source: ByteSource): Promise<Buffer> => {
  const chunks: Buffer[] = [];

  try {
    for await (const chunk of source) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
    }
  } catch (error) {
    throw new ReadError(toError(error));
  }

  return Buffer.concat(chunks);
};

export const writeAll = async (sink: Writable, data: Buffer): Promise<void> => {
  if (data.length === 0) {
    return;
  }

  await new Promise<void>((resolve, reject) => {
    const onError = (error: Error) => {
      reject(new WriteError(error));
    };

    sink.once('error', onError);
    sink.write(data, (error) => {
      if (error) {
        // the stream may still emit 'error' after this callback, keep the listener
        reject(new WriteError(error));
        return;
      }
      sink.off('error', onError);
      resolve();
    });
  });
};

/** A file source that is only opened once iteration starts, so an open failure surfaces as a read error. */
export const openFileSource = (path: string): ByteSource => ({
  [Symbol.asyncIterator]: () => createReadStream(path)[Symbol.asyncIterator](),
});

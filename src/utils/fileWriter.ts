/**
 * JSONL Record Writer
 *
 * Writes PostRecords one JSON object per line, in the order they are
 * handed over. Each write is awaited until the stream has taken it, so
 * the file order is the merge order.
 */

import { once } from 'node:events';
import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Writable } from 'node:stream';
import { PostRecordSchema } from '../schemas/index.js';
import type { OutputEncoding, PostRecord } from '../types/index.js';
import { logVerbose } from './logger.js';

// ============================================
// Serialization
// ============================================

/**
 * Serialize one record as a JSON line (without the newline).
 *
 * The record is validated first; key order follows PostRecordSchema.
 * Non-ASCII text is written as-is, not escaped.
 *
 * @throws Error if the record fails validation
 */
export function serializeRecord(record: PostRecord): string {
  const result = PostRecordSchema.safeParse(record);
  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Validation failed before writing record ${record.id}: ${errors}`);
  }
  return JSON.stringify(result.data);
}

// ============================================
// Record Sink
// ============================================

export interface RecordSink {
  /** Append one record; resolves once the stream accepted it */
  write(record: PostRecord): Promise<void>;
  /** Flush and release the destination */
  close(): Promise<void>;
  /** Records written so far */
  readonly count: number;
}

export interface RecordSinkOptions {
  encoding?: OutputEncoding;
  /** End the stream on close (false for stdout) */
  endOnClose?: boolean;
}

/**
 * Wrap a writable stream as a RecordSink.
 *
 * The first stream error is kept: the write in flight rejects with it, and
 * so does every later write.
 */
export function createRecordSink(stream: Writable, options: RecordSinkOptions = {}): RecordSink {
  const encoding = options.encoding ?? 'utf8';
  let count = 0;
  let closed = false;
  let failure: Error | undefined;

  stream.on('error', (error: Error) => {
    failure ??= error;
  });

  return {
    get count() {
      return count;
    },

    async write(record: PostRecord): Promise<void> {
      if (closed) {
        throw new Error('Record sink is closed');
      }
      if (failure) {
        throw failure;
      }
      const line = `${serializeRecord(record)}\n`;
      await new Promise<void>((resolve, reject) => {
        stream.write(line, encoding, (error) => {
          if (error) {
            failure ??= error;
            reject(failure);
          } else {
            resolve();
          }
        });
      });
      count += 1;
    },

    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      if (options.endOnClose && !failure) {
        await new Promise<void>((resolve, reject) => {
          stream.once('error', reject);
          stream.end(() => resolve());
        });
      }
      logVerbose(`Record sink closed after ${count} records`);
    },
  };
}

/**
 * Open the run's destination: a file (created or truncated) or stdout.
 */
export async function openRecordSink(
  outputPath: string | undefined,
  encoding: OutputEncoding = 'utf8'
): Promise<RecordSink> {
  if (outputPath === undefined) {
    return createRecordSink(process.stdout, { encoding, endOnClose: false });
  }

  await mkdir(dirname(outputPath), { recursive: true });
  const stream = createWriteStream(outputPath, { flags: 'w', encoding });
  await once(stream, 'open');
  logVerbose(`Writing records to ${outputPath}`);

  return createRecordSink(stream, { encoding, endOnClose: true });
}

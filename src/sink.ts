import { SinkWriteError } from './errors.js';

/**
 * Anything text can be written to, e.g. a Node.js `Writable` or a custom collector.
 * Errors thrown by `write()` and ended, destroyed or errored streams are detected;
 * a stream failing later reports it through its own `error` event.
 */
export interface TextWriter {
  write (chunk: string): unknown;
}

/**
 * Append-only output sink the encoding and scanning algorithms write to.
 */
export interface OutputSink {
  append (chunk: string): void;
}

/**
 * In-memory sink backing the string-returning API.
 */
export class StringSink implements OutputSink {
  private buffer = '';

  append (chunk: string): void {
    this.buffer += chunk;
  }

  toString (): string {
    return this.buffer;
  }
}

/**
 * Number of buffered UTF-16 code units after which a {@link WriterSink} writes.
 */
export const WRITER_BUFFER_SIZE = 8192;

/**
 * Failure of a stream-like writer that can no longer take data, e.g. an ended,
 * destroyed or errored Node.js `Writable`. Writers without these properties
 * are never reported as failed.
 */
const streamFailure = (writer: TextWriter): unknown => {
  if ('errored' in writer && writer.errored) {
    return writer.errored;
  }
  if ('destroyed' in writer && writer.destroyed === true) {
    return new Error('Cannot write to a destroyed stream');
  }
  if ('writableEnded' in writer && writer.writableEnded === true) {
    return new Error('Cannot write after end');
  }
  return undefined;
};

/**
 * Sink forwarding the output to a caller-supplied writer in batches of
 * {@link WRITER_BUFFER_SIZE} code units; the rest is written by {@link flush}.
 * Errors thrown by the writer, and streams that can no longer be written to,
 * are reported as {@link SinkWriteError}.
 */
export class WriterSink implements OutputSink {
  private buffer = '';

  constructor (private readonly writer: TextWriter) {}

  append (chunk: string): void {
    this.buffer += chunk;
    if (this.buffer.length >= WRITER_BUFFER_SIZE) {
      this.flush();
    }
  }

  /**
   * Write the buffered output. Nothing is written if the buffer is empty.
   */
  flush (): void {
    if (this.buffer.length === 0) return;

    const chunk = this.buffer;
    this.buffer = '';

    const failure = streamFailure(this.writer);
    if (failure !== undefined) {
      throw new SinkWriteError('The output writer can no longer be written to', failure);
    }

    try {
      this.writer.write(chunk);
    } catch (err) {
      throw new SinkWriteError('An error occurred while writing to the output writer', err);
    }
  }
}

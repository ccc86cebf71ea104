import type { TextWriter } from '../../src/sink.js';

/**
 * Writer collecting all chunks in memory.
 */
export class CollectingWriter implements TextWriter {
  readonly chunks: string[] = [];

  write (chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  toString (): string {
    return this.chunks.join('');
  }
}

/**
 * Writer failing on every write, like a closed stream.
 */
export class FailingWriter implements TextWriter {
  readonly error = new Error('stream closed');

  write (_chunk: string): never {
    throw this.error;
  }
}

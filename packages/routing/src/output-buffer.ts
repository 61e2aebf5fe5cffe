import { AsyncLocalStorage } from 'node:async_hooks';

import type { CapturedOutput, EchoChunk } from './types';

/**
 * Collects the incidental output written while one action call runs.
 * Buffers nest: a capture started inside another one gets its own buffer.
 */
export class OutputBuffer {
  private static storage = new AsyncLocalStorage<OutputBuffer>();

  private chunks: string[] = [];

  /**
   * Runs `callback` with a fresh buffer and returns what it wrote along with
   * its return value. A throwing callback discards its output.
   */
  static capture<R>(callback: () => R): CapturedOutput<R> {
    const buffer = new OutputBuffer();
    const result = this.storage.run(buffer, callback);
    return { output: buffer.flush(), result };
  }

  static current(): OutputBuffer | undefined {
    return this.storage.getStore();
  }

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  /**
   * Returns the buffered text and empties the buffer.
   */
  flush(): string {
    const output = this.chunks.join('');
    this.chunks = [];
    return output;
  }
}

/**
 * Writes to the innermost active output buffer, or to stdout when no action
 * is running.
 */
export function echo(...chunks: EchoChunk[]): void {
  const text = chunks.map(chunk => String(chunk)).join('');
  const buffer = OutputBuffer.current();

  if (buffer) {
    buffer.write(text);
    return;
  }

  process.stdout.write(text);
}

import { afterEach, describe, expect, it, vi } from 'vitest';

import { echo, OutputBuffer } from './output-buffer';

describe('OutputBuffer', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return the output and the result of the callback', () => {
    const captured = OutputBuffer.capture(() => {
      echo('a', 1, true);
      echo('b');
      return 7;
    });

    expect(captured).toEqual({ output: 'a1trueb', result: 7 });
  });

  it('should isolate nested captures', () => {
    const outer = OutputBuffer.capture(() => {
      echo('a');
      const inner = OutputBuffer.capture(() => {
        echo('b');
        return 'inner';
      });
      echo('c');
      return inner;
    });

    expect(outer.output).toBe('ac');
    expect(outer.result).toEqual({ output: 'b', result: 'inner' });
  });

  it('should release the buffer when the callback throws', () => {
    expect(() =>
      OutputBuffer.capture(() => {
        echo('lost');
        throw new Error('boom');
      }),
    ).toThrow('boom');

    expect(OutputBuffer.current()).toBeUndefined();
    expect(OutputBuffer.capture(() => 'next').output).toBe('');
  });

  it('should write to stdout outside of a capture', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    echo('plain');

    expect(write).toHaveBeenCalledWith('plain');
  });

  it('should empty the buffer on flush', () => {
    const buffer = new OutputBuffer();
    buffer.write('x');

    expect(buffer.flush()).toBe('x');
    expect(buffer.flush()).toBe('');
  });
});

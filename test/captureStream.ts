import { Writable } from 'stream';

export interface CapturedStream {
  stream: Writable;
  text: () => string;
}

/**
 * Writable that keeps everything written to it, for asserting on CLI output
 */
export function captureStream(): CapturedStream {
  const chunks: string[] = [];
  const stream = new Writable({
    write(
      chunk: Buffer,
      _encoding: BufferEncoding,
      callback: (error?: Error | null) => void
    ): void {
      chunks.push(chunk.toString('utf-8'));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

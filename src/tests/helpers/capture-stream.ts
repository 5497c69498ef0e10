// src/tests/helpers/capture-stream.ts
import { Writable } from 'stream';

export interface CapturedStream {
  stream: Writable;
  chunks: string[];
  text(): string;
}

export function captureStream(): CapturedStream {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    }
  });
  return { stream, chunks, text: () => chunks.join('') };
}

/** Let queued stream writes reach their destination. */
export async function waitFor(condition: () => boolean, attempts = 50): Promise<void> {
  for (let i = 0; i < attempts && !condition(); i++) {
    await new Promise(resolve => setImmediate(resolve));
  }
}

import { readSync } from "fs";
import { StringDecoder } from "string_decoder";

/** A forward-only stream of characters. read returns undefined once the stream is exhausted */
export interface CharSource {
  read(): string | undefined;
}

export const stringSource = (input: string): CharSource => {
  const chars = Array.from(input);
  let index = 0;

  return {
    read: () => (index < chars.length ? chars[index++] : undefined),
  };
};

/** Same shape as fs.readSync */
export type ReadBytes = (
  fd: number,
  buffer: Buffer,
  offset: number,
  length: number,
  position: null
) => number;

/**
 * Reads a file descriptor in chunks with blocking reads. When fd is an interactive terminal
 * each read waits until a line is available.
 */
export const fileSource = (
  fd: number,
  chunkSize = 4096,
  readBytes: ReadBytes = readSync
): CharSource => {
  const decoder = new StringDecoder("utf8");
  const buffer = Buffer.alloc(chunkSize);
  let chars: string[] = [];
  let index = 0;
  let ended = false;

  const fill = () => {
    while (index >= chars.length && !ended) {
      const bytesRead = readChunk(readBytes, fd, buffer);
      index = 0;

      if (bytesRead === 0) {
        ended = true;
        chars = Array.from(decoder.end());
        break;
      }

      // A chunk can end inside a multi-byte character, in which case the decoder holds it back
      chars = Array.from(decoder.write(buffer.subarray(0, bytesRead)));
    }
  };

  return {
    read: () => {
      fill();
      return index < chars.length ? chars[index++] : undefined;
    },
  };
};

const readChunk = (readBytes: ReadBytes, fd: number, buffer: Buffer): number => {
  for (;;) {
    try {
      return readBytes(fd, buffer, 0, buffer.length, null);
    } catch (error) {
      // Non-blocking stdin reports EAGAIN instead of waiting
      if (isErrnoCode(error, "EAGAIN")) {
        sleep(retryDelayMs);
        continue;
      }
      if (isErrnoCode(error, "EOF")) return 0;
      throw error;
    }
  }
};

const retryDelayMs = 10;
const sleepCell = new Int32Array(new SharedArrayBuffer(4));

/** Blocks the thread without spinning */
const sleep = (ms: number) => {
  Atomics.wait(sleepCell, 0, 0, ms);
};

const isErrnoCode = (error: unknown, code: string): boolean =>
  error instanceof Error && "code" in error && error.code === code;

import fs from "node:fs";

import { getChildLogger } from "../logging/logger.js";
import { extractErrorCode } from "./errors.js";

const DEFAULT_CHUNK_SIZE = 64 * 1024;
const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

export type LineSourceOptions = {
  chunkSize?: number;
};

/**
 * Opens `filePath` and returns its lines as a single-use iterable. Open
 * failures throw; lines that are not valid UTF-8 are skipped.
 */
export function readLines(filePath: string, opts: LineSourceOptions = {}): Iterable<string> {
  const fd = fs.openSync(filePath, "r");
  return iterateLines(fd, filePath, Math.max(1, opts.chunkSize ?? DEFAULT_CHUNK_SIZE));
}

function* iterateLines(fd: number, filePath: string, chunkSize: number): Generator<string> {
  const log = getChildLogger("line-source");
  const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
  const buffer = Buffer.alloc(chunkSize);
  let pending: Buffer[] = [];
  let lineNumber = 0;

  const decodeLine = (bytes: Buffer, terminated: boolean): string | undefined => {
    lineNumber += 1;
    const end =
      terminated && bytes.length > 0 && bytes[bytes.length - 1] === CARRIAGE_RETURN
        ? bytes.length - 1
        : bytes.length;
    try {
      return decoder.decode(bytes.subarray(0, end));
    } catch {
      log.trace("dropped line with invalid UTF-8", { path: filePath, line: lineNumber });
      return undefined;
    }
  };

  try {
    while (true) {
      let bytesRead: number;
      try {
        bytesRead = fs.readSync(fd, buffer, 0, buffer.length, null);
      } catch (err) {
        log.debug("read failed; ending input", { path: filePath, code: extractErrorCode(err) });
        break;
      }
      if (bytesRead === 0) break;

      let chunk = buffer.subarray(0, bytesRead);
      let index = chunk.indexOf(NEWLINE);
      while (index !== -1) {
        pending.push(chunk.subarray(0, index));
        const line = decodeLine(Buffer.concat(pending), true);
        pending = [];
        if (line !== undefined) yield line;
        chunk = chunk.subarray(index + 1);
        index = chunk.indexOf(NEWLINE);
      }
      // The read buffer is reused, so keep a copy of the unterminated tail.
      if (chunk.length > 0) pending.push(Buffer.from(chunk));
    }

    if (pending.length > 0) {
      const line = decodeLine(Buffer.concat(pending), false);
      if (line !== undefined) yield line;
    }
  } finally {
    fs.closeSync(fd);
  }
}

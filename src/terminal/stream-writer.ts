import { extractErrorCode } from "../infra/errors.js";

export type OutputStream = {
  write: (chunk: string) => unknown;
  readonly destroyed?: boolean;
  readonly writableEnded?: boolean;
  readonly errored?: Error | null;
};

export type SafeStreamWriterOptions = {
  /** Called once, with the error code (`EPIPE` when none was recorded). */
  onClosed?: (code: string, stream: OutputStream) => void;
};

export type SafeStreamWriter = {
  write: (stream: OutputStream, text: string) => boolean;
  writeLine: (stream: OutputStream, text: string) => boolean;
};

export function isBrokenPipeError(err: unknown): err is NodeJS.ErrnoException {
  const code = extractErrorCode(err);
  return code === "EPIPE" || code === "EIO";
}

function isStreamClosed(stream: OutputStream): boolean {
  return Boolean(stream.destroyed || stream.writableEnded);
}

/**
 * Writes stop for good once the stream breaks. Sockets and pipes report EPIPE
 * by destroying themselves during `write` and emitting `error` a tick later,
 * so the stream state is checked around every write as well.
 */
export function createSafeStreamWriter(options: SafeStreamWriterOptions = {}): SafeStreamWriter {
  let closed = false;

  const close = (stream: OutputStream, err?: unknown): false => {
    closed = true;
    options.onClosed?.(extractErrorCode(err ?? stream.errored) ?? "EPIPE", stream);
    return false;
  };

  const write = (stream: OutputStream, text: string): boolean => {
    if (closed) return false;
    if (isStreamClosed(stream)) return close(stream);
    try {
      stream.write(text);
    } catch (err) {
      if (!isBrokenPipeError(err)) {
        throw err;
      }
      return close(stream, err);
    }
    return isStreamClosed(stream) ? close(stream) : true;
  };

  const writeLine = (stream: OutputStream, text: string): boolean => write(stream, `${text}\n`);

  return {
    write,
    writeLine,
  };
}

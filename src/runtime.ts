import type { OutputStream } from "./terminal/stream-writer.js";

export type RuntimeEnv = {
  stdout: OutputStream;
  error: typeof console.error;
};

export const defaultRuntime: RuntimeEnv = {
  stdout: process.stdout,
  error: (...args: Parameters<typeof console.error>) => {
    console.error(...args);
  },
};

/* eslint-disable no-console */
import type { Logger } from "./core.js";

/**
 * Console-backed {@link Logger}. Every line carries an ISO timestamp and the
 * namespace; `debug` lines appear only while `DEBUG` is set.
 */
export function createConsoleLogger(
  namespace: string,
  env: NodeJS.ProcessEnv = process.env,
): Logger {
  const prefix = (): string => `${new Date().toISOString()} [${namespace}]`;
  const debugEnabled = Boolean(env["DEBUG"]);

  return {
    info(message: string, meta?: unknown): void {
      console.info(prefix(), message, meta ?? "");
    },
    warn(message: string, meta?: unknown): void {
      console.warn(prefix(), message, meta ?? "");
    },
    error(message: string, meta?: unknown): void {
      console.error(prefix(), message, meta ?? "");
    },
    debug(message: string, meta?: unknown): void {
      if (debugEnabled) {
        console.debug(prefix(), message, meta ?? "");
      }
    },
  } satisfies Logger;
}

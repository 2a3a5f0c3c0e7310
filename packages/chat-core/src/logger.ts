import type { Logger } from "./types";

export const createConsoleLogger = (prefix: string): Logger => {
  return (message: string) => {
    console.info(`[${new Date().toISOString()}] [${prefix}] ${message}`);
  };
};

export const prefixLogger = (logger: Logger | undefined, prefix: string): Logger | undefined =>
  logger ? (message: string) => logger(`[${prefix}] ${message}`) : undefined;

/** Returns a logger that only forwards when `verbose` is set; used for per-line diagnostics. */
export const verboseLogger = (logger: Logger | undefined, verbose: boolean | undefined): Logger | undefined =>
  verbose ? logger : undefined;

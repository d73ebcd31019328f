/**
 * Tagged console logging.
 *
 * Output looks like `[HybridSearch] Search completed ...`. Debug lines are
 * only printed when VERBOSE_LOGGING=true.
 */

const verbose = process.env.VERBOSE_LOGGING === "true";

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(message, ...details) {
      if (verbose) {
        console.log(prefix, message, ...details);
      }
    },
    info(message, ...details) {
      console.log(prefix, message, ...details);
    },
    warn(message, ...details) {
      console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      console.error(prefix, message, ...details);
    },
  };
}

/** Shortens user text for log lines. */
export function preview(text: string, max: number = 50): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

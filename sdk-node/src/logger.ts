export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
}

const PREFIX = "[conversiontools]";

export const consoleLogger: Logger = {
  debug(message, context) {
    if (context) console.debug(`${PREFIX} ${message}`, context);
    else console.debug(`${PREFIX} ${message}`);
  },
  warn(message, context) {
    if (context) console.warn(`${PREFIX} ${message}`, context);
    else console.warn(`${PREFIX} ${message}`);
  },
};

export const silentLogger: Logger = {
  debug() {},
  warn() {},
};

export function isDebugEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const raw = env.CONVERSIONTOOLS_DEBUG?.trim().toLowerCase();
  return raw === "1" || raw === "true";
}

/**
 * An explicit logger always wins; otherwise console output is opt-in through
 * `debug` or the CONVERSIONTOOLS_DEBUG env var.
 */
export function resolveLogger(opts: {
  logger?: Logger;
  debug?: boolean;
}): Logger {
  if (opts.logger) return opts.logger;
  if (opts.debug ?? isDebugEnv()) return consoleLogger;
  return silentLogger;
}

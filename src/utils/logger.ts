export interface Logger {
  log(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string): void;
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.DEBUG === "1" || env.DEBUG === "true";
}

export function createLogger(options: { debug?: boolean } = {}): Logger {
  const debugEnabled = options.debug ?? isDebugEnabled();
  return {
    log: (message) => console.log(message),
    info: (message) => console.log(message),
    success: (message) => console.log(`✓ ${message}`),
    warn: (message) => console.warn(`Warning: ${message}`),
    error: (message, ...args) => console.error(message, ...args),
    debug: (message) => {
      if (debugEnabled) {
        console.debug(`[DEBUG] ${message}`);
      }
    },
  };
}

export const logger = createLogger();

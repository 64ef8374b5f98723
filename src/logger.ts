// Speaking Coach - Console logging
// Every component takes a Logger so tests can inject a silent one.

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const ts = () => new Date().toISOString();

/**
 * Console logger writing `[LEVEL] [component] message` lines.
 * Debug lines are only written when DEBUG_AUDIO=true, since the frame path
 * logs at debug level on every frame.
 */
export function createConsoleLogger(component: string): Logger {
  const debugEnabled = process.env.DEBUG_AUDIO === "true";
  return {
    debug: (msg, ...args) => {
      if (debugEnabled) console.debug(`[DEBUG] [${ts()}] [${component}] ${msg}`, ...args);
    },
    info: (msg, ...args) => console.log(`[INFO] [${ts()}] [${component}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN] [${ts()}] [${component}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR] [${ts()}] [${component}] ${msg}`, ...args),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

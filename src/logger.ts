// Voice Moderation Relay - Logging
// Every component takes an injected Logger; the default writes to the console
// with a `[LEVEL] [Component]` prefix.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

const ts = () => new Date().toISOString();

/**
 * Console-backed logger scoped to one component.
 * Debug lines are only written when `DEBUG` is set in the environment.
 */
export function createConsoleLogger(component: string): Logger {
  const prefix = (level: string) => `[${level}] [${ts()}] [${component}]`;
  return {
    info: (msg, ...args) => console.log(`${prefix("INFO")} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`${prefix("WARN")} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`${prefix("ERROR")} ${msg}`, ...args),
    debug: (msg, ...args) => {
      if (process.env.DEBUG) {
        console.debug(`${prefix("DEBUG")} ${msg}`, ...args);
      }
    },
  };
}

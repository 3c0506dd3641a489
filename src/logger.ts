/**
 * Console logging with a bracketed scope prefix, e.g. `[DataSource] Connected to app.db`.
 * Disabled loggers drop every message.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly scope: string,
    private readonly enabled: boolean,
  ) {}

  debug(message: string, ...details: unknown[]): void {
    if (this.enabled) console.debug(`[${this.scope}] ${message}`, ...details);
  }

  info(message: string, ...details: unknown[]): void {
    if (this.enabled) console.log(`[${this.scope}] ${message}`, ...details);
  }

  warn(message: string, ...details: unknown[]): void {
    if (this.enabled) console.warn(`[${this.scope}] ${message}`, ...details);
  }

  error(message: string, ...details: unknown[]): void {
    if (this.enabled) console.error(`[${this.scope}] ${message}`, ...details);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(scope, this.enabled);
  }
}

export function createLogger(scope: string, enabled: boolean): Logger {
  return new ConsoleLogger(scope, enabled);
}

export const silentLogger: Logger = createLogger('silent', false);

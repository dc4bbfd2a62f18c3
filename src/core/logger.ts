/**
 * Minimal logger used across the SDK.
 * Each component logs with its own `[Component]` prefix.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(component: string): Logger;
}

/**
 * Console-backed logger. Debug lines are only printed when `debug` is set.
 */
export class ConsoleLogger implements Logger {
  private readonly component: string;
  private readonly debugEnabled: boolean;

  constructor(component: string = "NetAppClient", debug: boolean = false) {
    this.component = component;
    this.debugEnabled = debug;
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.debugEnabled || typeof console === "undefined") return;
    console.debug(`[${this.component}] ${message}`, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (typeof console === "undefined") return;
    console.log(`[${this.component}] ${message}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (typeof console === "undefined") return;
    console.warn(`[${this.component}] ${message}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (typeof console === "undefined") return;
    console.error(`[${this.component}] ${message}`, ...args);
  }

  child(component: string): Logger {
    return new ConsoleLogger(component, this.debugEnabled);
  }
}

const noop = () => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};

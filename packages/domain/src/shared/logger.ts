// Minimal logging seam. Services log through this so tests can stay quiet.

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void
  info(message: string, meta?: Record<string, unknown>): void
  warn(message: string, meta?: Record<string, unknown>): void
}

export const consoleLogger: Logger = {
  debug: (message, meta) => (meta ? console.debug(message, meta) : console.debug(message)),
  info: (message, meta) => (meta ? console.info(message, meta) : console.info(message)),
  warn: (message, meta) => (meta ? console.warn(message, meta) : console.warn(message)),
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
}

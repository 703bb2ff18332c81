/**
 * Minimal structured logger.
 *
 * Messages are short constant strings; variable data travels in `fields`.
 */
export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
}

function render(message: string, fields?: Record<string, unknown>): string {
  if (!fields) return message;
  const parts = Object.entries(fields).map(([key, value]) => `${key}=${String(value)}`);
  return parts.length > 0 ? `${message} ${parts.join(' ')}` : message;
}

/**
 * Logger writing through `console`.
 */
export const consoleLogger: Logger = {
  debug(message, fields) {
    console.debug(render(message, fields));
  },
  info(message, fields) {
    console.info(render(message, fields));
  },
};

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
};

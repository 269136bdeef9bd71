/**
 * Logging surface used by the core. `connection.console` from
 * vscode-languageserver satisfies it, so does the global `console`.
 */
export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function parseDebugFlags(value: string | undefined): Set<string> {
  return new Set(
    (value ?? '')
      .split(',')
      .map(flag => flag.trim().toLowerCase())
      .filter(Boolean)
  );
}

const debugFlags = parseDebugFlags(process.env.HTMX_LS_DEBUG);

export function getDebugFlags(): string[] {
  return Array.from(debugFlags);
}

export function isDebugEnabled(flag: string): boolean {
  return debugFlags.has('all') || debugFlags.has(flag);
}

export function debugLog(logger: Logger, flag: string, message: string): void {
  if (isDebugEnabled(flag)) {
    logger.log(`[debug:${flag}] ${message}`);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export const silentLogger: Logger = {
  log: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/** Sink for human-readable parser diagnostics */
export interface DiagnosticLogger {
  error(message: string): void
  warn(message: string): void
}

export interface ParserOptions {
  /** Defaults to the global console */
  logger?: DiagnosticLogger
}

export function resolveLogger(options?: ParserOptions): DiagnosticLogger {
  return options?.logger ?? console
}

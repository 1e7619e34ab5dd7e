/**
 * Logging surface shared by every scanner component
 */
export type Logger = {
  debug: (message: string) => void
  info: (message: string) => void
  warn: (message: string) => void
  error: (message: string) => void
  success: (message: string) => void
}

export function createConsoleLogger(options: { prefix?: string; verbose?: boolean } = {}): Logger {
  const prefix = options.prefix ?? "[flexscan]"
  return {
    debug: (message) => {
      if (options.verbose) {
        console.debug(`${prefix} ${message}`)
      }
    },
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message) => console.error(`${prefix} ${message}`),
    success: (message) => console.log(`${prefix} ${message}`),
  }
}

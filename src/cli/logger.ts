import * as p from "@clack/prompts"
import type { Logger } from "@flexscan/scanner"
import pc from "picocolors"

/**
 * Logger that renders through @clack/prompts
 */
export function createClackLogger(options: { verbose?: boolean } = {}): Logger {
  return {
    debug: (message) => {
      if (options.verbose) {
        p.log.message(pc.dim(message))
      }
    },
    info: (message) => p.log.info(message),
    warn: (message) => p.log.warn(message),
    error: (message) => p.log.error(message),
    success: (message) => p.log.success(message),
  }
}

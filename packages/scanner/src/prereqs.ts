import { runAz, type AzOptions } from "./az"
import { describeExecFailure } from "./exec"
import type { Logger } from "./logger"

/**
 * Add or upgrade the configured az extensions. Failures are warnings;
 * the scan goes ahead with whatever is installed.
 */
export async function ensurePrerequisites(
  options: AzOptions & { extensions: readonly string[]; logger: Logger },
): Promise<void> {
  for (const extension of options.extensions) {
    options.logger.info(`Ensuring az extension ${extension} is installed and current`)
    const result = await runAz(options, ["extension", "add", "--upgrade", "--yes", "--name", extension])
    if (!result.success) {
      options.logger.warn(`Could not install az extension ${extension}: ${describeExecFailure(result)}`)
    }
  }
}

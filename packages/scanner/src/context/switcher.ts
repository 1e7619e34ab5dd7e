import { runAz, type AzOptions } from "../az"
import { describeExecFailure } from "../exec"
import { extractJson } from "../extract/json"
import type { Logger } from "../logger"
import { fail, ok, type Context, type Result, type SwitchFailed } from "../types"
import { ContextEntrySchema } from "./schema"

/**
 * Reads and writes the az CLI's active subscription
 */
export type ContextSwitcher = {
  /** Best effort; null when nothing is active or it cannot be read */
  captureOriginal: () => Promise<Context | null>
  activate: (context: Context) => Promise<Result<void, SwitchFailed>>
  /** Never throws; a failed restore is logged */
  restore: (original: Context | null) => Promise<void>
}

export function createAzContextSwitcher(options: AzOptions & { logger: Logger }): ContextSwitcher {
  const { logger } = options

  async function captureOriginal(): Promise<Context | null> {
    const result = await runAz(options, [
      "account",
      "show",
      "--query",
      "{id:id, name:name}",
      "--output",
      "json",
    ])
    if (!result.success) {
      logger.debug(`No active subscription to restore (${describeExecFailure(result)})`)
      return null
    }

    const extracted = extractJson(result.stdout)
    if (!extracted.success) {
      logger.debug("No active subscription to restore")
      return null
    }

    try {
      const parsed = ContextEntrySchema.safeParse(JSON.parse(extracted.value))
      if (parsed.success) {
        return parsed.data
      }
      logger.debug("Active subscription output did not contain an id")
    } catch {
      logger.debug("Active subscription output was not valid JSON")
    }
    return null
  }

  async function setSubscription(id: string) {
    return runAz(options, ["account", "set", "--subscription", id])
  }

  async function activate(context: Context): Promise<Result<void, SwitchFailed>> {
    const result = await setSubscription(context.id)
    if (!result.success) {
      return fail({ kind: "switch-failed", message: describeExecFailure(result) })
    }
    return ok(undefined)
  }

  async function restore(original: Context | null): Promise<void> {
    if (!original) {
      logger.debug("Skipping subscription restore: none was active at start")
      return
    }

    const result = await setSubscription(original.id)
    if (!result.success) {
      logger.error(
        `Failed to restore subscription ${original.name} (${original.id}): ${describeExecFailure(result)}`,
      )
      return
    }
    logger.debug(`Restored subscription ${original.name} (${original.id})`)
  }

  return { captureOriginal, activate, restore }
}

/**
 * Run `fn` with the active subscription captured up front and restored
 * afterwards, exactly once, however `fn` exits
 */
export async function withAmbientContext<T>(
  switcher: ContextSwitcher,
  fn: (original: Context | null) => Promise<T>,
): Promise<T> {
  const original = await switcher.captureOriginal()
  try {
    return await fn(original)
  } finally {
    await switcher.restore(original)
  }
}

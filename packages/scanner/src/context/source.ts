import { z } from "zod"
import { runAz, type AzOptions } from "../az"
import { describeExecFailure } from "../exec"
import { extractJson } from "../extract/json"
import type { Logger } from "../logger"
import type { Context } from "../types"
import { ContextEntrySchema } from "./schema"

export class ContextListError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ContextListError"
  }
}

export type ContextFilter = {
  include: string[]
  exclude: string[]
}

const ENABLED_SUBSCRIPTIONS_QUERY = "[?state=='Enabled'].{id:id, name:name}"

/**
 * List every enabled subscription visible to the signed-in account
 *
 * @throws ContextListError when az fails or prints something other than a JSON array
 */
export async function listContexts(options: AzOptions & { logger: Logger }): Promise<Context[]> {
  const result = await runAz(options, [
    "account",
    "list",
    "--query",
    ENABLED_SUBSCRIPTIONS_QUERY,
    "--output",
    "json",
  ])
  if (!result.success) {
    throw new ContextListError(`az account list failed: ${describeExecFailure(result)}`)
  }

  const extracted = extractJson(result.stdout)
  if (!extracted.success) {
    // az prints nothing at all for an empty result in some versions
    return []
  }

  let entries: unknown[]
  try {
    entries = z.array(z.unknown()).parse(JSON.parse(extracted.value))
  } catch {
    throw new ContextListError("az account list did not return a JSON array")
  }

  const contexts: Context[] = []
  for (const entry of entries) {
    const parsed = ContextEntrySchema.safeParse(entry)
    if (parsed.success) {
      contexts.push(parsed.data)
    } else {
      options.logger.debug(`Ignoring subscription entry without an id: ${JSON.stringify(entry)}`)
    }
  }
  return contexts
}

function matches(context: Context, patterns: string[]): boolean {
  const id = context.id.toLowerCase()
  const name = context.name.toLowerCase()
  return patterns.some((pattern) => {
    const normalized = pattern.toLowerCase()
    return normalized === id || normalized === name
  })
}

/**
 * Apply include/exclude lists, matching id or name case-insensitively.
 * Enumeration order is preserved.
 */
export function filterContexts(contexts: Context[], filter: ContextFilter): Context[] {
  return contexts.filter((context) => {
    if (filter.include.length > 0 && !matches(context, filter.include)) {
      return false
    }
    return !matches(context, filter.exclude)
  })
}

import { createAggregator } from "./aggregate/aggregator"
import type { AzOptions } from "./az"
import {
  ContextListError,
  filterContexts,
  listContexts,
  type ContextFilter,
} from "./context/source"
import { createAzContextSwitcher, withAmbientContext, type ContextSwitcher } from "./context/switcher"
import { extractJson } from "./extract/json"
import { describeFailure, formatContext } from "./failures"
import { createFlexMigrationInvoker, type CommandInvoker } from "./invoke/invoker"
import { createConsoleLogger, type Logger } from "./logger"
import { normalize } from "./normalize/payload"
import { ensurePrerequisites } from "./prereqs"
import { printConsoleSummary, type LineWriter } from "./report/console"
import { exportFull, exportSummary } from "./report/export"
import type {
  Context,
  ContextError,
  ContextSummary,
  EligibilityRecord,
  Result,
  ScanFailure,
} from "./types"

export type ScanOptions = AzOptions & {
  output: {
    /** Full record export */
    full: string
    /** Per-subscription summary export */
    summary: string
  }
  skipPrerequisites?: boolean
  extensions?: readonly string[]
  subscriptions?: ContextFilter
  logger?: Logger
  /** Console table destination */
  write?: LineWriter
  colors?: boolean
}

export type ScanOutcome =
  | { status: "no-contexts" }
  | { status: "no-records"; failures: ScanFailure[] }
  | {
      status: "completed"
      records: readonly EligibilityRecord[]
      summaries: ContextSummary[]
      failures: ScanFailure[]
      outputs: { full: string; summary: string }
    }

type ContextPipeline = {
  switcher: ContextSwitcher
  invoker: CommandInvoker
}

async function scanContext(
  context: Context,
  pipeline: ContextPipeline,
): Promise<Result<EligibilityRecord[], ContextError>> {
  const switched = await pipeline.switcher.activate(context)
  if (!switched.success) {
    return switched
  }

  const output = await pipeline.invoker.invoke(context)
  if (!output.success) {
    return output
  }

  const extracted = extractJson(output.value)
  if (!extracted.success) {
    return extracted
  }

  return normalize(extracted.value, context)
}

/**
 * Scan every enabled subscription for flex-migration eligibility
 *
 * Subscriptions are processed one at a time because `az account set` is
 * global state. The subscription active at start is restored on every exit
 * path. Per-subscription failures are logged and skipped. A subscription
 * listing that fails ends the run like an empty one.
 */
export async function scan(options: ScanOptions): Promise<ScanOutcome> {
  const logger = options.logger ?? createConsoleLogger()
  const az: AzOptions = {
    exec: options.exec,
    azPath: options.azPath,
    timeoutMs: options.timeoutMs,
  }
  const pipeline: ContextPipeline = {
    switcher: createAzContextSwitcher({ ...az, logger }),
    invoker: createFlexMigrationInvoker(az),
  }

  return withAmbientContext<ScanOutcome>(pipeline.switcher, async (original) => {
    if (original) {
      logger.debug(`Active subscription at start: ${formatContext(original)}`)
    }

    if (options.skipPrerequisites) {
      logger.debug("Skipping prerequisite tooling step")
    } else {
      await ensurePrerequisites({ ...az, extensions: options.extensions ?? [], logger })
    }

    let enabled: Context[]
    try {
      enabled = await listContexts({ ...az, logger })
    } catch (err) {
      if (!(err instanceof ContextListError)) {
        throw err
      }
      logger.warn(`Could not list subscriptions (${err.message}). Nothing to scan.`)
      return { status: "no-contexts" }
    }
    const contexts = options.subscriptions
      ? filterContexts(enabled, options.subscriptions)
      : enabled

    if (contexts.length === 0) {
      logger.warn("No enabled subscriptions found. Nothing to scan.")
      return { status: "no-contexts" }
    }

    logger.info(`Scanning ${contexts.length} subscription(s)`)

    const aggregator = createAggregator()
    const failures: ScanFailure[] = []

    for (const [index, context] of contexts.entries()) {
      logger.info(`[${index + 1}/${contexts.length}] ${formatContext(context)}`)
      const result = await scanContext(context, pipeline)
      if (!result.success) {
        const failure: ScanFailure = { ...result.error, context }
        failures.push(failure)
        logger.warn(describeFailure(failure))
        continue
      }

      logger.debug(`${formatContext(context)}: ${result.value.length} app(s)`)
      aggregator.append(result.value)
    }

    const records = aggregator.records()
    if (records.length === 0) {
      logger.warn("No function apps found in any subscription. No files written.")
      return { status: "no-records", failures }
    }

    const summaries = aggregator.summarize()
    await exportFull(records, options.output.full)
    await exportSummary(summaries, options.output.summary)
    printConsoleSummary(summaries, records, { write: options.write, colors: options.colors })

    const skipped = failures.length > 0 ? ` (${failures.length} subscription(s) skipped)` : ""
    logger.success(
      `Scan complete: ${records.length} app(s) written to ${options.output.full}, summary in ${options.output.summary}${skipped}`,
    )

    return {
      status: "completed",
      records,
      summaries,
      failures,
      outputs: { ...options.output },
    }
  })
}

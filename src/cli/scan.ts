import { resolve } from "node:path"
import * as p from "@clack/prompts"
import { ConfigError, loadConfig, resolveConfig, type FlexscanConfig } from "@flexscan/config"
import { createExec, scan, type ExecFn } from "@flexscan/scanner"
import pc from "picocolors"
import { match } from "ts-pattern"
import { createClackLogger } from "./logger"
import type { ScanCommandOptions } from "./types"

export type ScanCommandDeps = {
  exec: ExecFn
  cwd: string
}

/**
 * Run a scan from command line options and return the process exit code
 */
export async function runScanCommand(
  options: ScanCommandOptions,
  deps: ScanCommandDeps = { exec: createExec(), cwd: process.cwd() },
): Promise<number> {
  const logger = createClackLogger({ verbose: options.verbose })
  p.intro(pc.cyan("flexscan"))

  let config: FlexscanConfig
  try {
    config = resolveConfig(loadConfig(deps.cwd, options.config, logger.warn), {
      fullOutput: options.output,
      summaryOutput: options.summaryOutput,
      azPath: options.azPath,
      timeoutMs: options.timeout,
      skipPrerequisites: options.skipPrerequisites,
      include: options.include,
      exclude: options.exclude,
    })
  } catch (err) {
    if (!(err instanceof ConfigError)) {
      throw err
    }
    logger.error(err.message)
    p.outro(pc.red("Invalid configuration"))
    return 1
  }

  try {
    const outcome = await scan({
      exec: deps.exec,
      azPath: config.azPath,
      timeoutMs: config.timeoutMs,
      output: {
        full: resolve(deps.cwd, config.output.full),
        summary: resolve(deps.cwd, config.output.summary),
      },
      skipPrerequisites: config.skipPrerequisites,
      extensions: config.extensions,
      subscriptions: config.subscriptions,
      logger,
    })

    p.outro(
      match(outcome)
        .with({ status: "no-contexts" }, () => pc.yellow("Nothing to scan"))
        .with({ status: "no-records" }, () => pc.yellow("No function apps found"))
        .with({ status: "completed" }, ({ records }) => pc.green(`Done: ${records.length} app(s)`))
        .exhaustive(),
    )
    return 0
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err))
    p.outro(pc.red("Scan failed"))
    return 1
  }
}

import { Command, InvalidArgumentError } from "commander"
import type { ScanCommandOptions } from "./types"

function parseTimeout(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Timeout must be a positive integer (milliseconds).")
  }
  return parsed
}

export function createProgram(run: (options: ScanCommandOptions) => Promise<number>): Command {
  const program = new Command()

  program
    .name("flexscan")
    .description("Check every enabled Azure subscription for Flex Consumption migration eligibility")
    .version("0.1.0")

  program
    .command("scan", { isDefault: true })
    .description("Scan all enabled subscriptions and export the results")
    .option("-o, --output <path>", "Full record export (default: flex_migration_all.json)")
    .option("-s, --summary-output <path>", "Per-subscription summary (default: flex_migration_summary.json)")
    .option("-c, --config <path>", "Path to flexscan.json")
    .option("--timeout <ms>", "Timeout for each az call", parseTimeout)
    .option("--az-path <path>", "az executable to run")
    .option("--include <subscription...>", "Only scan these subscriptions (id or name)")
    .option("--exclude <subscription...>", "Never scan these subscriptions (id or name)")
    .option("--skip-prerequisites", "Skip installing or upgrading az extensions")
    .option("--verbose", "Print debug output")
    .action(async (options: ScanCommandOptions) => {
      process.exitCode = await run(options)
    })

  return program
}

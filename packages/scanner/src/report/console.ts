import pc from "picocolors"
import { computeTotals } from "../aggregate/aggregator"
import type { ContextSummary, EligibilityRecord } from "../types"

export type LineWriter = (line: string) => void

export type ConsoleSummaryOptions = {
  write?: LineWriter
  /** Defaults to whatever picocolors detects for the terminal */
  colors?: boolean
}

const COLUMNS = [
  { header: "Total", key: "totalApps" },
  { header: "Eligible", key: "eligibleApps" },
  { header: "Ineligible", key: "ineligibleApps" },
] as const

const stdoutWriter: LineWriter = (line) => {
  process.stdout.write(line + "\n")
}

/**
 * Print the per-subscription table followed by run totals
 */
export function printConsoleSummary(
  summaries: readonly ContextSummary[],
  records: readonly EligibilityRecord[],
  options: ConsoleSummaryOptions = {},
): void {
  const write = options.write ?? stdoutWriter
  const c = pc.createColors(options.colors ?? pc.isColorSupported)

  const nameWidth = Math.max("Subscription".length, ...summaries.map((s) => s.contextName.length))

  const header = ["Subscription".padEnd(nameWidth), ...COLUMNS.map((col) => col.header)].join("  ")
  const rule = ["-".repeat(nameWidth), ...COLUMNS.map((col) => "-".repeat(col.header.length))].join(
    "  ",
  )

  write(c.bold(header))
  write(rule)
  for (const summary of summaries) {
    const cells = COLUMNS.map((col) => String(summary[col.key]).padStart(col.header.length))
    write([summary.contextName.padEnd(nameWidth), ...cells].join("  "))
  }

  const totals = computeTotals(summaries, records)
  write("")
  write(`Subscriptions with apps: ${totals.contextsWithApps}`)
  write(`Total apps:              ${totals.totalApps}`)
  write(`Eligible:                ${c.green(String(totals.eligibleApps))}`)
  write(`Ineligible:              ${c.yellow(String(totals.ineligibleApps))}`)
}

import type { ContextSummary, EligibilityRecord } from "../types"

export type Aggregator = {
  append: (records: readonly EligibilityRecord[]) => void
  /** Everything appended so far, in append order */
  records: () => readonly EligibilityRecord[]
  summarize: () => ContextSummary[]
}

export type ScanTotals = {
  contextsWithApps: number
  totalApps: number
  eligibleApps: number
  ineligibleApps: number
}

/**
 * Group records by subscription in first-seen order, then sort by
 * totalApps descending. Array.prototype.sort is stable, so ties keep
 * first-seen order.
 */
export function summarizeRecords(records: readonly EligibilityRecord[]): ContextSummary[] {
  const groups = new Map<string, ContextSummary>()

  for (const record of records) {
    let summary = groups.get(record.contextId)
    if (!summary) {
      summary = {
        contextId: record.contextId,
        contextName: record.contextName,
        totalApps: 0,
        eligibleApps: 0,
        ineligibleApps: 0,
      }
      groups.set(record.contextId, summary)
    }

    summary.totalApps += 1
    if (record.eligibility === "Eligible") {
      summary.eligibleApps += 1
    } else {
      summary.ineligibleApps += 1
    }
  }

  return [...groups.values()].sort((a, b) => b.totalApps - a.totalApps)
}

export function computeTotals(
  summaries: readonly ContextSummary[],
  records: readonly EligibilityRecord[],
): ScanTotals {
  const eligibleApps = records.filter((record) => record.eligibility === "Eligible").length
  return {
    contextsWithApps: summaries.length,
    totalApps: records.length,
    eligibleApps,
    ineligibleApps: records.length - eligibleApps,
  }
}

export function createAggregator(): Aggregator {
  const accumulated: EligibilityRecord[] = []

  return {
    append(records) {
      for (const record of records) {
        accumulated.push(record)
      }
    },
    records: () => accumulated,
    summarize: () => summarizeRecords(accumulated),
  }
}

import { mkdir, writeFile } from "node:fs/promises"
import { dirname } from "node:path"
import type { ContextSummary, EligibilityRecord } from "../types"

async function writeJsonArray(path: string, items: readonly unknown[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, JSON.stringify(items, null, 2) + "\n", "utf-8")
}

/**
 * Write every record as a JSON array, replacing any existing file
 */
export async function exportFull(records: readonly EligibilityRecord[], path: string): Promise<void> {
  await writeJsonArray(path, records)
}

export async function exportSummary(summaries: readonly ContextSummary[], path: string): Promise<void> {
  await writeJsonArray(path, summaries)
}

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, test } from "vitest"
import { exportFull, exportSummary } from "../../src/report/export"

describe("report/export", () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "flexscan-export-"))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  const records = [
    {
      contextId: "sub-1",
      contextName: "Contoso",
      appName: "fa1",
      resourceGroup: "rg1",
      eligibility: "Eligible" as const,
      reason: null,
    },
  ]

  test("exportFull writes an indented JSON array", async () => {
    const path = join(dir, "all.json")
    await exportFull(records, path)
    expect(readFileSync(path, "utf-8")).toBe(JSON.stringify(records, null, 2) + "\n")
  })

  test("exportFull overwrites an existing file", async () => {
    const path = join(dir, "all.json")
    writeFileSync(path, "old content that is longer than the new one".repeat(100))
    await exportFull([], path)
    expect(readFileSync(path, "utf-8")).toBe("[]\n")
  })

  test("exportSummary creates missing directories", async () => {
    const path = join(dir, "nested", "out", "summary.json")
    const summaries = [
      { contextId: "sub-1", contextName: "Contoso", totalApps: 1, eligibleApps: 1, ineligibleApps: 0 },
    ]
    await exportSummary(summaries, path)
    expect(JSON.parse(readFileSync(path, "utf-8"))).toEqual(summaries)
  })
})

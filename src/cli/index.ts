#!/usr/bin/env tsx
import { createProgram } from "./program"
import { runScanCommand } from "./scan"

createProgram((options) => runScanCommand(options))
  .parseAsync()
  .catch((err) => {
    console.error(err instanceof Error ? err.message : "Unknown error")
    process.exit(1)
  })

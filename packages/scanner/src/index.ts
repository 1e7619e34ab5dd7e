// Pipeline
export { scan, type ScanOptions, type ScanOutcome } from "./scanner"

// Components
export { extractJson } from "./extract/json"
export {
  createAzContextSwitcher,
  withAmbientContext,
  type ContextSwitcher,
} from "./context/switcher"
export { ContextListError, filterContexts, listContexts, type ContextFilter } from "./context/source"
export { createFlexMigrationInvoker, type CommandInvoker } from "./invoke/invoker"
export {
  FlexMigrationPayloadSchema,
  normalize,
  parsePayload,
  toRecords,
  type FlexMigrationPayload,
} from "./normalize/payload"
export {
  computeTotals,
  createAggregator,
  summarizeRecords,
  type Aggregator,
  type ScanTotals,
} from "./aggregate/aggregator"
export { exportFull, exportSummary } from "./report/export"
export { printConsoleSummary, type ConsoleSummaryOptions, type LineWriter } from "./report/console"
export { ensurePrerequisites } from "./prereqs"
export { describeFailure, formatContext } from "./failures"

// Infrastructure
export { createExec, type ExecFn, type ExecOptions, type ExecResult } from "./exec"
export { createConsoleLogger, type Logger } from "./logger"

export type * from "./types"

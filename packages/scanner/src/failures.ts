import { match } from "ts-pattern"
import type { Context, ScanFailure } from "./types"

export function formatContext(context: Context): string {
  return `${context.name} (${context.id})`
}

/**
 * Warning text for a skipped subscription
 */
export function describeFailure(failure: ScanFailure): string {
  const label = formatContext(failure.context)
  return match(failure)
    .with({ kind: "switch-failed" }, (f) => `Skipping ${label}: could not switch subscription: ${f.message}`)
    .with(
      { kind: "invocation-failed", reason: "timeout" },
      (f) => `Skipping ${label}: flex-migration list ${f.message}`,
    )
    .with(
      { kind: "invocation-failed" },
      (f) => `Skipping ${label}: flex-migration list failed: ${f.message}`,
    )
    .with({ kind: "no-json-found" }, () => `Skipping ${label}: no JSON in flex-migration output`)
    .with(
      { kind: "malformed-payload" },
      (f) => `Skipping ${label}: unexpected flex-migration output: ${f.message}`,
    )
    .exhaustive()
}

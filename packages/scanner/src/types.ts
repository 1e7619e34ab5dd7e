import type { ExecFailureReason } from "./exec"

/**
 * One enumerable scope: an Azure subscription
 */
export type Context = {
  id: string
  name: string
}

export type Eligibility = "Eligible" | "Ineligible"

/**
 * One function app found in a subscription's flex-migration report
 */
export type EligibilityRecord = {
  contextId: string
  contextName: string
  appName: string
  resourceGroup: string
  eligibility: Eligibility
  /** Always null for eligible apps */
  reason: string | null
}

export type ContextSummary = {
  contextId: string
  contextName: string
  totalApps: number
  eligibleApps: number
  ineligibleApps: number
}

export type Result<T, E> = { success: true; value: T } | { success: false; error: E }

export function ok<T>(value: T): Result<T, never> {
  return { success: true, value }
}

export function fail<E>(error: E): Result<never, E> {
  return { success: false, error }
}

export type SwitchFailed = {
  kind: "switch-failed"
  message: string
}

export type InvocationFailed = {
  kind: "invocation-failed"
  reason: ExecFailureReason
  exitCode: number | null
  message: string
}

export type NoJsonFound = {
  kind: "no-json-found"
}

export type MalformedPayload = {
  kind: "malformed-payload"
  message: string
}

/**
 * Everything that can make a single subscription contribute zero records.
 * None of these abort the run.
 */
export type ContextError = SwitchFailed | InvocationFailed | NoJsonFound | MalformedPayload

export type ScanFailure = ContextError & { context: Context }

import { runAz, type AzOptions } from "../az"
import { describeExecFailure } from "../exec"
import { fail, ok, type Context, type InvocationFailed, type Result } from "../types"

export type CommandInvoker = {
  invoke: (context: Context) => Promise<Result<string, InvocationFailed>>
}

/**
 * Runs `az functionapp flex-migration list` for one subscription.
 * The subscription is also passed explicitly so the call does not rely on
 * the ambient selection alone. One attempt, no retries.
 */
export function createFlexMigrationInvoker(options: AzOptions): CommandInvoker {
  return {
    async invoke(context) {
      const result = await runAz(options, [
        "functionapp",
        "flex-migration",
        "list",
        "--subscription",
        context.id,
        "--output",
        "json",
      ])
      if (!result.success) {
        return fail({
          kind: "invocation-failed",
          reason: result.reason,
          exitCode: result.exitCode,
          message: describeExecFailure(result),
        })
      }
      return ok(result.stdout)
    },
  }
}

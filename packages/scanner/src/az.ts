import type { ExecFn, ExecResult } from "./exec"

export type AzOptions = {
  exec: ExecFn
  /** az executable */
  azPath: string
  /** Per-invocation timeout */
  timeoutMs: number
}

/**
 * Run an az subcommand, always with --only-show-errors so warnings stay off stdout
 */
export function runAz(options: AzOptions, args: string[]): Promise<ExecResult> {
  return options.exec(options.azPath, [...args, "--only-show-errors"], {
    timeoutMs: options.timeoutMs,
  })
}

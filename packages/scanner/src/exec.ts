import { execFile } from "node:child_process"

export type ExecFailureReason = "exit-code" | "timeout" | "launch" | "output-limit"

export type ExecOptions = {
  /** Kill the process after this many milliseconds (0 = no limit) */
  timeoutMs?: number
  /** Largest stdout/stderr accepted before the process is killed */
  maxBufferBytes?: number
}

export type ExecResult =
  | { success: true; stdout: string; stderr: string }
  | {
      success: false
      reason: ExecFailureReason
      exitCode: number | null
      stdout: string
      stderr: string
      message: string
    }

/**
 * Runs an external program and captures its output. Never rejects.
 */
export type ExecFn = (file: string, args: string[], options?: ExecOptions) => Promise<ExecResult>

export type Invocation = {
  file: string
  args: string[]
  shell: boolean
}

const DEFAULT_MAX_BUFFER = 64 * 1024 * 1024
const MAXBUFFER_CODE = "ERR_CHILD_PROCESS_STDIO_MAXBUFFER"
const SAFE_CMD_ARG = /^[A-Za-z0-9_\-.,:/\\@+]+$/

/**
 * Quote one argument for a cmd.exe command line. Double quotes keep spaces
 * and the `' = { } [ ] ? |` of JMESPath queries inside a single argument.
 */
export function quoteCmdArg(arg: string): string {
  if (SAFE_CMD_ARG.test(arg)) {
    return arg
  }
  return `"${arg.replace(/(\\*)"/g, '$1$1\\"').replace(/(\\+)$/, "$1$1")}"`
}

/**
 * az is a .cmd shim on Windows, which only runs through cmd.exe. There the
 * command line is joined without quoting, so each part is quoted here.
 */
export function buildInvocation(
  file: string,
  args: string[],
  platform: NodeJS.Platform = process.platform,
): Invocation {
  if (platform !== "win32") {
    return { file, args, shell: false }
  }
  return { file: quoteCmdArg(file), args: args.map(quoteCmdArg), shell: true }
}

export function classifyExecError(error: { code?: unknown; killed?: boolean }): ExecFailureReason {
  if (error.code === MAXBUFFER_CODE) {
    return "output-limit"
  }
  if (error.killed) {
    return "timeout"
  }
  // spawn errors carry an errno string (ENOENT, EACCES); exits carry a number
  if (typeof error.code === "string") {
    return "launch"
  }
  return "exit-code"
}

/**
 * ExecFn backed by child_process.execFile
 */
export function createExec(platform: NodeJS.Platform = process.platform): ExecFn {
  return (file, args, options = {}) =>
    new Promise<ExecResult>((resolve) => {
      const invocation = buildInvocation(file, args, platform)
      execFile(
        invocation.file,
        invocation.args,
        {
          encoding: "utf8",
          timeout: options.timeoutMs ?? 0,
          maxBuffer: options.maxBufferBytes ?? DEFAULT_MAX_BUFFER,
          windowsHide: true,
          shell: invocation.shell,
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ success: true, stdout, stderr })
            return
          }

          const reason = classifyExecError(error)
          const code: unknown = error.code
          resolve({
            success: false,
            reason,
            exitCode: typeof code === "number" ? code : null,
            stdout,
            stderr,
            message: reason === "timeout" ? `timed out after ${options.timeoutMs}ms` : error.message,
          })
        },
      )
    })
}

/**
 * Short, single-line description of a failed execution for log output
 */
export function describeExecFailure(result: Extract<ExecResult, { success: false }>): string {
  const detail = result.stderr.trim().split(/\r?\n/).filter(Boolean).pop()
  if (result.reason === "exit-code") {
    return `exited with code ${result.exitCode ?? "unknown"}${detail ? `: ${detail}` : ""}`
  }
  return result.message
}

import { existsSync, readFileSync } from "node:fs"
import { join, resolve } from "node:path"
import { FlexscanConfigSchema, type ConfigOverrides, type FlexscanConfig } from "./schema"

const CONFIG_FILENAMES = ["flexscan.json", ".flexscan.json"]

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly path?: string,
  ) {
    super(message)
    this.name = "ConfigError"
  }
}

export function findConfigFile(directory: string): string | null {
  for (const filename of CONFIG_FILENAMES) {
    const configPath = join(directory, filename)
    if (existsSync(configPath)) {
      return configPath
    }
  }
  return null
}

function parseConfigFile(configPath: string): FlexscanConfig {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"))
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new ConfigError(`Failed to read ${configPath}: ${reason}`, configPath)
  }

  const result = FlexscanConfigSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ")
    throw new ConfigError(`Invalid config in ${configPath}: ${issues}`, configPath)
  }
  return result.data
}

/**
 * Load flexscan configuration
 *
 * An explicit path must exist and be valid. Otherwise flexscan.json or
 * .flexscan.json is looked up in `directory`; an invalid discovered file
 * is reported through `onWarning` and defaults are used instead.
 */
export function loadConfig(
  directory: string,
  explicitPath?: string,
  onWarning: (message: string) => void = (message) => console.warn(`[flexscan] ${message}`),
): FlexscanConfig {
  if (explicitPath) {
    const configPath = resolve(directory, explicitPath)
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath)
    }
    return parseConfigFile(configPath)
  }

  const discovered = findConfigFile(directory)
  if (discovered) {
    try {
      return parseConfigFile(discovered)
    } catch (err) {
      onWarning(err instanceof Error ? err.message : String(err))
      onWarning("Falling back to default configuration")
    }
  }

  return FlexscanConfigSchema.parse({})
}

/**
 * Apply command line overrides and environment on top of a loaded config
 */
export function resolveConfig(
  base: FlexscanConfig,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): FlexscanConfig {
  return {
    ...base,
    output: {
      full: overrides.fullOutput ?? base.output.full,
      summary: overrides.summaryOutput ?? base.output.summary,
    },
    azPath: overrides.azPath ?? env.FLEXSCAN_AZ_PATH ?? base.azPath,
    timeoutMs: overrides.timeoutMs ?? base.timeoutMs,
    skipPrerequisites: overrides.skipPrerequisites || base.skipPrerequisites,
    subscriptions: {
      include: overrides.include?.length ? overrides.include : base.subscriptions.include,
      exclude: overrides.exclude?.length ? overrides.exclude : base.subscriptions.exclude,
    },
  }
}

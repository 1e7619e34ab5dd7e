// Schema exports
export {
  FlexscanConfigSchema,
  OutputConfigSchema,
  SubscriptionFilterSchema,
} from "./schema"

// Type exports
export type { FlexscanConfig, OutputConfig, SubscriptionFilter, ConfigOverrides } from "./schema"

// Loader exports
export { ConfigError, findConfigFile, loadConfig, resolveConfig } from "./loader"

import { z } from "zod"

/**
 * Output file locations, relative to the working directory
 */
export const OutputConfigSchema = z.object({
  full: z.string().min(1).optional().default("flex_migration_all.json"),
  summary: z.string().min(1).optional().default("flex_migration_summary.json"),
})

export type OutputConfig = z.infer<typeof OutputConfigSchema>

/**
 * Subscription filters, matched against id or name (case insensitive)
 * An empty include list means "every enabled subscription"
 */
export const SubscriptionFilterSchema = z.object({
  include: z.array(z.string()).optional().default([]),
  exclude: z.array(z.string()).optional().default([]),
})

export type SubscriptionFilter = z.infer<typeof SubscriptionFilterSchema>

/**
 * Main flexscan configuration schema
 */
export const FlexscanConfigSchema = z.object({
  $schema: z.string().optional(),
  output: OutputConfigSchema.optional().default({}),
  azPath: z.string().min(1).optional().default("az").describe("Path to the az executable"),
  timeoutMs: z
    .number()
    .int()
    .positive()
    .optional()
    .default(120_000)
    .describe("Timeout for each az invocation"),
  skipPrerequisites: z.boolean().optional().default(false),
  extensions: z
    .array(z.string().min(1))
    .optional()
    .default([])
    .describe("az extensions to add or upgrade before scanning"),
  subscriptions: SubscriptionFilterSchema.optional().default({}),
})

export type FlexscanConfig = z.infer<typeof FlexscanConfigSchema>

/**
 * Values the command line may override
 */
export type ConfigOverrides = {
  fullOutput?: string
  summaryOutput?: string
  azPath?: string
  timeoutMs?: number
  skipPrerequisites?: boolean
  include?: string[]
  exclude?: string[]
}

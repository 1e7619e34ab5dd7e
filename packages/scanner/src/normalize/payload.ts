import { z } from "zod"
import { fail, ok, type Context, type EligibilityRecord, type MalformedPayload, type Result } from "../types"

const AppEntrySchema = z.object({
  name: z.string(),
  resource_group: z.string(),
})

const IneligibleAppEntrySchema = AppEntrySchema.extend({
  reason: z
    .string()
    .nullish()
    .transform((reason) => reason ?? null),
})

/** Absent, null and empty lists all mean "no apps" */
function appList<T extends z.ZodTypeAny>(entry: T) {
  return z
    .array(entry)
    .nullish()
    .transform((apps): z.output<T>[] => apps ?? [])
}

/**
 * Output of `az functionapp flex-migration list`
 */
export const FlexMigrationPayloadSchema = z.object({
  eligible_apps: appList(AppEntrySchema),
  ineligible_apps: appList(IneligibleAppEntrySchema),
})

export type FlexMigrationPayload = z.output<typeof FlexMigrationPayloadSchema>

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ")
}

/**
 * Validate a JSON document against the flex-migration payload shape
 */
export function parsePayload(json: string): Result<FlexMigrationPayload, MalformedPayload> {
  let document: unknown
  try {
    document = JSON.parse(json)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    return fail({ kind: "malformed-payload", message: `invalid JSON: ${reason}` })
  }

  const parsed = FlexMigrationPayloadSchema.safeParse(document)
  if (!parsed.success) {
    return fail({ kind: "malformed-payload", message: formatIssues(parsed.error) })
  }
  return ok(parsed.data)
}

/**
 * Flatten a validated payload: eligible apps first, then ineligible,
 * each in source order
 */
export function toRecords(payload: FlexMigrationPayload, context: Context): EligibilityRecord[] {
  const eligible = payload.eligible_apps.map(
    (app): EligibilityRecord => ({
      contextId: context.id,
      contextName: context.name,
      appName: app.name,
      resourceGroup: app.resource_group,
      eligibility: "Eligible",
      reason: null,
    }),
  )
  const ineligible = payload.ineligible_apps.map(
    (app): EligibilityRecord => ({
      contextId: context.id,
      contextName: context.name,
      appName: app.name,
      resourceGroup: app.resource_group,
      eligibility: "Ineligible",
      reason: app.reason,
    }),
  )
  return [...eligible, ...ineligible]
}

export function normalize(
  json: string,
  context: Context,
): Result<EligibilityRecord[], MalformedPayload> {
  const payload = parsePayload(json)
  if (!payload.success) {
    return payload
  }
  return ok(toRecords(payload.value, context))
}

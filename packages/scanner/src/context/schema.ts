import { z } from "zod"
import type { Context } from "../types"

/**
 * Subscription entry as returned by `az account list` / `az account show`
 * with the `{id:id, name:name}` projection
 */
export const ContextEntrySchema = z
  .object({
    id: z.string().min(1),
    name: z.string().nullish(),
  })
  .transform((entry): Context => ({ id: entry.id, name: entry.name || entry.id }))

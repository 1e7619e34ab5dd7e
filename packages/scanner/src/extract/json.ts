import { fail, ok, type NoJsonFound, type Result } from "../types"

// First line whose content, ignoring leading blanks, opens an object or array
const JSON_START = /^[^\S\r\n]*[[{]/m

/**
 * Isolate the JSON document in mixed command output
 *
 * az can print warnings and progress lines on the same stream before its
 * payload. Everything before the first line starting with `{` or `[` is
 * dropped; everything from that line on is returned untouched, including
 * any trailing text. A preamble line that happens to start with `{` is
 * taken as the payload start.
 */
export function extractJson(raw: string | null | undefined): Result<string, NoJsonFound> {
  if (!raw || raw.trim() === "") {
    return fail({ kind: "no-json-found" })
  }

  const start = raw.search(JSON_START)
  if (start === -1) {
    return fail({ kind: "no-json-found" })
  }

  return ok(raw.slice(start))
}

import { describe, expect, test } from "vitest"
import { extractJson } from "../../src/extract/json"

describe("extract/json", () => {
  describe("extractJson", () => {
    test("returns an object document untouched", () => {
      const raw = '{"eligible_apps":[]}'
      expect(extractJson(raw)).toEqual({ success: true, value: raw })
    })

    test("returns an array document untouched", () => {
      expect(extractJson('[{"id":"a"}]')).toEqual({ success: true, value: '[{"id":"a"}]' })
    })

    test("drops preamble lines before the document", () => {
      const raw = 'Loading...\nChecking apps\n{\n  "eligible_apps": []\n}\n'
      expect(extractJson(raw)).toEqual({
        success: true,
        value: '{\n  "eligible_apps": []\n}\n',
      })
    })

    test("accepts an indented first line", () => {
      const raw = "WARNING: preview command\n   [\n  1\n]"
      expect(extractJson(raw)).toEqual({ success: true, value: "   [\n  1\n]" })
    })

    test("handles CRLF line endings", () => {
      const raw = "Loading...\r\n{}\r\n"
      expect(extractJson(raw)).toEqual({ success: true, value: "{}\r\n" })
    })

    test("passes trailing text through", () => {
      const raw = "note\n{}\ndone"
      expect(extractJson(raw)).toEqual({ success: true, value: "{}\ndone" })
    })

    test("takes the first matching line even inside a preamble", () => {
      const raw = 'Loading...\n{"hint": "example"} is the request body\n{"eligible_apps":[]}'
      expect(extractJson(raw)).toEqual({
        success: true,
        value: '{"hint": "example"} is the request body\n{"eligible_apps":[]}',
      })
    })

    test("ignores braces that do not start a line", () => {
      const raw = "status {ok}\nlist [1]"
      expect(extractJson(raw)).toEqual({ success: false, error: { kind: "no-json-found" } })
    })

    test("returns no-json-found for empty input", () => {
      expect(extractJson("")).toEqual({ success: false, error: { kind: "no-json-found" } })
    })

    test("returns no-json-found for null and undefined", () => {
      expect(extractJson(null)).toEqual({ success: false, error: { kind: "no-json-found" } })
      expect(extractJson(undefined)).toEqual({ success: false, error: { kind: "no-json-found" } })
    })

    test("returns no-json-found for whitespace only", () => {
      expect(extractJson("  \n\t\n")).toEqual({ success: false, error: { kind: "no-json-found" } })
    })

    test("returns no-json-found when no line opens a document", () => {
      expect(extractJson("Loading...\nNothing to report\n")).toEqual({
        success: false,
        error: { kind: "no-json-found" },
      })
    })

    test("the extracted text parses for k preamble lines", () => {
      const document = { eligible_apps: [{ name: "fa1", resource_group: "rg1" }] }
      for (const k of [0, 1, 5]) {
        const preamble = Array.from({ length: k }, (_, i) => `log line ${i}`)
        const raw = [...preamble, JSON.stringify(document, null, 2)].join("\n")
        const result = extractJson(raw)
        expect(result.success).toBe(true)
        if (result.success) {
          expect(JSON.parse(result.value)).toEqual(document)
        }
      }
    })
  })
})

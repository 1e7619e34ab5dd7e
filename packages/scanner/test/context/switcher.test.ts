import { describe, expect, test, vi } from "vitest"
import {
  createAzContextSwitcher,
  withAmbientContext,
  type ContextSwitcher,
} from "../../src/context/switcher"
import { createFakeAz } from "../helpers/fake-az"
import { createRecordingLogger } from "../helpers/logger"

const PROD = { id: "sub-prod", name: "Production" }
const DEV = { id: "sub-dev", name: "Development" }

function setup(options: Parameters<typeof createFakeAz>[0] = {}) {
  const az = createFakeAz(options)
  const log = createRecordingLogger()
  const switcher = createAzContextSwitcher({
    exec: az.exec,
    azPath: "az",
    timeoutMs: 1000,
    logger: log.logger,
  })
  return { az, log, switcher }
}

describe("context/switcher", () => {
  describe("captureOriginal", () => {
    test("returns the active subscription", async () => {
      const { switcher, az } = setup({ subscriptions: [DEV], active: PROD })
      expect(await switcher.captureOriginal()).toEqual(PROD)
      expect(az.calls[0]).toEqual([
        "account",
        "show",
        "--query",
        "{id:id, name:name}",
        "--output",
        "json",
      ])
    })

    test("returns null when nothing is selected", async () => {
      const { switcher, log } = setup({ subscriptions: [DEV] })
      expect(await switcher.captureOriginal()).toBe(null)
      expect(log.messages("warn")).toEqual([])
      expect(log.messages("error")).toEqual([])
    })

    test("returns null for output without an id", async () => {
      const exec = vi.fn(async () => ({ success: true as const, stdout: '{"name":"x"}', stderr: "" }))
      const custom = createAzContextSwitcher({
        exec,
        azPath: "az",
        timeoutMs: 1000,
        logger: createRecordingLogger().logger,
      })
      expect(await custom.captureOriginal()).toBe(null)
    })
  })

  describe("activate", () => {
    test("selects the subscription", async () => {
      const { switcher, az } = setup({ subscriptions: [DEV], active: PROD })
      expect(await switcher.activate(DEV)).toEqual({ success: true, value: undefined })
      expect(az.active()).toBe("sub-dev")
      expect(az.calls).toEqual([["account", "set", "--subscription", "sub-dev"]])
    })

    test("returns switch-failed when az account set fails", async () => {
      const { switcher, az } = setup({ subscriptions: [DEV], active: PROD, failSwitch: ["sub-dev"] })
      expect(await switcher.activate(DEV)).toEqual({
        success: false,
        error: {
          kind: "switch-failed",
          message:
            "exited with code 1: ERROR: The subscription of 'sub-dev' doesn't exist in cloud 'AzureCloud'.",
        },
      })
      expect(az.active()).toBe("sub-prod")
    })
  })

  describe("restore", () => {
    test("re-selects the original subscription", async () => {
      const { switcher, az } = setup({ subscriptions: [DEV], active: PROD })
      await switcher.activate(DEV)
      await switcher.restore(PROD)
      expect(az.active()).toBe("sub-prod")
    })

    test("does nothing for a null original", async () => {
      const { switcher, az } = setup({ subscriptions: [DEV] })
      await switcher.restore(null)
      expect(az.calls).toEqual([])
    })

    test("logs an error instead of throwing when the restore fails", async () => {
      const { switcher, log } = setup({ subscriptions: [DEV], active: PROD, failSwitch: ["sub-prod"] })
      await expect(switcher.restore(PROD)).resolves.toBeUndefined()
      expect(log.messages("error")).toHaveLength(1)
      expect(log.messages("error")[0]).toContain("Failed to restore subscription Production (sub-prod)")
    })
  })

  describe("withAmbientContext", () => {
    function spySwitcher(): ContextSwitcher & { restored: Array<unknown> } {
      const restored: Array<unknown> = []
      return {
        restored,
        captureOriginal: async () => PROD,
        activate: async () => ({ success: true, value: undefined }),
        restore: async (original) => {
          restored.push(original)
        },
      }
    }

    test("restores once after normal completion", async () => {
      const switcher = spySwitcher()
      const result = await withAmbientContext(switcher, async (original) => original?.name)
      expect(result).toBe("Production")
      expect(switcher.restored).toEqual([PROD])
    })

    test("restores once when the body throws", async () => {
      const switcher = spySwitcher()
      await expect(
        withAmbientContext(switcher, async () => {
          throw new Error("boom")
        }),
      ).rejects.toThrow("boom")
      expect(switcher.restored).toEqual([PROD])
    })

    test("restores a null original too", async () => {
      const switcher = { ...spySwitcher(), captureOriginal: async () => null }
      const restore = vi.spyOn(switcher, "restore")
      await withAmbientContext(switcher, async () => "done")
      expect(restore).toHaveBeenCalledTimes(1)
      expect(restore).toHaveBeenCalledWith(null)
    })
  })
})

import { FakeClock } from "@tenantry/clock"
import type { Logger } from "@tenantry/logger"
import { mock } from "vitest-mock-extended"
import { StartupError } from "../lifecycle-error"
import { startup } from "../startup"

describe("startup", () => {
  const base = () => ({ clock: new FakeClock(0), logger: mock<Logger>(), deadlineMs: 1_000 })

  it("resolves once every hook has run", async () => {
    const connect = vi.fn(async () => {})

    await expect(
      startup({ ...base(), startHooks: [{ name: "cache.connect", fn: connect }] }),
    ).resolves.toBeUndefined()
    expect(connect).toHaveBeenCalledOnce()
  })

  it("rejects with the first failing hook as the cause", async () => {
    const cause = new Error("ECONNREFUSED")
    const warm = vi.fn(async () => {})

    const attempt = startup({
      ...base(),
      startHooks: [
        {
          name: "cache.connect",
          fn: async () => {
            throw cause
          },
        },
        { name: "cache.warm", fn: warm },
      ],
    })

    await expect(attempt).rejects.toBeInstanceOf(StartupError)
    await expect(attempt).rejects.toMatchObject({
      code: "startup_failed",
      message: "Server startup aborted: hook cache.connect failed",
      context: { failed: ["cache.connect"], skipped: ["cache.warm"], timedOut: false },
      cause,
      isOperational: false,
    })
    expect(warm).not.toHaveBeenCalled()
  })

  it("rejects when the deadline has passed", async () => {
    await expect(
      startup({
        clock: new FakeClock(10),
        logger: mock<Logger>(),
        deadlineMs: 10,
        startHooks: [{ name: "db.connect", fn: async () => {} }],
      }),
    ).rejects.toMatchObject({
      message: "Server startup aborted: deadline exceeded",
      context: { failed: [], skipped: ["db.connect"], timedOut: true },
    })
  })
})

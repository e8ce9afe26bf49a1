import { NullLogger } from "../null-logger"

describe("NullLogger", () => {
  it("accepts every level without throwing", () => {
    const logger = new NullLogger()

    expect(() => {
      logger.trace("x")
      logger.debug("x")
      logger.info("x")
      logger.warn("x")
      logger.error("x", { err: new Error("x") })
      logger.fatal("x")
    }).not.toThrow()
  })

  it("child() returns another no-op logger", () => {
    const child = new NullLogger().child({ requestId: "r-1" })

    expect(child).toBeInstanceOf(NullLogger)
  })
})

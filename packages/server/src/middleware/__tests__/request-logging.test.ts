import type { Logger } from "@tenantry/logger"
import { Hono } from "hono"
import { mock } from "vitest-mock-extended"
import type { Mock } from "../../tests/mock"
import { requestLoggerMiddleware } from "../request-logger"
import { requestLoggingMiddleware } from "../request-logging"

describe("request logging", () => {
  let logger: Mock<Logger>
  let child: Mock<Logger>
  let app: Hono

  beforeEach(() => {
    logger = mock<Logger>()
    child = mock<Logger>()
    logger.child.mockReturnValue(child)

    app = new Hono()

    app.use("*", async (c, next) => {
      c.set("requestId", "req-7")
      await next()
    })
    app.use("*", requestLoggerMiddleware(logger))
    app.use(
      "*",
      requestLoggingMiddleware({ enabled: true, level: "info", ignorePaths: ["/health"] }, logger),
    )

    app.get("/health", (c) => c.json({ ok: true }))
    app.get("/tasks/:id", (c) => c.json({ id: c.req.param("id") }))
    app.get("/broken", (c) => c.text("down", 503))
  })

  it("binds a child logger with the request id", async () => {
    await app.request("/tasks/3")

    expect(logger.child).toHaveBeenCalledExactlyOnceWith({ requestId: "req-7" })
  })

  it("logs completed requests through the request logger", async () => {
    await app.request("/tasks/3")

    expect(child.info).toHaveBeenCalledExactlyOnceWith(
      "Request completed",
      expect.objectContaining({
        method: "GET",
        path: "/tasks/3",
        status: 200,
        durationMs: expect.any(Number),
      }),
    )
  })

  it("logs 5xx responses at error", async () => {
    await app.request("/broken")

    expect(child.error).toHaveBeenCalledWith(
      "Request completed",
      expect.objectContaining({ status: 503, path: "/broken" }),
    )
    expect(child.info).not.toHaveBeenCalled()
  })

  it("skips ignored paths", async () => {
    await app.request("/health")

    expect(child.info).not.toHaveBeenCalled()
    expect(child.error).not.toHaveBeenCalled()
  })
})

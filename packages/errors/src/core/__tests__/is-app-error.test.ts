import { BaseError } from "../base-error"
import { isAppError } from "../is-app-error"

describe("isAppError", () => {
  const duck = () => ({
    name: "DuckError",
    message: "quack",
    code: "duck",
    context: {},
    isRetryable: false,
    isOperational: true,
    timestamp: new Date(),
  })

  it("accepts BaseError and subclasses", () => {
    class ScopeError extends BaseError<"scope"> {}

    expect(isAppError(new BaseError("x", { code: "x" }))).toBe(true)
    expect(isAppError(new ScopeError("x", { code: "scope" }))).toBe(true)
  })

  it("accepts a duck-typed object with every field", () => {
    expect(isAppError(duck())).toBe(true)
  })

  it("rejects plain errors and primitives", () => {
    expect(isAppError(new Error("x"))).toBe(false)
    expect(isAppError(null)).toBe(false)
    expect(isAppError(undefined)).toBe(false)
    expect(isAppError("x")).toBe(false)
  })

  it.each([
    "code",
    "context",
    "isRetryable",
    "isOperational",
    "timestamp",
    "message",
    "name",
  ])("rejects an object missing %s", (field) => {
    const candidate: Record<string, unknown> = duck()
    delete candidate[field]

    expect(isAppError(candidate)).toBe(false)
  })

  it("rejects an invalid timestamp", () => {
    expect(isAppError({ ...duck(), timestamp: new Date("nope") })).toBe(false)
  })

  it("rejects an upper-case code", () => {
    expect(isAppError({ ...duck(), code: "NOT_FOUND" })).toBe(false)
  })
})

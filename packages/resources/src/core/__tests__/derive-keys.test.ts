import { deriveItemKey, deriveListKey, deriveTags } from "../derive-keys"

describe("deriveListKey", () => {
  const firstPage = { page: 1, pageSize: 15 }

  it("has the record type prefix and a sha256 hex digest", () => {
    expect(deriveListKey("tasks", {}, firstPage, "user-a")).toMatch(/^tasks:list:[0-9a-f]{64}$/)
  })

  it("ignores filter order", () => {
    expect(deriveListKey("tasks", { status: "done", search: "report" }, firstPage, "user-a")).toBe(
      deriveListKey("tasks", { search: "report", status: "done" }, firstPage, "user-a"),
    )
  })

  it("treats undefined filters as absent", () => {
    expect(deriveListKey("tasks", { status: undefined }, firstPage, "user-a")).toBe(
      deriveListKey("tasks", {}, firstPage, "user-a"),
    )
  })

  it("differs per principal", () => {
    expect(deriveListKey("tasks", {}, firstPage, "user-a")).not.toBe(
      deriveListKey("tasks", {}, firstPage, "user-b"),
    )
  })

  it.each([
    [{ page: 2, pageSize: 15 }],
    [{ page: 1, pageSize: 16 }],
  ])("differs per page (%o)", (pagination) => {
    expect(deriveListKey("tasks", {}, pagination, "user-a")).not.toBe(
      deriveListKey("tasks", {}, firstPage, "user-a"),
    )
  })

  it("differs per filter value", () => {
    expect(deriveListKey("tasks", { status: "done" }, firstPage, "user-a")).not.toBe(
      deriveListKey("tasks", { status: "pending" }, firstPage, "user-a"),
    )
  })
})

describe("deriveItemKey", () => {
  it("is not tenant-qualified", () => {
    expect(deriveItemKey("tasks", "42")).toBe("tasks:item:42")
  })
})

describe("deriveTags", () => {
  it("returns the collection and item tags", () => {
    expect(deriveTags("tasks", { id: "42" })).toStrictEqual({
      collectionTag: "tasks",
      itemTag: "tasks:42",
    })
  })
})

import { notes } from "../../tests/utils/notes"
import { matchesFilter, normalizeFilters } from "../filters"

describe("normalizeFilters", () => {
  it("keeps declared names with values, sorted by name", () => {
    expect(
      normalizeFilters(notes, { status: "open", owner: "x", search: "milk", page: 2 }),
    ).toStrictEqual([
      ["search", "milk"],
      ["status", "open"],
    ])
  })

  it("drops undefined and empty values", () => {
    expect(normalizeFilters(notes, { search: "", status: undefined })).toStrictEqual([])
  })

  it("ignores inherited names", () => {
    expect(normalizeFilters(notes, { toString: "x" })).toStrictEqual([])
  })
})

describe("matchesFilter", () => {
  const note = {
    id: "n-1",
    user_id: "u",
    title: "Write Quarterly Report",
    body: null,
    status: "open" as const,
  }

  it("matches contains case-insensitively", () => {
    expect(matchesFilter(note, { kind: "contains", field: "title" }, "quarterly")).toBe(true)
    expect(matchesFilter(note, { kind: "contains", field: "title" }, "annual")).toBe(false)
  })

  it("never matches contains on a null field", () => {
    expect(matchesFilter(note, { kind: "contains", field: "body" }, "null")).toBe(false)
  })

  it("compares equals as strings", () => {
    expect(matchesFilter(note, { kind: "equals", field: "status" }, "open")).toBe(true)
    expect(matchesFilter(note, { kind: "equals", field: "status" }, "Open")).toBe(false)
  })
})

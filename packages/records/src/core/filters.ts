import type { FilterSet, FilterValue, NormalizedFilters } from "../ports/filters"
import type { StoredRecord } from "../ports/record"
import type { FilterDefinition, RecordTypeDefinition } from "../ports/record-type"

/**
 * Keeps declared filter names with a usable value, sorted by name.
 */
export function normalizeFilters<R extends StoredRecord>(
  definition: RecordTypeDefinition<R>,
  filters: FilterSet,
): NormalizedFilters {
  const out: [string, FilterValue][] = []

  for (const [name, value] of Object.entries(filters)) {
    if (value === undefined || value === "") continue
    if (!Object.hasOwn(definition.filters, name)) continue

    out.push([name, value])
  }

  return out.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
}

export function matchesFilter<R extends StoredRecord>(
  record: R,
  filter: FilterDefinition<R>,
  value: FilterValue,
): boolean {
  const actual = record[filter.field]

  if (filter.kind === "equals") return String(actual) === String(value)

  if (actual === null || actual === undefined) return false

  return String(actual).toLowerCase().includes(String(value).toLowerCase())
}

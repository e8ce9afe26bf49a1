export type FilterValue = string | number | boolean

export type FilterSet = Readonly<Record<string, FilterValue | undefined>>

/** Filters after normalization: declared names only, sorted, no empty values. */
export type NormalizedFilters = ReadonlyArray<readonly [name: string, value: FilterValue]>

export type FilterKind = "contains" | "equals"

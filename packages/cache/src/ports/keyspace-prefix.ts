/**
 * Prefix that gives one adapter instance its own slice of a shared backend,
 * e.g. `app:task-api:cache:`. Prepended verbatim to every key and tag set.
 */
export type KeyspacePrefix = string

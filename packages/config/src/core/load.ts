import { z } from "zod/mini"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: z.ZodMiniType<T>

  /** Applied in order, later wins. Defaults to the process environment. */
  sources?: readonly ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = z.safeParse(schema, merged)

  if (!result.success) {
    const keys = result.error.issues.map((issue) => issue.path.map(String).join("."))

    throw ConfigError.invalid(z.prettifyError(result.error), keys)
  }

  const used: Record<string, string> = {}

  for (const key of Object.keys(result.data)) {
    used[key] = provenance[key] ?? "default"
  }

  return new Config<T>(result.data, used, new Set(Object.keys(merged)))
}

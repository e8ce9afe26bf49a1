import { readFile } from "node:fs/promises"
import { resolve } from "node:path"
import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /** Absolute, or relative to `cwd`. */
  file: string

  /** A missing optional file contributes nothing. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

/** Reads a `.env` file without touching `process.env`. */
export class DotenvSource implements ConfigSource {
  readonly name: string
  private readonly path: string
  private readonly required: boolean

  constructor({ file, required, cwd = process.cwd() }: DotenvSourceOptions) {
    this.name = `dotenv:${file}`
    this.path = resolve(cwd, file)
    this.required = required
  }

  async load(): Promise<Record<string, string>> {
    const contents = await readFile(this.path, "utf8").catch((err: unknown) => {
      if (!this.required && errorCode(err) === "ENOENT") return ""
      throw err
    })

    return parse(contents)
  }
}

function errorCode(err: unknown): unknown {
  return err instanceof Error && "code" in err ? err.code : undefined
}

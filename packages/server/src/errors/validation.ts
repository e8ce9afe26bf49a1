import { BaseError } from "@tenantry/errors"
import type { Context } from "hono"
import { z } from "zod/mini"

export type ValidationIssue = { path: string; message: string }

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""

  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }

  return out
}

export class ValidationError extends BaseError<"validation_error"> {
  static fromIssues(
    raw: readonly { path: readonly PropertyKey[]; message: string }[],
  ): ValidationError {
    const issues = raw.map((issue) => ({
      path: formatPath(issue.path),
      message: issue.message,
    }))

    const first = issues[0]
    const message = first
      ? `${first.path ? `${first.path}: ` : ""}${first.message}`
      : "Invalid input"

    return new ValidationError(message, {
      code: "validation_error",
      context: { issues },
    })
  }
}

/**
 * Parses `data` with `schema`, throwing a {@link ValidationError} listing
 * every issue on failure.
 */
export function parseOrThrow<T>(schema: z.ZodMiniType<T>, data: unknown): T {
  const result = z.safeParse(schema, data)

  if (!result.success) throw ValidationError.fromIssues(result.error.issues)

  return result.data
}

/**
 * Reads the JSON request body and parses it with `schema`. A body that is not
 * JSON fails the same way as one that does not match.
 */
export async function parseJsonBody<T>(c: Context, schema: z.ZodMiniType<T>): Promise<T> {
  let body: unknown

  try {
    body = await c.req.json()
  } catch (err) {
    throw new ValidationError("Request body must be valid JSON", {
      code: "validation_error",
      context: { issues: [{ path: "", message: "Request body must be valid JSON" }] },
      cause: err,
    })
  }

  return parseOrThrow(schema, body)
}

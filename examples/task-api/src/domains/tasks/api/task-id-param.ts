import type { RecordId } from "@tenantry/records"
import { type Context, ValidationError } from "@tenantry/server"

export function taskIdParam(c: Context): RecordId {
  const id = c.req.param("id")

  if (!id) throw ValidationError.fromIssues([{ path: ["id"], message: "Task id is required" }])

  return id
}

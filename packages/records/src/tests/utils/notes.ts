import { createNullLogger } from "@tenantry/logger"
import { z } from "zod/mini"
import { defineRecordType } from "../../core/define-record-type"
import { OwnershipEnforcer } from "../../core/ownership-enforcer"

const noteSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  title: z.string(),
  body: z._default(z.nullable(z.string()), null),
  status: z._default(z.enum(["open", "closed"]), "open"),
})

export type Note = z.infer<typeof noteSchema>

export const notes = defineRecordType<Note>({
  name: "notes",
  filters: {
    search: { kind: "contains", field: "title" },
    status: { kind: "equals", field: "status" },
  },
  parse: (value) => z.parse(noteSchema, value),
})

export const ALICE = { id: "user-alice" }
export const BOB = { id: "user-bob" }

export function sequentialIds(prefix = "n"): () => string {
  let next = 0
  return () => `${prefix}-${++next}`
}

export const enforcer = new OwnershipEnforcer({ logger: createNullLogger() })

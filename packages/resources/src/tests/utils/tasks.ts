import { MemoryBytesCache } from "@tenantry/cache"
import { FakeClock } from "@tenantry/clock"
import { createNullLogger } from "@tenantry/logger"
import { defineRecordType, MemoryRecordStore, OwnershipEnforcer } from "@tenantry/records"
import { z } from "zod/mini"
import { CachedResourceService, type CachedResourceServiceOptions } from "../../core/cached-resource-service"

const taskSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  title: z.string(),
  description: z._default(z.nullable(z.string()), null),
  status: z._default(z.enum(["pending", "in_progress", "done"]), "pending"),
})

export type Task = z.infer<typeof taskSchema>

export const tasks = defineRecordType<Task>({
  name: "tasks",
  filters: {
    search: { kind: "contains", field: "title" },
    status: { kind: "equals", field: "status" },
  },
  parse: (value) => z.parse(taskSchema, value),
})

export const ALICE = { id: "user-a" }
export const BOB = { id: "user-b" }

export function createTaskHarness(opts: CachedResourceServiceOptions = {}) {
  let next = 0

  const clock = new FakeClock(0)
  const store = new MemoryRecordStore(tasks, { generateId: () => `t-${++next}` })
  const cache = new MemoryBytesCache({ clock }, { maxEntries: 1000 })
  const logger = createNullLogger()
  const enforcer = new OwnershipEnforcer({ logger })

  const service = new CachedResourceService(tasks, { store, cache, enforcer, logger }, opts)

  return { clock, store, cache, enforcer, service }
}

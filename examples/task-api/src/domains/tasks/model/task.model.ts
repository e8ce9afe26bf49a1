import { defineRecordType } from "@tenantry/records"
import { z } from "zod/mini"

export const taskStatuses = ["pending", "in_progress", "done"] as const

export const taskSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  title: z.string(),
  description: z._default(z.nullable(z.string()), null),
  status: z._default(z.enum(taskStatuses), "pending"),
})

export type Task = z.infer<typeof taskSchema>

export const taskRecordType = defineRecordType<Task>({
  name: "tasks",
  filters: {
    search: { kind: "contains", field: "title" },
    status: { kind: "equals", field: "status" },
  },
  parse: (value) => z.parse(taskSchema, value),
})

import { z } from "zod/mini"
import { taskStatuses } from "../model/task.model"

const title = z
  .string()
  .check(
    z.trim(),
    z.minLength(1, { error: "Title cannot be empty" }),
    z.maxLength(255, { error: "Title cannot exceed 255 characters" }),
  )

export const createTaskRequestSchema = z.object({
  title,
  description: z.optional(z.nullable(z.string())),
  status: z.optional(z.enum(taskStatuses, { error: "Unsupported status" })),
})

export type CreateTaskRequest = z.infer<typeof createTaskRequestSchema>

export const updateTaskRequestSchema = z.partial(createTaskRequestSchema)

export type UpdateTaskRequest = z.infer<typeof updateTaskRequestSchema>

export const listTasksQuerySchema = z.object({
  search: z.optional(z.string()),
  status: z.optional(z.enum(taskStatuses, { error: "Unsupported status" })),
  page: z.optional(z.coerce.number()),
  pageSize: z.optional(z.coerce.number()),
})

export type ListTasksQuery = z.infer<typeof listTasksQuerySchema>

import { type Context, parseJsonBody, type RequestHandler } from "@tenantry/server"
import type { TaskServices } from "../composition"
import { createTaskRequestSchema } from "./task.api.schema"

export function createTaskHandler({ taskService }: TaskServices): RequestHandler {
  return async (c: Context) => {
    const body = await parseJsonBody(c, createTaskRequestSchema)

    const task = await taskService.forPrincipal(c.get("principal")).create(body)

    return c.json({ data: task }, 201)
  }
}

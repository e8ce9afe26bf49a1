import { type Context, parseJsonBody, type RequestHandler } from "@tenantry/server"
import type { TaskServices } from "../composition"
import { taskIdParam } from "./task-id-param"
import { updateTaskRequestSchema } from "./task.api.schema"

export function updateTaskHandler({ taskService }: TaskServices): RequestHandler {
  return async (c: Context) => {
    const tasks = taskService.forPrincipal(c.get("principal"))

    const task = await tasks.getById(taskIdParam(c))
    const body = await parseJsonBody(c, updateTaskRequestSchema)

    return c.json({ data: await tasks.update(task, body) })
  }
}

import type { Context, RequestHandler } from "@tenantry/server"
import type { TaskServices } from "../composition"
import { taskIdParam } from "./task-id-param"

export function getTaskHandler({ taskService }: TaskServices): RequestHandler {
  return async (c: Context) => {
    const task = await taskService.forPrincipal(c.get("principal")).getById(taskIdParam(c))

    return c.json({ data: task })
  }
}

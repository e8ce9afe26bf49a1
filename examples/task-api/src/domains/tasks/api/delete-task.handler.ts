import type { Context, RequestHandler } from "@tenantry/server"
import type { TaskServices } from "../composition"
import { taskIdParam } from "./task-id-param"

export function deleteTaskHandler({ taskService }: TaskServices): RequestHandler {
  return async (c: Context) => {
    const tasks = taskService.forPrincipal(c.get("principal"))

    await tasks.delete(await tasks.getById(taskIdParam(c)))

    return c.body(null, 204)
  }
}

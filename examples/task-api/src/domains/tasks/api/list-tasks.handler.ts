import { type Context, parseOrThrow, type RequestHandler } from "@tenantry/server"
import type { TaskServices } from "../composition"
import { listTasksQuerySchema } from "./task.api.schema"

export function listTasksHandler({ taskService }: TaskServices): RequestHandler {
  return async (c: Context) => {
    const query = parseOrThrow(listTasksQuerySchema, c.req.query())

    const page = await taskService
      .forPrincipal(c.get("principal"))
      .list(
        { search: query.search, status: query.status },
        { page: query.page, pageSize: query.pageSize },
      )

    return c.json({
      data: page.items,
      meta: {
        page: page.page,
        pageSize: page.pageSize,
        total: page.total,
        lastPage: page.lastPage,
      },
    })
  }
}

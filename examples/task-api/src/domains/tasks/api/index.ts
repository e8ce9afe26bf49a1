import { type Application, createRouter } from "@tenantry/server"
import type { TaskServices } from "../composition"
import { createTaskHandler } from "./create-task.handler"
import { deleteTaskHandler } from "./delete-task.handler"
import { getTaskHandler } from "./get-task.handler"
import { listTasksHandler } from "./list-tasks.handler"
import { updateTaskHandler } from "./update-task.handler"

type TasksModuleDeps = {
  tasks: TaskServices
}

export function createTasksModule(deps: TasksModuleDeps) {
  return {
    name: "tasks",
    register: (api: Application) => {
      const tasks = createRouter()

      tasks.get("/", listTasksHandler(deps.tasks))
      tasks.post("/", createTaskHandler(deps.tasks))
      tasks.get("/:id", getTaskHandler(deps.tasks))
      tasks.patch("/:id", updateTaskHandler(deps.tasks))
      tasks.delete("/:id", deleteTaskHandler(deps.tasks))

      api.route("/tasks", tasks)
    },
  }
}

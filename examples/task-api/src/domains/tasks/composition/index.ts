import { MemoryRecordStore, PostgresRecordStore, type RecordStore } from "@tenantry/records"
import { CachedResourceService } from "@tenantry/resources"
import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraClients } from "../../../app/services/infra"
import { type Task, taskRecordType } from "../model/task.model"

export type TaskServices = {
  taskService: CachedResourceService<Task>
}

export function createTaskServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
): TaskServices {
  const store: RecordStore<Task> = infra.pgPool
    ? new PostgresRecordStore(taskRecordType, { db: infra.pgPool }, { table: config.tasks.table })
    : new MemoryRecordStore(taskRecordType)

  const taskService = new CachedResourceService(
    taskRecordType,
    {
      store,
      cache: infra.cache,
      enforcer: core.enforcer,
      logger: core.logger,
    },
    {
      ttlSeconds: config.cache.ttlSeconds,
      pagination: {
        defaultPageSize: config.tasks.defaultPageSize,
        maxPageSize: config.tasks.maxPageSize,
      },
    },
  )

  return { taskService }
}

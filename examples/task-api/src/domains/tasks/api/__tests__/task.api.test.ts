import type { Application } from "@tenantry/server"
import { z } from "zod/mini"
import { createTestHarness } from "../../../../tests/test-harness"
import { taskSchema } from "../../model/task.model"

const taskResponse = z.object({ data: taskSchema })

const listResponse = z.object({
  data: z.array(taskSchema),
  meta: z.object({
    page: z.number(),
    pageSize: z.number(),
    total: z.number(),
    lastPage: z.number(),
  }),
})

type RequestOptions = {
  principal?: string
  body?: unknown
  headers?: Record<string, string>
}

describe("Task API", () => {
  let app: Application

  beforeEach(async () => {
    const harness = await createTestHarness()
    app = harness.app
  })

  const send = (method: string, path: string, opts: RequestOptions = {}) =>
    app.request(`/api/v1${path}`, {
      method,
      headers: {
        ...opts.headers,
        ...(opts.principal && { "x-principal-id": opts.principal }),
        ...(opts.body !== undefined && { "content-type": "application/json" }),
      },
      ...(opts.body !== undefined && { body: JSON.stringify(opts.body) }),
    })

  const createTask = async (principal: string, body: Record<string, unknown>) => {
    const res = await send("POST", "/tasks", { principal, body })
    expect(res.status).toBe(201)
    return z.parse(taskResponse, await res.json()).data
  }

  const getTask = async (principal: string, id: string) => {
    const res = await send("GET", `/tasks/${id}`, { principal })
    expect(res.status).toBe(200)
    return z.parse(taskResponse, await res.json()).data
  }

  const listTasks = async (principal: string, query = "") => {
    const res = await send("GET", `/tasks${query}`, { principal })
    expect(res.status).toBe(200)
    return z.parse(listResponse, await res.json())
  }

  it("keeps a draft report private to its owner and never serves it stale", async () => {
    const task = await createTask("user-a", { title: "draft report" })

    expect(task).toMatchObject({
      user_id: "user-a",
      title: "draft report",
      description: null,
      status: "pending",
    })

    const list = await listTasks("user-a")
    expect(list.data).toStrictEqual([task])
    expect(list.meta).toStrictEqual({ page: 1, pageSize: 15, total: 1, lastPage: 1 })

    const foreign = await send("GET", `/tasks/${task.id}`, { principal: "user-b" })
    expect(foreign.status).toBe(404)

    expect((await getTask("user-a", task.id)).status).toBe("pending")

    const patched = await send("PATCH", `/tasks/${task.id}`, {
      principal: "user-a",
      body: { status: "done" },
    })
    expect(patched.status).toBe(200)
    expect(z.parse(taskResponse, await patched.json()).data.status).toBe("done")

    expect((await getTask("user-a", task.id)).status).toBe("done")
  })

  it("answers 401 without a principal", async () => {
    const res = await send("GET", "/tasks", { headers: { "x-request-id": "req-1" } })

    expect(res.status).toBe(401)
    expect(res.headers.get("x-request-id")).toBe("req-1")
    expect(await res.json()).toStrictEqual({
      error: {
        status: 401,
        code: "unauthenticated_access",
        message: "Authentication required",
        requestId: "req-1",
      },
    })
  })

  it("reports a foreign task exactly like a missing one", async () => {
    const task = await createTask("user-a", { title: "secret" })

    const foreign = await send("GET", `/tasks/${task.id}`, {
      principal: "user-b",
      headers: { "x-request-id": "req-2" },
    })
    const missing = await send("GET", "/tasks/no-such-task", {
      principal: "user-b",
      headers: { "x-request-id": "req-2" },
    })

    expect(foreign.status).toBe(404)
    expect(missing.status).toBe(404)
    expect(await foreign.json()).toStrictEqual(await missing.json())
  })

  describe("POST /tasks", () => {
    it("rejects an empty title", async () => {
      const res = await send("POST", "/tasks", { principal: "user-a", body: { title: "   " } })

      expect(res.status).toBe(400)
      expect(await res.json()).toMatchObject({
        error: {
          code: "validation_error",
          issues: [{ path: "title", message: "Title cannot be empty" }],
        },
      })
    })

    it("rejects a body that is not JSON", async () => {
      const res = await app.request("/api/v1/tasks", {
        method: "POST",
        headers: { "x-principal-id": "user-a", "content-type": "application/json" },
        body: "{",
      })

      expect(res.status).toBe(400)
      expect(await res.json()).toMatchObject({ error: { code: "validation_error" } })
    })

    it("assigns the owner from the principal, not the body", async () => {
      const task = await createTask("user-a", { title: "mine", user_id: "user-b" })

      expect(task.user_id).toBe("user-a")
    })
  })

  describe("GET /tasks", () => {
    it("filters by search term and status", async () => {
      await createTask("user-a", { title: "Write report" })
      await createTask("user-a", { title: "Buy milk", status: "done" })

      const search = await listTasks("user-a", "?search=REPORT")
      const status = await listTasks("user-a", "?status=done")

      expect(search.data.map((t) => t.title)).toStrictEqual(["Write report"])
      expect(status.data.map((t) => t.title)).toStrictEqual(["Buy milk"])
    })

    it("paginates", async () => {
      for (const title of ["a", "b", "c"]) {
        await createTask("user-a", { title })
      }

      const page = await listTasks("user-a", "?page=2&pageSize=2")

      expect(page.data.map((t) => t.title)).toStrictEqual(["c"])
      expect(page.meta).toStrictEqual({ page: 2, pageSize: 2, total: 3, lastPage: 2 })
    })

    it("rejects a page size over the maximum", async () => {
      const res = await send("GET", "/tasks?pageSize=500", { principal: "user-a" })

      expect(res.status).toBe(400)
      expect(await res.json()).toMatchObject({
        error: { code: "invalid_pagination", field: "pageSize", value: 500, max: 100 },
      })
    })

    it("rejects an unknown status", async () => {
      const res = await send("GET", "/tasks?status=archived", { principal: "user-a" })

      expect(res.status).toBe(400)
      expect(await res.json()).toMatchObject({
        error: { code: "validation_error", issues: [{ path: "status" }] },
      })
    })
  })

  describe("PATCH /tasks/:id", () => {
    it("cannot move a task to another owner", async () => {
      const task = await createTask("user-a", { title: "keep" })

      const res = await send("PATCH", `/tasks/${task.id}`, {
        principal: "user-a",
        body: { user_id: "user-b", description: "notes" },
      })

      expect(z.parse(taskResponse, await res.json()).data).toStrictEqual({
        ...task,
        description: "notes",
      })
    })

    it("answers 404 for another principal's task", async () => {
      const task = await createTask("user-a", { title: "keep" })

      const res = await send("PATCH", `/tasks/${task.id}`, {
        principal: "user-b",
        body: { title: "taken" },
      })

      expect(res.status).toBe(404)
      expect((await getTask("user-a", task.id)).title).toBe("keep")
    })
  })

  describe("DELETE /tasks/:id", () => {
    it("deletes the task and drops it from cached reads", async () => {
      const task = await createTask("user-a", { title: "temp" })
      await listTasks("user-a")
      await getTask("user-a", task.id)

      const res = await send("DELETE", `/tasks/${task.id}`, { principal: "user-a" })

      expect(res.status).toBe(204)
      expect((await send("GET", `/tasks/${task.id}`, { principal: "user-a" })).status).toBe(404)
      expect((await listTasks("user-a")).data).toStrictEqual([])
    })

    it("answers 404 for another principal's task and keeps it", async () => {
      const task = await createTask("user-a", { title: "keep" })

      const res = await send("DELETE", `/tasks/${task.id}`, { principal: "user-b" })

      expect(res.status).toBe(404)
      expect((await listTasks("user-a")).data).toHaveLength(1)
    })
  })

  it("serves liveness outside the API prefix", async () => {
    const res = await app.request("/health")

    expect(res.status).toBe(200)
    expect(await res.json()).toStrictEqual({ ok: true })
  })
})

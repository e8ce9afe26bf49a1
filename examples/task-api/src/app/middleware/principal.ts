import type { Middleware } from "@tenantry/server"
import "../types/context"

export type PrincipalMiddlewareOptions = {
  /** Set by the upstream gateway after authentication. */
  header: string
}

/**
 * Binds the principal named by the gateway header. Requests without one
 * continue unbound and fail at the first scoped operation.
 */
export function principalMiddleware(opts: PrincipalMiddlewareOptions): Middleware {
  return async (c, next) => {
    const id = c.req.header(opts.header)?.trim()

    if (id) {
      c.set("principal", { id })
      c.set("logger", c.get("logger").child({ principalId: id }))
    }

    await next()
  }
}

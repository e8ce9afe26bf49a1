import type { Context } from "hono"
import { routePath } from "hono/route"
import { isNonEmptyString } from "./is-non-empty-string"

/** The route pattern that matched, such as `/tasks/:id`, else the raw path. */
export function matchedRoute(c: Context): string {
  const pattern = routePath(c)
  return isNonEmptyString(pattern) ? pattern : c.req.path
}

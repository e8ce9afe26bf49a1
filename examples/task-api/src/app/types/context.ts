import type { Principal } from "@tenantry/records"

export type AppContextVariables = {
  /** Unset when the request carries no principal header. */
  principal: Principal | undefined
}

declare module "hono" {
  // eslint-disable-next-line @typescript-eslint/no-empty-object-type
  interface ContextVariableMap extends AppContextVariables {}
}

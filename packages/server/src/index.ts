export {
  createErrorFormatter,
  type ErrorFormatter,
  type ErrorMapping,
  type ErrorMappingsConfig,
  type ErrorResponse,
  type FallbackMapping,
} from "./errors/error-formatter"
export { createErrorHandler } from "./errors/error-handler"
export {
  parseJsonBody,
  parseOrThrow,
  ValidationError,
  type ValidationIssue,
} from "./errors/validation"
export { StartupError } from "./lifecycle/lifecycle-error"
export type { LifecycleHook, LifecycleHookContext } from "./lifecycle/lifecycle-hook"
export type { StopResult } from "./lifecycle/shutdown"
export {
  type Application,
  type Context,
  createRouter,
  createServer,
  type Middleware,
  type RequestHandler,
  type Router,
  Server,
  type ServerCollaborators,
  type ServerHandle,
  type ServerPhase,
} from "./server/server"
export type {
  PathString,
  ReadinessCheck,
  ServerDependencies,
  ServerOptions,
} from "./server/server-options"
export type { ServerContextVariables } from "./types/context"

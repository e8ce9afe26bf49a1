import { type Handler, Hono, type Context as HonoContext, type MiddlewareHandler } from "hono"
import { type BuildAppFn, buildApp } from "../lifecycle/build-app"
import { type ListenFn, listen } from "../lifecycle/listen"
import { type Closeable, type ShutdownFn, type StopResult, shutdown } from "../lifecycle/shutdown"
import {
  type SetupProcessHandlersFn,
  type SignalHandler,
  setupProcessHandlers,
} from "../lifecycle/signals"
import { type StartupFn, startup } from "../lifecycle/startup"
import {
  type ResolvedServerOptions,
  resolveOptions,
  type ServerDependencies,
  type ServerOptions,
} from "./server-options"
import "../types/context"

export type Application = Hono
export type Router = Hono
export type Context = HonoContext
export type Middleware = MiddlewareHandler
export type RequestHandler = Handler

export interface ServerHandle {
  /** Safe to call repeatedly; every caller gets the same result. */
  stop(): Promise<StopResult>
  address: { host: string; port: number }
}

type Phase =
  | { kind: "idle" }
  | { kind: "starting" }
  | { kind: "running"; listener: Closeable }
  | { kind: "stopping"; result: Promise<StopResult> }
  | { kind: "stopped"; result: StopResult }

export type ServerPhase = Phase["kind"]

export interface ServerCollaborators {
  onStartup: StartupFn
  onShutdown: ShutdownFn
  listen: ListenFn
  buildApp: BuildAppFn
  setupProcessHandlers: SetupProcessHandlersFn
}

const defaultCollaborators: ServerCollaborators = {
  onStartup: startup,
  onShutdown: shutdown,
  listen,
  buildApp,
  setupProcessHandlers,
}

export function createRouter(): Router {
  return new Hono()
}

/**
 * Owns one listener through `idle → starting → running → stopping → stopped`.
 * Readiness is true only while running. A failed start returns to idle.
 */
export class Server {
  private phase: Phase = { kind: "idle" }
  private signals?: SignalHandler

  constructor(
    private readonly deps: ServerDependencies,
    private readonly options: ResolvedServerOptions,
    private readonly collabs: ServerCollaborators = defaultCollaborators,
  ) {}

  get currentPhase(): ServerPhase {
    return this.phase.kind
  }

  isReady(): boolean {
    return this.phase.kind === "running"
  }

  setupProcessHandlers(): this {
    this.signals ??= this.collabs.setupProcessHandlers({
      logger: this.deps.logger,
      stop: () => this.stop(),
    })

    return this
  }

  async start(): Promise<ServerHandle> {
    if (this.phase.kind !== "idle") {
      throw new Error(`Cannot start a server that is ${this.phase.kind}`)
    }

    this.phase = { kind: "starting" }

    try {
      await this.collabs.onStartup({
        clock: this.deps.clock,
        logger: this.deps.logger,
        deadlineMs: this.deps.clock.nowMs() + this.options.startupTimeoutMs,
        startHooks: this.options.startHooks,
      })

      const listener = this.collabs.listen(this.buildApp(), this.options, this.deps.logger)
      this.phase = { kind: "running", listener }
    } catch (err) {
      this.phase = { kind: "idle" }
      throw err
    }

    return {
      stop: () => this.stop(),
      address: { host: this.options.host, port: this.options.port },
    }
  }

  /** The fully wired application, without binding a port. */
  buildApp(): Application {
    return this.collabs.buildApp({
      options: this.options,
      logger: this.deps.logger,
      isReady: () => this.isReady(),
    })
  }

  stop(): Promise<StopResult> {
    switch (this.phase.kind) {
      case "running": {
        const result = this.shutdown(this.phase.listener)
        this.phase = { kind: "stopping", result }
        return result
      }
      case "stopping":
        return this.phase.result
      case "stopped":
        return Promise.resolve(this.phase.result)
      default:
        this.deps.logger.warn("Stop called but server not running", { phase: this.phase.kind })
        return Promise.resolve({ ok: true, failures: [], timedOut: false })
    }
  }

  private async shutdown(listener: Closeable): Promise<StopResult> {
    try {
      const result = await this.collabs.onShutdown({
        server: listener,
        clock: this.deps.clock,
        logger: this.deps.logger,
        deadlineMs: this.deps.clock.nowMs() + this.options.shutdownTimeoutMs,
        stopHooks: this.options.stopHooks,
      })

      this.phase = { kind: "stopped", result }
      return result
    } finally {
      this.signals?.unregister()
    }
  }
}

export function createServer(deps: ServerDependencies, options: ServerOptions): Server {
  return new Server(deps, resolveOptions(options))
}

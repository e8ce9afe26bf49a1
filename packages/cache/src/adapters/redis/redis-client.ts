import type { Milliseconds } from "@tenantry/clock"
import { createClient, RESP_TYPES } from "redis"

/**
 * The slice of a node-redis client the cache uses, with bulk strings mapped to
 * Buffers so cached bytes come back untouched.
 */
export type RedisBytesClient = {
  /** True once `connect()` was called, even while still reconnecting. */
  isOpen: boolean
  isReady: boolean

  connect(): Promise<unknown>
  quit(): Promise<unknown>

  /** Drops the socket without waiting for pending replies. */
  destroy(): void
  on(event: "error", listener: (err: Error) => void): unknown

  get(key: string): Promise<Buffer | null>
  mGet(keys: string[]): Promise<(Buffer | null)[]>
  del(keys: string | string[]): Promise<number>
  eval(
    script: string,
    options: { keys: string[]; arguments: (string | Buffer)[] },
  ): Promise<unknown>
}

export type RedisBytesClientOptions = {
  url: string

  /** How long to wait for a connection before failing. */
  connectTimeoutMs: Milliseconds
}

/**
 * Creates an unconnected client. Commands issued while disconnected fail
 * immediately instead of queueing, so callers can fall back to the source.
 */
export function createRedisBytesClient(opts: RedisBytesClientOptions): RedisBytesClient {
  return createClient({
    url: opts.url,
    socket: { connectTimeout: opts.connectTimeoutMs },
    disableOfflineQueue: true,
  }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}

import { FakeClock } from "@tenantry/clock"
import type { Logger } from "@tenantry/logger"
import { mock } from "vitest-mock-extended"
import { CodecDataCache } from "../../../core/codec-data-cache"
import { createJsonCodec } from "../../../core/json-codec"
import { ReadThroughCache } from "../../../core/read-through-cache"
import { FakeRedisClient } from "../../../tests/utils/fake-redis-client"
import type { Mock } from "../../../tests/utils/mock"
import type { RedisBytesClient } from "../redis-client"
import { RedisBytesCache } from "../redis-bytes-cache"
import { INVALIDATE_TAGS_SCRIPT, SET_TAGGED_SCRIPT } from "../redis-scripts"

describe("RedisBytesCache", () => {
  const prefix = "app:task-api:cache:"

  describe("commands", () => {
    let client: Mock<RedisBytesClient>
    let clock: FakeClock
    let cache: RedisBytesCache

    beforeEach(() => {
      client = mock<RedisBytesClient>()
      clock = new FakeClock(1_000)
      cache = new RedisBytesCache({ client, clock }, { keyspacePrefix: prefix, deleteBatchSize: 50 })
    })

    it("reads from the prefixed key and copies the buffer", async () => {
      client.get.mockResolvedValue(Buffer.from([1, 2, 3]))

      const result = await cache.get("tasks:item:1")

      expect(client.get).toHaveBeenCalledExactlyOnceWith(`${prefix}tasks:item:1`)
      expect(result).toStrictEqual({ kind: "hit", value: new Uint8Array([1, 2, 3]) })
    })

    it("writes entry and tag sets in one script call", async () => {
      await cache.set("tasks:item:1", new Uint8Array([5]), {
        tags: ["tasks", "tasks:1", "tasks"],
        ttl: { kind: "seconds", seconds: 3600 },
      })

      expect(client.eval).toHaveBeenCalledExactlyOnceWith(SET_TAGGED_SCRIPT, {
        keys: [`${prefix}tasks:item:1`, `${prefix}tag:tasks`, `${prefix}tag:tasks:1`],
        arguments: [Buffer.from([5]), "3600000"],
      })
    })

    it("passes a zero ttl when none is given", async () => {
      await cache.set("tasks:item:1", new Uint8Array([5]), { tags: ["tasks"] })

      expect(client.eval).toHaveBeenCalledWith(SET_TAGGED_SCRIPT, {
        keys: [`${prefix}tasks:item:1`, `${prefix}tag:tasks`],
        arguments: [Buffer.from([5]), "0"],
      })
    })

    it("measures absolute expiry against the clock", async () => {
      await cache.set("tasks:item:1", new Uint8Array([5]), {
        tags: ["tasks"],
        ttl: { kind: "until", expiresAt: new Date(3_500) },
      })

      expect(client.eval).toHaveBeenCalledWith(SET_TAGGED_SCRIPT, {
        keys: [`${prefix}tasks:item:1`, `${prefix}tag:tasks`],
        arguments: [Buffer.from([5]), "2500"],
      })
    })

    it("deletes instead of writing when the expiry has passed", async () => {
      await cache.set("tasks:item:1", new Uint8Array([5]), {
        tags: ["tasks"],
        ttl: { kind: "until", expiresAt: new Date(500) },
      })

      expect(client.eval).not.toHaveBeenCalled()
      expect(client.del).toHaveBeenCalledExactlyOnceWith(`${prefix}tasks:item:1`)
    })

    it("invalidates tags with the configured batch size", async () => {
      await cache.invalidateTags(["tasks:1", "tasks"])

      expect(client.eval).toHaveBeenCalledExactlyOnceWith(INVALIDATE_TAGS_SCRIPT, {
        keys: [
          `${prefix}tag:tasks:1`,
          `${prefix}tag:tasks`,
          `${prefix}gen:tasks:1`,
          `${prefix}gen:tasks`,
        ],
        arguments: ["50"],
      })
    })

    it("passes guarded generations to the write script", async () => {
      await cache.set("tasks:item:1", new Uint8Array([5]), {
        tags: ["tasks", "tasks:1"],
        unchangedSince: new Map([
          ["tasks", 2],
          ["tasks:1", 0],
        ]),
      })

      expect(client.eval).toHaveBeenCalledExactlyOnceWith(SET_TAGGED_SCRIPT, {
        keys: [
          `${prefix}tasks:item:1`,
          `${prefix}tag:tasks`,
          `${prefix}tag:tasks:1`,
          `${prefix}gen:tasks`,
          `${prefix}gen:tasks:1`,
        ],
        arguments: [Buffer.from([5]), "0", "2", "0"],
      })
    })

    it("reads tag generations with one MGET, missing counters as zero", async () => {
      client.mGet.mockResolvedValue([Buffer.from("4"), null])

      const generations = await cache.tagGenerations(["tasks", "tasks:1", "tasks"])

      expect(client.mGet).toHaveBeenCalledExactlyOnceWith([
        `${prefix}gen:tasks`,
        `${prefix}gen:tasks:1`,
      ])
      expect(generations).toStrictEqual(
        new Map([
          ["tasks", 4],
          ["tasks:1", 0],
        ]),
      )
    })

    it("skips the round trip for an empty tag list", async () => {
      await cache.invalidateTags([])

      expect(client.eval).not.toHaveBeenCalled()
    })

    it("surfaces client failures", async () => {
      client.get.mockRejectedValue(new Error("The client is closed"))

      await expect(cache.get("tasks:item:1")).rejects.toThrow("The client is closed")
    })
  })

  describe("command timeout", () => {
    let client: Mock<RedisBytesClient>
    let cache: RedisBytesCache

    beforeEach(() => {
      client = mock<RedisBytesClient>()
      cache = new RedisBytesCache(
        { client, clock: new FakeClock(0) },
        { keyspacePrefix: prefix, commandTimeoutMs: 5 },
      )
      client.get.mockReturnValue(new Promise(() => {}))
      client.mGet.mockReturnValue(new Promise(() => {}))
      client.eval.mockReturnValue(new Promise(() => {}))
    })

    it("fails a read the server never answers", async () => {
      await expect(cache.get("tasks:item:1")).rejects.toMatchObject({
        code: "cache_timeout",
        context: { command: "GET", timeoutMs: 5 },
      })
    })

    it("fails a tag invalidation the server never answers", async () => {
      await expect(cache.invalidateTags(["tasks"])).rejects.toMatchObject({
        code: "cache_timeout",
        context: { command: "EVAL", timeoutMs: 5 },
      })
    })

    it("lets a read-through fall back to the source", async () => {
      const readThrough = new ReadThroughCache({
        cache: new CodecDataCache(cache, createJsonCodec<string>()),
        logger: mock<Logger>(),
      })

      const value = await readThrough.getOrCompute(
        "tasks:item:1",
        { tags: ["tasks"] },
        async () => "fresh",
      )

      expect(value).toBe("fresh")
      expect(client.eval).not.toHaveBeenCalled()
    })
  })

  describe("tag set lifetime", () => {
    let clock: FakeClock
    let client: FakeRedisClient
    let cache: RedisBytesCache

    beforeEach(() => {
      clock = new FakeClock(0)
      client = new FakeRedisClient(clock)
      cache = new RedisBytesCache({ client, clock }, { keyspacePrefix: prefix })
    })

    it("keeps a tag set alive as long as its longest-lived entry", async () => {
      await cache.set("tasks:item:1", new Uint8Array([1]), {
        tags: ["tasks"],
        ttl: { kind: "seconds", seconds: 60 },
      })
      await cache.set("tasks:item:2", new Uint8Array([2]), {
        tags: ["tasks"],
        ttl: { kind: "seconds", seconds: 10 },
      })

      expect(client.pttl(`${prefix}tag:tasks`)).toBe(60_000)

      await cache.set("tasks:item:3", new Uint8Array([3]), {
        tags: ["tasks"],
        ttl: { kind: "seconds", seconds: 120 },
      })

      expect(client.pttl(`${prefix}tag:tasks`)).toBe(120_000)
      expect(client.members(`${prefix}tag:tasks`)).toEqual([
        `${prefix}tasks:item:1`,
        `${prefix}tasks:item:2`,
        `${prefix}tasks:item:3`,
      ])
    })

    it("persists a tag set once an entry without expiry joins it", async () => {
      await cache.set("tasks:item:1", new Uint8Array([1]), {
        tags: ["tasks"],
        ttl: { kind: "seconds", seconds: 60 },
      })
      await cache.set("tasks:item:2", new Uint8Array([2]), { tags: ["tasks"] })

      expect(client.pttl(`${prefix}tag:tasks`)).toBe(-1)
    })

    it("expires entries with their ttl", async () => {
      await cache.set("tasks:item:1", new Uint8Array([1]), {
        tags: ["tasks"],
        ttl: { kind: "milliseconds", milliseconds: 100 },
      })

      clock.advance(100)

      expect(await cache.get("tasks:item:1")).toStrictEqual({ kind: "miss" })
    })
  })

  describe("guarded writes", () => {
    let client: FakeRedisClient
    let cache: RedisBytesCache

    beforeEach(() => {
      const clock = new FakeClock(0)
      client = new FakeRedisClient(clock)
      cache = new RedisBytesCache({ client, clock }, { keyspacePrefix: prefix })
    })

    it("counts invalidations per tag", async () => {
      await cache.invalidateTags(["tasks", "tasks:1"])
      await cache.invalidateTags(["tasks"])

      expect(await cache.tagGenerations(["tasks", "tasks:1", "notes"])).toStrictEqual(
        new Map([
          ["tasks", 2],
          ["tasks:1", 1],
          ["notes", 0],
        ]),
      )
    })
  })
})

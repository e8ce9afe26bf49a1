import { mock } from "vitest-mock-extended"
import type { BytesCache } from "../../ports/bytes-cache"
import type { CacheSetOptions } from "../../ports/cache-options"
import type { Codec } from "../../ports/codec"
import type { Mock } from "../../tests/utils/mock"
import { CodecDataCache } from "../codec-data-cache"

describe("CodecDataCache<T>", () => {
  let bytesCache: Mock<BytesCache>
  let codec: Mock<Codec<string>>
  let cache: CodecDataCache<string>

  beforeEach(() => {
    bytesCache = mock<BytesCache>()
    codec = mock<Codec<string>>()
    cache = new CodecDataCache(bytesCache, codec)
  })

  it("passes a miss through without decoding", async () => {
    bytesCache.get.mockResolvedValue({ kind: "miss" })

    expect(await cache.get("k")).toStrictEqual({ kind: "miss" })
    expect(codec.decode).not.toHaveBeenCalled()
  })

  it("decodes a hit", async () => {
    const raw = new Uint8Array([1, 2])
    bytesCache.get.mockResolvedValue({ kind: "hit", value: raw })
    codec.decode.mockReturnValue("decoded")

    expect(await cache.get("k")).toStrictEqual({ kind: "hit", value: "decoded" })
    expect(codec.decode).toHaveBeenCalledExactlyOnceWith(raw)
  })

  it("encodes before writing and passes options through", async () => {
    const encoded = new Uint8Array([9])
    const opts: CacheSetOptions = { tags: ["tasks"], ttl: { kind: "seconds", seconds: 60 } }
    codec.encode.mockReturnValue(encoded)

    await cache.set("k", "value", opts)

    expect(bytesCache.set).toHaveBeenCalledExactlyOnceWith("k", encoded, opts)
  })

  it("passes tag generations through", async () => {
    const generations = new Map([["tasks", 2]])
    bytesCache.tagGenerations.mockResolvedValue(generations)

    expect(await cache.tagGenerations(["tasks"])).toBe(generations)
    expect(bytesCache.tagGenerations).toHaveBeenCalledExactlyOnceWith(["tasks"])
  })

  it("forwards invalidation calls", async () => {
    await cache.invalidate("k")
    await cache.invalidateTags(["tasks", "tasks:1"])

    expect(bytesCache.invalidate).toHaveBeenCalledExactlyOnceWith("k")
    expect(bytesCache.invalidateTags).toHaveBeenCalledExactlyOnceWith(["tasks", "tasks:1"])
  })
})

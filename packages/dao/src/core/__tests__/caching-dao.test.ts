import {
  CacheError,
  type CacheStore,
  createMemoryCacheStore,
} from "@tablecache/cache"
import { createMemoryLogger, type MemoryLogger } from "@tablecache/logger"
import { mock } from "vitest-mock-extended"
import { z } from "zod"
import { MemoryRecordStore } from "../../adapters/memory/memory-record-store"
import type { Mock } from "../../tests/utils/mock"
import { createUserStore, type User, UserType, users } from "../../tests/utils/user-fixtures"
import { CachingDao } from "../caching-dao"
import { defineRecordType } from "../define-record-type"

describe("CachingDao", () => {
  let logger: MemoryLogger
  let store: MemoryRecordStore<User, number>
  let cacheStore: CacheStore

  beforeEach(() => {
    logger = createMemoryLogger()
    store = createUserStore()
    cacheStore = createMemoryCacheStore({ maxEntries: 100 }, { logger })
  })

  function makeDao(cacheEnabled = true, cache: CacheStore = cacheStore) {
    return new CachingDao<User, number>(
      { store, cacheStore: cache, recordType: UserType, logger },
      { cacheEnabled },
    )
  }

  it("resolves its table name from the record type", () => {
    const dao = makeDao()

    expect(dao.tableName).toBe("user")
    expect(dao.cacheEnabled).toBe(true)
  })

  describe("end to end", () => {
    it("insert, read, delete, read", () => {
      const dao = makeDao()

      expect(dao.insert(users.ada())).toBe(true)
      expect(dao.queryAll()).toStrictEqual([users.ada()])

      expect(dao.deleteById(1)).toBe(true)
      expect(dao.queryAll()).toStrictEqual([])
    })

    it("two reads without a write hit the store once", () => {
      const dao = makeDao()
      dao.insert(users.ada())
      const read = vi.spyOn(store, "queryAll")

      const first = dao.queryAll()
      const second = dao.queryAll()

      expect(read).toHaveBeenCalledOnce()
      expect(second).toStrictEqual(first)
      expect(second).not.toBe(first)
    })

    it("logs cache hits", () => {
      const dao = makeDao()
      dao.insert(users.ada())
      dao.queryAll()
      logger.clear()

      dao.queryAll()

      expect(logger.entries).toStrictEqual([
        {
          level: "debug",
          message: "Served from cache",
          fields: { module: "caching-dao", table: "user", operation: "queryAll", count: 1 },
        },
      ])
    })
  })

  describe("invalidation on write", () => {
    it("a read after a successful write never returns the pre-write entry", () => {
      const dao = makeDao()
      dao.insert(users.ada())
      expect(dao.queryAll()).toStrictEqual([users.ada()])

      dao.insert(users.grace())

      expect(dao.queryAll()).toStrictEqual([users.ada(), users.grace()])
    })

    it.each([
      ["insert", (dao: CachingDao<User, number>) => dao.insert(users.linus())],
      ["insertBatch", (dao: CachingDao<User, number>) => dao.insertBatch([users.linus()])],
      ["clearTable", (dao: CachingDao<User, number>) => dao.clearTable()],
      ["deleteById", (dao: CachingDao<User, number>) => dao.deleteById(1)],
    ])("%s clears the table's cached queries", (_name, write) => {
      const dao = makeDao()
      dao.insert(users.ada())
      dao.queryAll()
      expect(cacheStore.getCache("user", "queryAll")).toBeDefined()

      expect(write(dao)).toBe(true)

      expect(cacheStore.getCache("user", "queryAll")).toBeUndefined()
    })

    it("a batch invalidates exactly once and is then read in full", () => {
      const cache: Mock<CacheStore> = mock<CacheStore>()
      const dao = makeDao(true, cache)
      const batch = [users.ada(), users.grace(), users.linus()]

      expect(dao.insertBatch(batch)).toBe(true)
      expect(cache.clearByTable).toHaveBeenCalledExactlyOnceWith("user")

      expect(dao.queryAll()).toStrictEqual(batch)
      expect(cache.addCache).toHaveBeenCalledExactlyOnceWith("user", "queryAll", batch)
    })

    it("DAOs on the same table share invalidation", () => {
      const reader = makeDao()
      const writer = makeDao()
      reader.queryAll()

      writer.insert(users.ada())

      expect(reader.queryAll()).toStrictEqual([users.ada()])
    })

    it("writes to one table leave another table's entries alone", () => {
      const OrderType = defineRecordType(
        "Order",
        z.object({ id: z.number(), total: z.number() }),
        { tableName: "orders" },
      )
      cacheStore.addCache("orders", "queryAll", [{ id: 7, total: 12 }])

      makeDao().insert(users.ada())

      expect(OrderType.tableName).toBe("orders")
      expect(cacheStore.getCache("orders", "queryAll")).toBeDefined()
    })
  })

  describe("failed writes", () => {
    let cache: Mock<CacheStore>

    beforeEach(() => {
      cache = mock<CacheStore>()
    })

    it("a write the store rejects does not invalidate", () => {
      store.insert(users.ada())
      const dao = makeDao(true, cache)

      expect(dao.insert(users.ada())).toBe(false)
      expect(dao.insertBatch([users.grace(), users.grace()])).toBe(false)
      expect(dao.deleteById(42)).toBe(false)

      expect(cache.clearByTable).not.toHaveBeenCalled()
    })

    it("a rejected write may leave the pre-write cached value in place", () => {
      const dao = makeDao()
      dao.insert(users.ada())
      dao.queryAll()

      store.insert(users.grace())
      expect(dao.deleteById(42)).toBe(false)

      expect(dao.queryAll()).toStrictEqual([users.ada()])
    })

    it("a store that throws propagates the error and leaves the cache alone", () => {
      const dao = makeDao(true, cache)
      vi.spyOn(store, "insert").mockImplementation(() => {
        throw new Error("disk full")
      })

      expect(() => dao.insert(users.ada())).toThrow("disk full")
      expect(cache.clearByTable).not.toHaveBeenCalled()
    })
  })

  describe("caching disabled", () => {
    it("every read goes to the store and nothing is cached", () => {
      const dao = makeDao(false)
      dao.insert(users.ada())
      const read = vi.spyOn(store, "queryAll")

      expect(dao.queryAll()).toStrictEqual([users.ada()])
      expect(dao.queryAll()).toStrictEqual([users.ada()])

      expect(read).toHaveBeenCalledTimes(2)
      expect(cacheStore.size).toBe(0)
    })

    it("ignores an entry another DAO cached", () => {
      cacheStore.addCache("user", "queryAll", [users.linus()])

      expect(makeDao(false).queryAll()).toStrictEqual([])
    })

    it("writes still invalidate", () => {
      cacheStore.addCache("user", "queryAll", [])

      makeDao(false).insert(users.ada())

      expect(cacheStore.getCache("user", "queryAll")).toBeUndefined()
    })
  })

  describe("cache hits", () => {
    it("return fields the schema does not declare", () => {
      const NoteType = defineRecordType("Note", z.object({ id: z.number(), name: z.string() }))
      const notes = new MemoryRecordStore<{ id: number; name: string }, number>({
        idOf: (note) => note.id,
      })
      const dao = new CachingDao(
        { store: notes, cacheStore, recordType: NoteType, logger },
        { cacheEnabled: true },
      )
      const note = { id: 1, name: "a", note: "kept" }
      dao.insert(note)

      const miss = dao.queryAll()
      const hit = dao.queryAll()

      expect(miss).toStrictEqual([note])
      expect(hit).toStrictEqual(miss)
    })

    it("return stored values, not the schema's transformed output", () => {
      const TagType = defineRecordType(
        "Tag",
        z.object({ id: z.number(), label: z.string().transform((s) => s.toUpperCase()) }),
      )
      const tags = new MemoryRecordStore<{ id: number; label: string }, number>({
        idOf: (tag) => tag.id,
      })
      const dao = new CachingDao(
        { store: tags, cacheStore, recordType: TagType, logger },
        { cacheEnabled: true },
      )
      dao.insert({ id: 1, label: "draft" })

      dao.queryAll()

      expect(dao.queryAll()).toStrictEqual([{ id: 1, label: "draft" }])
      expect(logger.entries.filter((e) => e.level === "warn")).toStrictEqual([])
    })
  })

  describe("unreadable cache entries", () => {
    it("an entry that fails schema validation is a miss", () => {
      cacheStore.addCache("user", "queryAll", [{ id: "not-a-number", name: "x" }])
      store.insert(users.ada())
      const dao = makeDao()

      expect(dao.queryAll()).toStrictEqual([users.ada()])

      const warnings = logger.entries.filter((e) => e.level === "warn")
      expect(warnings).toHaveLength(1)
      expect(warnings[0]?.message).toBe("Ignoring unreadable cache entry")
      expect(warnings[0]?.fields).toMatchObject({
        module: "caching-dao",
        table: "user",
        operation: "queryAll",
      })

      const err = warnings[0]?.fields.err
      expect(err).toBeInstanceOf(CacheError)
      expect(err).toMatchObject({ code: "cache_decode_failed" })
    })

    it("an entry that cannot be deserialized is a miss and is replaced", () => {
      const cache = mock<CacheStore>()
      cache.getCache.mockReturnValue("{not json")
      store.insert(users.ada())
      const dao = makeDao(true, cache)

      expect(dao.queryAll()).toStrictEqual([users.ada()])
      expect(cache.addCache).toHaveBeenCalledExactlyOnceWith("user", "queryAll", [users.ada()])
    })
  })
})

import { BaseError, serializeError } from "@tablecache/errors"
import { CacheError } from "../cache-error"

describe("CacheError", () => {
  it("encodeFailed carries code, key context and cause", () => {
    const cause = new TypeError("Converting circular structure to JSON")

    const err = CacheError.encodeFailed("users", "queryAll", cause)

    expect(err).toBeInstanceOf(BaseError)
    expect(err.name).toBe("CacheError")
    expect(err.code).toBe("cache_encode_failed")
    expect(err.context).toStrictEqual({ table: "users", operation: "queryAll" })
    expect(err.cause).toBe(cause)
    expect(err.isOperational).toBe(true)
  })

  it("decodeFailed serializes with its cause", () => {
    const err = CacheError.decodeFailed("orders", "queryAll", new Error("bad payload"))

    expect(serializeError(err)).toMatchObject({
      name: "CacheError",
      code: "cache_decode_failed",
      message: "Failed to decode cache entry",
      context: { table: "orders", operation: "queryAll" },
      cause: { name: "Error", code: "unknown", message: "bad payload" },
    })
  })
})

import superjson from "superjson"
import type { CachePayload, CacheSerializer } from "../../ports/cache-serializer"

/**
 * JSON payloads that round-trip `Date`, `Map`, `Set`, `BigInt` and
 * `undefined` fields, which plain JSON would flatten or drop.
 */
export class SuperjsonSerializer implements CacheSerializer {
  serialize(value: unknown): CachePayload {
    return superjson.stringify(value)
  }

  deserialize(payload: CachePayload): unknown {
    return superjson.parse<unknown>(payload)
  }
}

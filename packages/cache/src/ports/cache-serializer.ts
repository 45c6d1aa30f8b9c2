/**
 * Serialized form of a cached query result.
 *
 * Opaque to the cache store; only the serializer that produced it can read it.
 */
export type CachePayload = string

/**
 * Converts query results to and from {@link CachePayload}.
 *
 * @remarks
 * Both directions may throw. Callers treat a throw as "nothing cached" and
 * never surface it to the code that asked for the data.
 */
export interface CacheSerializer {
  serialize(value: unknown): CachePayload
  deserialize(payload: CachePayload): unknown
}

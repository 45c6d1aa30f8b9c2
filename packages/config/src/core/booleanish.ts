import { z } from "zod"

const TRUE_VALUES = new Set(["true", "1", "yes", "on"])
const FALSE_VALUES = new Set(["false", "0", "no", "off"])

/**
 * Boolean read from an environment string.
 *
 * `z.coerce.boolean()` treats any non-empty string (including "false") as
 * `true`, so env flags go through this instead. A blank value, such as
 * `TABLECACHE_CACHE_ENABLED=` left in a .env template, counts as unset.
 */
export function booleanish(defaultValue: boolean) {
  return z
    .union([z.boolean(), z.string()])
    .default(defaultValue)
    .transform((value, ctx): boolean => {
      if (typeof value === "boolean") return value

      const normalized = value.trim().toLowerCase()
      if (normalized === "") return defaultValue
      if (TRUE_VALUES.has(normalized)) return true
      if (FALSE_VALUES.has(normalized)) return false

      ctx.addIssue({
        code: "custom",
        message: `Expected a boolean flag, received "${value}"`,
      })

      return z.NEVER
    })
}

import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { z } from "zod"
import { DotenvSource } from "../../adapters/dotenv/dotenv-source"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { ConfigError } from "../config-error"
import { loadConfig } from "../load"

describe("loadConfig e2e", () => {
  let cwd: string

  const schema = z.object({
    MAX_ENTRIES: z.coerce.number().default(1000),
    LOG_LEVEL: z.enum(["debug", "info", "warn"]).default("info"),
  })

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "tablecache-load-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("applies schema defaults when no source provides a key", async () => {
    const config = await loadConfig({ schema, sources: [new EnvSource({ env: {} })] })

    expect(config.value).toEqual({ MAX_ENTRIES: 1000, LOG_LEVEL: "info" })
    expect(config.explain("MAX_ENTRIES")).toBe("default")
  })

  it("later sources override earlier ones", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "MAX_ENTRIES=50\nLOG_LEVEL=warn")

    const config = await loadConfig({
      schema,
      sources: [
        new DotenvSource({ file: ".env", required: true, cwd }),
        new EnvSource({ env: { MAX_ENTRIES: "75" } }),
      ],
    })

    expect(config.value).toEqual({ MAX_ENTRIES: 75, LOG_LEVEL: "warn" })
    expect(config.explain("MAX_ENTRIES")).toBe("env")
    expect(config.explain("LOG_LEVEL")).toBe("dotenv:.env")
    expect(config.sourcesUsed()).toEqual(["env", "dotenv:.env"])
  })

  it("undefined values do not override defined values", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new ObjectSource({ MAX_ENTRIES: "10" }),
        new EnvSource({ env: { MAX_ENTRIES: undefined } }),
      ],
    })

    expect(config.value.MAX_ENTRIES).toBe(10)
    expect(config.explain("MAX_ENTRIES")).toBe("object:overrides")
  })

  it("reports unknown keys", async () => {
    const config = await loadConfig({
      schema,
      sources: [new ObjectSource({ MAX_ENTRY: "10" })],
    })

    expect(config.unknownKeys()).toEqual(["MAX_ENTRY"])
  })

  it("throws with a readable message when validation fails", async () => {
    const load = loadConfig({
      schema,
      sources: [new ObjectSource({ LOG_LEVEL: "loud" })],
    })

    await expect(load).rejects.toThrow(/Configuration validation failed/)
  })

  it("fails with a config_invalid ConfigError naming the keys and sources", async () => {
    const err = await loadConfig({
      schema,
      sources: [new ObjectSource({ LOG_LEVEL: "loud", MAX_ENTRIES: "lots" }, "object:test")],
    }).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ConfigError)
    expect(err).toMatchObject({
      code: "config_invalid",
      isOperational: false,
      context: { sources: ["object:test"], keys: ["MAX_ENTRIES", "LOG_LEVEL"] },
    })
  })
})

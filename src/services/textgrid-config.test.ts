import { ConfigProvider, Effect, Either, Layer } from "effect"
import { afterEach, beforeEach, describe, expect, test } from "vitest"
import { TextGridConfig, TextGridConfigLayer, loadTextGridConfig, textGridConfig } from "./textgrid-config"

const keys = ["TEXTGRID_DIALECT", "TEXTGRID_CHECK_CONSISTENCY"] as const
const original = keys.map(key => [key, process.env[key]] as const)

beforeEach(() => {
  for (const key of keys) delete process.env[key]
})

afterEach(() => {
  for (const [key, value] of original) {
    if (value === undefined) delete process.env[key]
    else process.env[key] = value
  }
})

const fromEntries = (entries: ReadonlyArray<readonly [string, string]>) =>
  Layer.setConfigProvider(ConfigProvider.fromMap(new Map(entries)))

describe("loadTextGridConfig", () => {
  test("falls back to the built-in defaults", () => {
    expect(loadTextGridConfig()).toEqual({ dialect: "full", checkConsistency: true })
  })

  test("reads the environment", () => {
    process.env.TEXTGRID_DIALECT = "minimal"
    process.env.TEXTGRID_CHECK_CONSISTENCY = "false"
    expect(loadTextGridConfig()).toEqual({ dialect: "minimal", checkConsistency: false })
  })
})

describe("textGridConfig", () => {
  test("rejects an unknown dialect", () => {
    const result = Effect.runSync(
      Effect.either(
        textGridConfig.pipe(
          Effect.provide(
            fromEntries([
              ["TEXTGRID_DIALECT", "xml"],
              ["TEXTGRID_CHECK_CONSISTENCY", "true"],
            ]),
          ),
        ),
      ),
    )
    expect(Either.isLeft(result)).toBe(true)
  })

  test("reads values from any provider", () => {
    const config = Effect.runSync(
      textGridConfig.pipe(
        Effect.provide(
          fromEntries([
            ["TEXTGRID_DIALECT", "minimal"],
            ["TEXTGRID_CHECK_CONSISTENCY", "false"],
          ]),
        ),
      ),
    )
    expect(config).toEqual({ dialect: "minimal", checkConsistency: false })
  })

  test("provides TextGridConfig through its layer", () => {
    process.env.TEXTGRID_DIALECT = "minimal"
    const config = Effect.runSync(TextGridConfig.pipe(Effect.provide(TextGridConfigLayer)))
    expect(config).toEqual({ dialect: "minimal", checkConsistency: true })
  })
})

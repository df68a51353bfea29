import { Config, Context, Effect, Layer } from "effect"
import type { TextGridDialect } from "@/lib/textgrid/types"
import { AppConfigProviderLive } from "./config-provider"

export interface TextGridConfigValues {
  readonly dialect: TextGridDialect
  readonly checkConsistency: boolean
}

export class TextGridConfig extends Context.Tag("TextGridConfig")<
  TextGridConfig,
  TextGridConfigValues
>() {}

export const textGridConfig = Config.all({
  dialect: Config.literal("full", "minimal")("TEXTGRID_DIALECT"),
  checkConsistency: Config.boolean("TEXTGRID_CHECK_CONSISTENCY"),
})

/** Debug logging switch, read by the TextGrid logger on every call */
export const textGridDebugFlag = Config.boolean("TEXTGRID_DEBUG")

export const TextGridConfigLive = Layer.effect(TextGridConfig, textGridConfig)

export const TextGridConfigLayer = TextGridConfigLive.pipe(Layer.provide(AppConfigProviderLive))

export const loadTextGridConfig = (): TextGridConfigValues =>
  Effect.runSync(textGridConfig.pipe(Effect.provide(AppConfigProviderLive)))

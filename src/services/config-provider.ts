import { ConfigProvider, Layer } from "effect"

const defaultEnvEntries = [
  ["TEXTGRID_DIALECT", "full"],
  ["TEXTGRID_CHECK_CONSISTENCY", "true"],
  ["TEXTGRID_DEBUG", "false"],
] as const

const defaultEnvProvider = ConfigProvider.fromMap(new Map<string, string>(defaultEnvEntries))

export const AppConfigProvider = ConfigProvider.orElse(ConfigProvider.fromEnv(), () =>
  defaultEnvProvider,
)

export const AppConfigProviderLive = Layer.setConfigProvider(AppConfigProvider)

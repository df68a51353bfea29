export { AppConfigProvider, AppConfigProviderLive } from "./config-provider"
export {
  TextGridConfig,
  TextGridConfigLayer,
  TextGridConfigLive,
  type TextGridConfigValues,
  loadTextGridConfig,
  textGridConfig,
  textGridDebugFlag,
} from "./textgrid-config"

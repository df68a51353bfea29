// Library exports

export * from "./textgrid"

export {
  TextGridConfig,
  TextGridConfigLayer,
  type TextGridConfigValues,
  loadTextGridConfig,
} from "@/services"

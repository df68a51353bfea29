import { AppConfigProviderLive } from "@/services/config-provider"
import { textGridDebugFlag } from "@/services/textgrid-config"
import { Effect } from "effect"

/** TEXTGRID_DEBUG, read on every call; an unparsable value counts as off */
export function isTextGridDebugEnabled(): boolean {
  return Effect.runSync(
    textGridDebugFlag.pipe(
      Effect.provide(AppConfigProviderLive),
      Effect.orElseSucceed(() => false),
    ),
  )
}

function formatLine(category: string, message: string, data?: Record<string, unknown>): string {
  const timestamp = new Date().toISOString().substring(11, 23)
  const dataStr = data ? ` ${JSON.stringify(data)}` : ""
  return `[TextGrid ${timestamp}] [${category}] ${message}${dataStr}`
}

export function textgridLog(category: string, message: string, data?: Record<string, unknown>): void {
  if (!isTextGridDebugEnabled()) return
  console.log(formatLine(category, message, data))
}

/** Document oddities worth surfacing even with debug logging off */
export function textgridWarn(category: string, message: string, data?: Record<string, unknown>): void {
  console.warn(formatLine(category, message, data))
}

export function formatErrorForLog(error: unknown): string {
  if (error instanceof Error) {
    const name = "_tag" in error && typeof error._tag === "string" ? error._tag : error.name
    return `${name}: ${error.message}`
  }
  try {
    return JSON.stringify(error)
  } catch {
    return String(error)
  }
}

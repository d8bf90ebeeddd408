import { Config } from '../config/env'

const PREFIX = '[hexdump]'

/**
 * 调试日志，写入 stderr，仅在 DEBUG 打开时输出。
 */
export const debugLog = (message: string, ...details: unknown[]) => {
  if (!Config.DEBUG) return
  console.error(PREFIX, message, ...details)
}

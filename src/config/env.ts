export interface HexdumpConfig {
  DEBUG: boolean
  HEXDUMP_MAX_BYTES: number | undefined
}

const truthy = new Set(['1', 'true', 'yes', 'on'])

export const readBool = (value: string | undefined): boolean => {
  if (!value) return false
  return truthy.has(value.toLowerCase())
}

/**
 * 读取非负整数；缺省或非法时返回 undefined。
 */
export const readCount = (value: string | undefined): number | undefined => {
  if (!value || !/^\d+$/.test(value.trim())) return undefined
  const count = Number(value.trim())
  return Number.isSafeInteger(count) ? count : undefined
}

/**
 * 环境变量开关，仅在加载时读取一次。
 * 格式化核心不读取这些配置，块长与分段长度固定。
 */
export const Config: HexdumpConfig = {
  DEBUG: readBool(process.env.DEBUG),
  HEXDUMP_MAX_BYTES: readCount(process.env.HEXDUMP_MAX_BYTES),
}

export const isPrintable = (byte: number): boolean => {
  const value = byte & 0xff
  return value >= 0x20 && value < 0x7f
}

/**
 * 将字节转换为可安全输出的字符。
 *
 * 可打印 ASCII（0x20 空格到 0x7e `~`）原样返回，其余字节返回 `.`。
 * 参数只取低 8 位。
 */
export const sanitizeByte = (byte: number): string =>
  isPrintable(byte) ? String.fromCharCode(byte & 0xff) : '.'

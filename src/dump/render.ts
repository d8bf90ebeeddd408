import {
  CHUNK_LENGTH,
  HEX_FIELD_WIDTH,
  OFFSET_COLUMN,
  OFFSET_WIDTH,
  SEGMENT_LENGTH,
  hexWidth,
} from './constants'
import { Line } from './line'
import { LineBuffer } from './line-buffer'
import { sanitizeByte } from './sanitize'

/**
 * 渲染一个块（最多 16 字节）为一行。
 *
 * 布局：`|` 十六进制分段 `| ` 补齐 ASCII 补齐 ` ` 偏移量。
 * 短块用空格补齐，保证各列与满行对齐。
 */
export const renderChunk = (index: number, chunk: Uint8Array): Line => {
  if (chunk.length > CHUNK_LENGTH) {
    throw new RangeError(`块长度超出上限: ${chunk.length} > ${CHUNK_LENGTH}`)
  }

  const buf = new LineBuffer()
  buf.write('|')
  for (let start = 0; start < chunk.length; start += SEGMENT_LENGTH) {
    if (start > 0) buf.write(' ')
    for (const byte of chunk.subarray(start, start + SEGMENT_LENGTH)) {
      buf.writeHex(byte, 2)
    }
  }
  buf.write('| ')
  buf.pad(HEX_FIELD_WIDTH - hexWidth(chunk.length))

  for (const byte of chunk) {
    buf.write(sanitizeByte(byte))
  }
  buf.pad(CHUNK_LENGTH - chunk.length)

  buf.write(' ')
  buf.writeHex(index * CHUNK_LENGTH, OFFSET_WIDTH)
  return buf.toLine()
}

/**
 * 渲染结尾的总长度行，长度值与块行的偏移量列对齐。
 */
export const renderSummary = (length: number): Line => {
  const buf = new LineBuffer()
  buf.pad(OFFSET_COLUMN)
  buf.writeHex(length, OFFSET_WIDTH)
  return buf.toLine()
}

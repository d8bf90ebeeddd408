/** 每个分段的字节数，控制十六进制字段的空格分组。 */
export const SEGMENT_LENGTH = 4

/** 每行的字节数，需为 SEGMENT_LENGTH 的整数倍。 */
export const CHUNK_LENGTH = 16

export const SEGMENTS_PER_CHUNK = Math.ceil(CHUNK_LENGTH / SEGMENT_LENGTH)

/** 满行十六进制字段宽度（不含两侧的 `|`）。 */
export const HEX_FIELD_WIDTH = CHUNK_LENGTH * 2 + (SEGMENTS_PER_CHUNK - 1)

/** 偏移量所在列：`|` + 十六进制字段 + `| ` + ASCII 字段 + 空格。 */
export const OFFSET_COLUMN = 1 + HEX_FIELD_WIDTH + 2 + CHUNK_LENGTH + 1

export const OFFSET_WIDTH = 8

export const LINE_WIDTH = OFFSET_COLUMN + OFFSET_WIDTH

export const LINE_CAPACITY = 64

/**
 * n 个字节实际占用的十六进制宽度（含分段间空格）。
 */
export const hexWidth = (byteCount: number): number => {
  const segments = Math.ceil(byteCount / SEGMENT_LENGTH)
  return byteCount * 2 + Math.max(segments - 1, 0)
}

import { CHUNK_LENGTH } from './constants'
import { Line } from './line'
import { renderChunk, renderSummary } from './render'

/**
 * hexdump 行序列。
 *
 * 惰性生成：每个 16 字节块一行，最后是一行总长度。
 * 可从两端交替取值（`next` / `nextBack`），每行恰好产出一次；
 * `length` 始终给出剩余行数。
 */
export class Hexdump implements IterableIterator<Line> {
  private readonly bytes: Uint8Array
  private front: number
  private back: number
  private summaryDone: boolean

  constructor(bytes: Uint8Array) {
    this.bytes = bytes
    this.front = 0
    this.back = Math.ceil(bytes.length / CHUNK_LENGTH)
    this.summaryDone = false
  }

  /**
   * 剩余行数 = 剩余块数 + 尚未产出的总长度行。
   */
  get length() {
    return this.back - this.front + (this.summaryDone ? 0 : 1)
  }

  next(): IteratorResult<Line> {
    if (this.front < this.back) {
      const line = this.chunkLine(this.front)
      this.front += 1
      return { done: false, value: line }
    }
    if (!this.summaryDone) {
      this.summaryDone = true
      return { done: false, value: renderSummary(this.bytes.length) }
    }
    return { done: true, value: undefined }
  }

  /**
   * 从尾部取下一行：先是总长度行，然后由后向前的块行。
   */
  nextBack(): IteratorResult<Line> {
    if (!this.summaryDone) {
      this.summaryDone = true
      return { done: false, value: renderSummary(this.bytes.length) }
    }
    if (this.front < this.back) {
      this.back -= 1
      return { done: false, value: this.chunkLine(this.back) }
    }
    return { done: true, value: undefined }
  }

  /**
   * 以逆序消费同一序列，与 `next` 共享游标。
   */
  *reversed(): IterableIterator<Line> {
    for (let result = this.nextBack(); !result.done; result = this.nextBack()) {
      yield result.value
    }
  }

  [Symbol.iterator](): IterableIterator<Line> {
    return this
  }

  private chunkLine(index: number): Line {
    const start = index * CHUNK_LENGTH
    return renderChunk(index, this.bytes.subarray(start, start + CHUNK_LENGTH))
  }
}

/**
 * 创建逐行产出的 hexdump 迭代器，不复制也不修改输入。
 */
export const hexdumpIter = (bytes: Uint8Array): Hexdump => new Hexdump(bytes)

/**
 * 将 hexdump 逐行输出，默认写入 stdout。
 */
export const hexdump = (bytes: Uint8Array, log: (line: string) => void = console.log) => {
  for (const line of hexdumpIter(bytes)) {
    log(line.toString())
  }
}

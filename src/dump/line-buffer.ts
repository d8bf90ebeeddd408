import { LINE_CAPACITY } from './constants'
import { Line } from './line'

/**
 * 定长行缓冲区，容量固定，写满即视为格式不变量被破坏。
 */
export class LineBuffer {
  private readonly chars: string[]
  private readonly capacity: number
  private size: number

  constructor(capacity = LINE_CAPACITY) {
    this.chars = []
    this.capacity = capacity
    this.size = 0
  }

  get length() {
    return this.size
  }

  /**
   * 写入原始文本。
   */
  write(text: string): this {
    this.ensure(text.length)
    this.chars.push(text)
    this.size += text.length
    return this
  }

  /**
   * 写入固定宽度的小写十六进制数，不足补零。
   */
  writeHex(value: number, width: number): this {
    return this.write(value.toString(16).padStart(width, '0'))
  }

  /**
   * 写入 count 个空格；count 不大于 0 时不写入。
   */
  pad(count: number): this {
    if (count <= 0) return this
    return this.write(' '.repeat(count))
  }

  toLine(): Line {
    return new Line(this.chars.join(''))
  }

  private ensure(count: number) {
    if (this.size + count > this.capacity) {
      throw new RangeError(`行缓冲区溢出: 需要 ${this.size + count}，容量 ${this.capacity}`)
    }
  }
}

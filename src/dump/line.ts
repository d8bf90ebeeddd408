/**
 * 一行 hexdump 输出。
 *
 * 创建后不可变，不持有输入缓冲区的引用。
 */
export class Line {
  private readonly text: string

  constructor(text: string) {
    this.text = text
  }

  get length() {
    return this.text.length
  }

  toString(): string {
    return this.text
  }
}

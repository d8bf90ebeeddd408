import assert from 'node:assert/strict'
import { describe, it } from 'node:test'

import fc from 'fast-check'

import { CHUNK_LENGTH, LINE_WIDTH } from '../constants'
import { hexdumpIter } from '../hexdump'
import { isPrintable } from '../sanitize'

const FC_NUM_RUNS = process.env.FC_NUM_RUNS ? Number(process.env.FC_NUM_RUNS) : process.env.CI ? 200 : 500

const bytesArb = fc.uint8Array({ maxLength: 200 })

const render = (bytes: Uint8Array) => Array.from(hexdumpIter(bytes), line => line.toString())

describe('hexdump (property)', () => {
  it('every line has the same width', () => {
    fc.assert(
      fc.property(bytesArb, bytes => {
        for (const line of render(bytes)) {
          assert.equal(line.length, LINE_WIDTH)
        }
      }),
      { numRuns: FC_NUM_RUNS },
    )
  })

  it('output holds printable ascii only', () => {
    fc.assert(
      fc.property(bytesArb, bytes => {
        for (const line of render(bytes)) {
          for (let i = 0; i < line.length; i += 1) {
            assert.ok(isPrintable(line.charCodeAt(i)), `control char at ${i}: ${JSON.stringify(line)}`)
          }
        }
      }),
      { numRuns: FC_NUM_RUNS },
    )
  })

  it('summary line reads back the input length', () => {
    fc.assert(
      fc.property(bytesArb, bytes => {
        const out = render(bytes)
        const summary = out[out.length - 1] ?? ''
        assert.equal(parseInt(summary.trim(), 16), bytes.length)
      }),
      { numRuns: FC_NUM_RUNS },
    )
  })

  it('printable input characters appear in the output', () => {
    fc.assert(
      fc.property(bytesArb, bytes => {
        const printed = new Set(render(bytes).join(''))
        for (const byte of bytes) {
          if (isPrintable(byte)) assert.ok(printed.has(String.fromCharCode(byte)))
        }
      }),
      { numRuns: FC_NUM_RUNS },
    )
  })

  it('line count is chunk count plus one', () => {
    fc.assert(
      fc.property(bytesArb, bytes => {
        const expected = Math.ceil(bytes.length / CHUNK_LENGTH) + 1
        assert.equal(hexdumpIter(bytes).length, expected)
        assert.equal(render(bytes).length, expected)
      }),
      { numRuns: FC_NUM_RUNS },
    )
  })

  it('pulling from both ends yields each line once', () => {
    fc.assert(
      fc.property(bytesArb, fc.array(fc.boolean(), { minLength: 1, maxLength: 16 }), (bytes, pattern) => {
        const iter = hexdumpIter(bytes)
        const front: string[] = []
        const back: string[] = []
        for (let step = 0; iter.length > 0; step += 1) {
          const fromBack = pattern[step % pattern.length] ?? false
          const result = fromBack ? iter.nextBack() : iter.next()
          if (result.done) return assert.fail('dump ended while length > 0')
          ;(fromBack ? back : front).push(result.value.toString())
        }
        assert.equal(iter.next().done, true)
        assert.equal(iter.nextBack().done, true)
        assert.deepEqual([...front, ...back.reverse()], render(bytes))
      }),
      { numRuns: FC_NUM_RUNS },
    )
  })
})

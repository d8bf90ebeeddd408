export { Hexdump, hexdump, hexdumpIter } from './dump/hexdump'
export { Line } from './dump/line'
export { renderChunk, renderSummary } from './dump/render'
export { isPrintable, sanitizeByte } from './dump/sanitize'
export {
  CHUNK_LENGTH,
  LINE_WIDTH,
  SEGMENT_LENGTH,
} from './dump/constants'

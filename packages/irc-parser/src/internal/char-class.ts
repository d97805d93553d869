import { ByteFlag } from '../types'
import { ASCII_CODES, ASCII_RANGE } from './byte-constants'

export interface ByteRange {
  readonly start: number
  readonly end: number
  readonly flag: ByteFlag
}

const single = (code: number, flag: ByteFlag): ByteRange => ({
  start: code,
  end: code,
  flag,
})

export const BYTE_RANGES: ReadonlyArray<ByteRange> = [
  {
    start: ASCII_RANGE.C0_MIN,
    end: ASCII_RANGE.C0_MAX,
    flag: ByteFlag.Control,
  },
  single(ASCII_CODES.DELETE, ByteFlag.Control),
  single(ASCII_CODES.NUL, ByteFlag.Nul),
  single(ASCII_CODES.CARRIAGE_RETURN, ByteFlag.CarriageReturn),
  single(ASCII_CODES.LINE_FEED, ByteFlag.LineFeed),
  single(ASCII_CODES.SPACE, ByteFlag.Space),
  single(ASCII_CODES.COLON, ByteFlag.Colon),
  single(ASCII_CODES.EXCLAMATION, ByteFlag.Exclamation),
  single(ASCII_CODES.AT, ByteFlag.At),
]

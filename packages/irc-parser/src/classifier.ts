import { BYTE_RANGES } from './internal/char-class'
import { ByteFlag } from './types'

/**
 * Determine the classes of a byte for the message grammar. Bytes that fall in
 * no range are ordinary token bytes; that includes every byte >= 0x80, so
 * UTF-8 payloads pass through untouched.
 */
export const classifyByte = (value: number): ByteFlag => {
  let flags = ByteFlag.None
  for (const spec of BYTE_RANGES) {
    if (value >= spec.start && value <= spec.end) {
      flags |= spec.flag
    }
  }
  return flags === ByteFlag.None ? ByteFlag.Token : flags
}

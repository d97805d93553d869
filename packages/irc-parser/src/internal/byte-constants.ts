export const ASCII_CODES = {
  NUL: 0x00,
  LINE_FEED: 0x0a,
  CARRIAGE_RETURN: 0x0d,
  SPACE: 0x20,
  EXCLAMATION: 0x21,
  COLON: 0x3a,
  AT: 0x40,
  DELETE: 0x7f,
} as const

export const ASCII_RANGE = {
  C0_MIN: 0x00,
  C0_MAX: 0x1f,
} as const

export const TERMINATOR = [
  ASCII_CODES.CARRIAGE_RETURN,
  ASCII_CODES.LINE_FEED,
] as const

export const DEFAULT_MAX_LINE_LENGTH = 512

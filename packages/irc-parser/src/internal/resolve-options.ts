import { IrcParserConfigError } from '../errors'
import type { ParserOptions, ResolvedParserOptions } from '../types'
import { DEFAULT_MAX_LINE_LENGTH } from './byte-constants'

export const DEFAULT_OPTIONS: ResolvedParserOptions = {
  maxLineLength: DEFAULT_MAX_LINE_LENGTH,
  diagnostics: null,
  clock: () => Date.now(),
}

const resolveMaxLineLength = (value: number | undefined): number => {
  if (value === undefined) {
    return DEFAULT_OPTIONS.maxLineLength
  }
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new IrcParserConfigError(
      `maxLineLength must be a positive integer, received ${String(value)}`,
    )
  }
  return value
}

export const resolveParserOptions = (
  options: ParserOptions = {},
): ResolvedParserOptions => ({
  maxLineLength: resolveMaxLineLength(options.maxLineLength),
  diagnostics: options.diagnostics ?? DEFAULT_OPTIONS.diagnostics,
  clock: options.clock ?? DEFAULT_OPTIONS.clock,
})

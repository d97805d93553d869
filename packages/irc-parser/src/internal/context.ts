import { ParserErrorKind, type ParserCallbacks, ParserState } from '../types'
import { TERMINATOR } from './byte-constants'

/**
 * Low-level mutable tokenizer state. Everything needed to resume in the
 * middle of a message lives here, so a chunk boundary can fall on any byte.
 */
export interface ParserContext {
  state: ParserState
  error: ParserErrorKind
  /** Message bytes accumulated so far, terminator excluded. */
  length: number
  /** Previously examined byte, or -1 when none. */
  last: number
  /** Offset into `raw` where the token in progress starts. */
  tokenStart: number
  readonly raw: Uint8Array
  readonly callbacks: ParserCallbacks
}

export const createRawStorage = (maxLineLength: number): Uint8Array =>
  new Uint8Array(maxLineLength + TERMINATOR.length + 1)

export const createInitialContext = (maxLineLength: number): ParserContext => ({
  state: ParserState.Init,
  error: ParserErrorKind.None,
  length: 0,
  last: -1,
  tokenStart: 0,
  raw: createRawStorage(maxLineLength),
  callbacks: {
    nick: null,
    name: null,
    host: null,
    command: null,
    param: null,
    end: null,
  },
})

/**
 * Clear parsing progress while keeping the bound callbacks.
 */
export const resetContext = (context: ParserContext): void => {
  context.state = ParserState.Init
  context.error = ParserErrorKind.None
  context.length = 0
  context.last = -1
  context.tokenStart = 0
  context.raw.fill(0)
}

/**
 * Drop the finished message after its terminator and re-arm for the next one.
 * Unlike `resetContext` the error slot is untouched; it is already `None`.
 */
export const rearmContext = (context: ParserContext): void => {
  context.state = ParserState.Init
  context.length = 0
  context.tokenStart = 0
}

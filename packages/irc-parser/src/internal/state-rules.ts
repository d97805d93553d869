import {
  ByteFlag,
  ParserErrorKind,
  ParserState,
  type TokenCategory,
} from '../types'

export const BYTE_TABLE_SIZE = 256

/**
 * Position of the byte being examined within the current `execute()` call.
 * `messageBase` is the chunk index that lines up with `raw[0]`; it is negative
 * while the message in progress started in an earlier chunk.
 */
export interface ChunkCursor {
  readonly data: Uint8Array
  index: number
  messageBase: number
}

export type ByteHandler = (byte: number, cursor: ChunkCursor) => void
export type ByteRulePredicate = (byte: number, flags: ByteFlag) => boolean

export interface ByteRule {
  readonly predicate: ByteRulePredicate
  readonly handler: ByteHandler
}

export interface StateRuleSpec {
  readonly fallback: ByteHandler
  readonly rules: ReadonlyArray<ByteRule>
}

export type StateRuleSpecMap = Record<ParserState, StateRuleSpec>

export interface StateRuleRuntime {
  readonly noop: ByteHandler
  setState(state: ParserState): void
  getTokenLength(): number
  /** The token in progress starts at the byte being examined. */
  startToken(): void
  /** The token in progress starts right after the byte being examined. */
  startTokenAfter(): void
  /** Hands the token in progress to its sink; false when the sink aborted. */
  emitToken(category: TokenCategory, cursor: ChunkCursor): boolean
  beginTerminator(byte: number): void
  isTerminatorPending(): boolean
  completeMessage(byte: number, cursor: ChunkCursor): void
  fail(kind: ParserErrorKind, cursor: ChunkCursor): void
  dispatchStateByte(state: ParserState, byte: number, cursor: ChunkCursor): void
}

export const matchFlag =
  (flag: ByteFlag): ByteRulePredicate =>
  (_byte, flags) =>
    (flags & flag) !== 0

export const createStateRuleSpecs = (
  runtime: StateRuleRuntime,
): StateRuleSpecMap => ({
  [ParserState.Init]: createInitSpec(runtime),
  [ParserState.Nick]: createPrefixSegmentSpec(runtime, 'nick', [
    { flag: ByteFlag.Exclamation, next: ParserState.Name },
    { flag: ByteFlag.At, next: ParserState.Host },
  ]),
  [ParserState.Name]: createPrefixSegmentSpec(runtime, 'name', [
    { flag: ByteFlag.At, next: ParserState.Host },
  ]),
  [ParserState.Host]: createPrefixSegmentSpec(runtime, 'host', []),
  [ParserState.Command]: createCommandSpec(runtime),
  [ParserState.Params]: createParamsSpec(runtime),
  [ParserState.Trailing]: createTrailingSpec(runtime),
  [ParserState.End]: createEndSpec(runtime),
  [ParserState.Error]: createErrorSpec(runtime),
})

const rejectWith =
  (runtime: StateRuleRuntime, kind: ParserErrorKind): ByteHandler =>
  (_byte, cursor) => {
    runtime.fail(kind, cursor)
  }

/**
 * Closes the current token on a delimiter. Empty tokens are grammar
 * violations everywhere this is used.
 */
const closeToken = (
  runtime: StateRuleRuntime,
  category: TokenCategory,
  cursor: ChunkCursor,
): boolean => {
  if (runtime.getTokenLength() === 0) {
    runtime.fail(ParserErrorKind.Parse, cursor)
    return false
  }
  return runtime.emitToken(category, cursor)
}

const createInitSpec = (runtime: StateRuleRuntime): StateRuleSpec => {
  const enterPrefix: ByteHandler = () => {
    runtime.startTokenAfter()
    runtime.setState(ParserState.Nick)
  }

  // No prefix: the byte is the first byte of the command.
  const enterCommand: ByteHandler = (byte, cursor) => {
    runtime.startToken()
    runtime.setState(ParserState.Command)
    runtime.dispatchStateByte(ParserState.Command, byte, cursor)
  }

  return {
    fallback: enterCommand,
    rules: [{ predicate: matchFlag(ByteFlag.Colon), handler: enterPrefix }],
  }
}

interface SegmentTransition {
  readonly flag: ByteFlag
  readonly next: ParserState
}

const createPrefixSegmentSpec = (
  runtime: StateRuleRuntime,
  category: TokenCategory,
  transitions: ReadonlyArray<SegmentTransition>,
): StateRuleSpec => {
  const advanceTo =
    (next: ParserState): ByteHandler =>
    (_byte, cursor) => {
      if (!closeToken(runtime, category, cursor)) {
        return
      }
      runtime.startTokenAfter()
      runtime.setState(next)
    }

  const rules: ByteRule[] = [
    ...transitions.map((transition) => ({
      predicate: matchFlag(transition.flag),
      handler: advanceTo(transition.next),
    })),
    {
      predicate: matchFlag(ByteFlag.Space),
      handler: advanceTo(ParserState.Command),
    },
    {
      predicate: matchFlag(ByteFlag.Control),
      handler: rejectWith(runtime, ParserErrorKind.Parse),
    },
  ]

  return { fallback: runtime.noop, rules }
}

const createCommandSpec = (runtime: StateRuleRuntime): StateRuleSpec => {
  const enterParams: ByteHandler = (_byte, cursor) => {
    if (!closeToken(runtime, 'command', cursor)) {
      return
    }
    runtime.startTokenAfter()
    runtime.setState(ParserState.Params)
  }

  const enterEnd: ByteHandler = (byte, cursor) => {
    if (!closeToken(runtime, 'command', cursor)) {
      return
    }
    runtime.beginTerminator(byte)
  }

  const rules: ByteRule[] = [
    { predicate: matchFlag(ByteFlag.Space), handler: enterParams },
    { predicate: matchFlag(ByteFlag.CarriageReturn), handler: enterEnd },
    {
      predicate: matchFlag(ByteFlag.Control),
      handler: rejectWith(runtime, ParserErrorKind.Parse),
    },
  ]

  return { fallback: runtime.noop, rules }
}

const createParamsSpec = (runtime: StateRuleRuntime): StateRuleSpec => {
  // Repeated spaces collapse: only a non-empty middle token is emitted.
  const separate: ByteHandler = (_byte, cursor) => {
    if (runtime.getTokenLength() > 0 && !runtime.emitToken('param', cursor)) {
      return
    }
    runtime.startTokenAfter()
  }

  const colon: ByteHandler = () => {
    if (runtime.getTokenLength() > 0) {
      return
    }
    runtime.startTokenAfter()
    runtime.setState(ParserState.Trailing)
  }

  const enterEnd: ByteHandler = (byte, cursor) => {
    if (runtime.getTokenLength() > 0 && !runtime.emitToken('param', cursor)) {
      return
    }
    runtime.beginTerminator(byte)
  }

  const rules: ByteRule[] = [
    { predicate: matchFlag(ByteFlag.Space), handler: separate },
    { predicate: matchFlag(ByteFlag.Colon), handler: colon },
    { predicate: matchFlag(ByteFlag.CarriageReturn), handler: enterEnd },
    {
      predicate: matchFlag(ByteFlag.Nul | ByteFlag.LineFeed),
      handler: rejectWith(runtime, ParserErrorKind.Parse),
    },
  ]

  return { fallback: runtime.noop, rules }
}

const createTrailingSpec = (runtime: StateRuleRuntime): StateRuleSpec => {
  // The trailing parameter is emitted even when empty (`TOPIC #chan :`).
  const enterEnd: ByteHandler = (byte, cursor) => {
    if (!runtime.emitToken('param', cursor)) {
      return
    }
    runtime.beginTerminator(byte)
  }

  const rules: ByteRule[] = [
    { predicate: matchFlag(ByteFlag.CarriageReturn), handler: enterEnd },
    {
      predicate: matchFlag(ByteFlag.Nul | ByteFlag.LineFeed),
      handler: rejectWith(runtime, ParserErrorKind.Parse),
    },
  ]

  return { fallback: runtime.noop, rules }
}

const createEndSpec = (runtime: StateRuleRuntime): StateRuleSpec => {
  const finish: ByteHandler = (byte, cursor) => {
    if (!runtime.isTerminatorPending()) {
      runtime.fail(ParserErrorKind.Parse, cursor)
      return
    }
    runtime.completeMessage(byte, cursor)
  }

  return {
    fallback: rejectWith(runtime, ParserErrorKind.Parse),
    rules: [{ predicate: matchFlag(ByteFlag.LineFeed), handler: finish }],
  }
}

const createErrorSpec = (runtime: StateRuleRuntime): StateRuleSpec => ({
  fallback: runtime.noop,
  rules: [],
})

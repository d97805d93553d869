import { classifyByte } from './classifier'
import { errorStringFor } from './errors'
import { ASCII_CODES } from './internal/byte-constants'
import {
  createInitialContext,
  type ParserContext,
  rearmContext,
  resetContext,
} from './internal/context'
import { resolveParserOptions } from './internal/resolve-options'
import {
  BYTE_TABLE_SIZE,
  type ByteHandler,
  type ChunkCursor,
  createStateRuleSpecs,
  type StateRuleRuntime,
  type StateRuleSpec,
} from './internal/state-rules'
import {
  type DiagnosticRecord,
  type EndCallback,
  type IrcParser,
  ParserErrorKind,
  type ParserOptions,
  ParserState,
  type ResolvedParserOptions,
  type TokenCallback,
  type TokenCategory,
} from './types'

const { CARRIAGE_RETURN } = ASCII_CODES

class ParserImpl implements IrcParser {
  private readonly context: ParserContext
  private readonly options: ResolvedParserOptions
  private readonly encoder = new TextEncoder()
  private readonly dispatchTable: Record<
    ParserState,
    ReadonlyArray<ByteHandler>
  >
  private readonly noopHandler: ByteHandler = () => {}

  constructor(options: ResolvedParserOptions) {
    this.options = options
    this.context = createInitialContext(options.maxLineLength)
    this.dispatchTable = this.buildDispatchTable()
  }

  get state(): ParserState {
    return this.context.state
  }

  get length(): number {
    return this.context.length
  }

  execute(input: Uint8Array | string): number {
    const data = typeof input === 'string' ? this.encoder.encode(input) : input
    const context = this.context

    if (context.state === ParserState.Error) {
      return 0
    }

    const cursor: ChunkCursor = {
      data,
      index: 0,
      messageBase: -context.length,
    }

    for (const [index, byte] of data.entries()) {
      cursor.index = index

      // CR belongs to the terminator and is never counted.
      const counted =
        context.state !== ParserState.End && byte !== CARRIAGE_RETURN
      if (counted && context.length >= this.options.maxLineLength) {
        this.fail(ParserErrorKind.Length, cursor)
        return index
      }

      this.dispatchStateByte(context.state, byte, cursor)

      if (this.hasError()) {
        return index
      }
      if (counted) {
        context.raw[context.length] = byte
        context.length += 1
      }
      context.last = byte
    }

    return data.length
  }

  reset(): void {
    const { state, length } = this.context
    resetContext(this.context)
    if (state !== ParserState.Init || length > 0) {
      this.recordDiagnostic('debug', 'parser_reset', 'Parser state cleared', {
        state,
        length,
      })
    }
  }

  onNick(callback: TokenCallback | null): void {
    this.context.callbacks.nick = callback
  }

  onName(callback: TokenCallback | null): void {
    this.context.callbacks.name = callback
  }

  onHost(callback: TokenCallback | null): void {
    this.context.callbacks.host = callback
  }

  onCommand(callback: TokenCallback | null): void {
    this.context.callbacks.command = callback
  }

  onParam(callback: TokenCallback | null): void {
    this.context.callbacks.param = callback
  }

  onEnd(callback: EndCallback | null): void {
    this.context.callbacks.end = callback
  }

  hasError(): boolean {
    return this.context.state === ParserState.Error
  }

  getError(): ParserErrorKind {
    return this.context.error
  }

  errorString(): string | null {
    return errorStringFor(this.context.error)
  }

  private dispatchStateByte(
    state: ParserState,
    byte: number,
    cursor: ChunkCursor,
  ): void {
    const handler = this.dispatchTable[state][byte] ?? this.noopHandler
    handler(byte, cursor)
  }

  private buildRowFromSpec(spec: StateRuleSpec): ByteHandler[] {
    const row = new Array<ByteHandler>(BYTE_TABLE_SIZE)
    for (let code = 0; code < BYTE_TABLE_SIZE; code += 1) {
      const flags = classifyByte(code)
      let handler = spec.fallback
      for (const rule of spec.rules) {
        if (rule.predicate(code, flags)) {
          handler = rule.handler
          break
        }
      }
      row[code] = handler
    }
    return row
  }

  private buildDispatchTable(): Record<
    ParserState,
    ReadonlyArray<ByteHandler>
  > {
    const specs = createStateRuleSpecs(this.createStateRuntime())
    const rows = (state: ParserState): ReadonlyArray<ByteHandler> =>
      this.buildRowFromSpec(specs[state])
    return {
      [ParserState.Init]: rows(ParserState.Init),
      [ParserState.Nick]: rows(ParserState.Nick),
      [ParserState.Name]: rows(ParserState.Name),
      [ParserState.Host]: rows(ParserState.Host),
      [ParserState.Command]: rows(ParserState.Command),
      [ParserState.Params]: rows(ParserState.Params),
      [ParserState.Trailing]: rows(ParserState.Trailing),
      [ParserState.End]: rows(ParserState.End),
      [ParserState.Error]: rows(ParserState.Error),
    }
  }

  private createStateRuntime(): StateRuleRuntime {
    return {
      noop: this.noopHandler,
      setState: (state) => {
        this.context.state = state
      },
      getTokenLength: () => this.context.length - this.context.tokenStart,
      startToken: () => {
        this.context.tokenStart = this.context.length
      },
      startTokenAfter: () => {
        this.context.tokenStart = this.context.length + 1
      },
      emitToken: (category, cursor) => this.emitToken(category, cursor),
      beginTerminator: (byte) => this.beginTerminator(byte),
      isTerminatorPending: () => this.context.last === CARRIAGE_RETURN,
      completeMessage: (byte, cursor) => this.completeMessage(byte, cursor),
      fail: (kind, cursor) => this.fail(kind, cursor),
      dispatchStateByte: (state, byte, cursor) =>
        this.dispatchStateByte(state, byte, cursor),
    }
  }

  /**
   * Tokens that started in this chunk are handed out as views of the
   * caller's buffer. A token that started in an earlier chunk only survives
   * in `raw`, so it is copied out.
   */
  private sliceToken(cursor: ChunkCursor): Uint8Array {
    const { tokenStart, length } = this.context
    const start = cursor.messageBase + tokenStart
    if (start >= 0) {
      return cursor.data.subarray(start, cursor.messageBase + length)
    }
    return this.context.raw.slice(tokenStart, length)
  }

  private emitToken(category: TokenCategory, cursor: ChunkCursor): boolean {
    const callback = this.context.callbacks[category]
    if (!callback) {
      return true
    }
    const result = callback(this, this.sliceToken(cursor))
    if (typeof result === 'number' && result !== 0) {
      this.fail(ParserErrorKind.User, cursor)
      return false
    }
    return true
  }

  private beginTerminator(byte: number): void {
    this.context.raw[this.context.length] = byte
    this.context.state = ParserState.End
  }

  private completeMessage(byte: number, cursor: ChunkCursor): void {
    this.context.raw[this.context.length + 1] = byte
    const callback = this.context.callbacks.end
    if (callback) {
      const result = callback(this)
      if (typeof result === 'number' && result !== 0) {
        this.fail(ParserErrorKind.User, cursor)
        return
      }
    }
    rearmContext(this.context)
    cursor.messageBase = cursor.index + 1
  }

  private fail(kind: ParserErrorKind, cursor: ChunkCursor): void {
    const state = this.context.state
    this.context.state = ParserState.Error
    this.context.error = kind
    const message = errorStringFor(kind) ?? kind
    this.recordDiagnostic('warn', 'parser_error', message, {
      kind,
      state,
      offset: cursor.index,
    })
  }

  private recordDiagnostic(
    level: DiagnosticRecord['level'],
    code: string,
    message: string,
    detail?: unknown,
  ): void {
    if (!this.options.diagnostics) {
      return
    }
    this.options.diagnostics.onRecord({
      timestamp: this.options.clock(),
      level,
      code,
      message,
      detail,
    })
  }
}

/**
 * Creates a parser with a fresh context: `Init` state, no error and no
 * callbacks bound. Throws `IrcParserConfigError` for invalid options.
 */
export const createParser = (options: ParserOptions = {}): IrcParser =>
  new ParserImpl(resolveParserOptions(options))

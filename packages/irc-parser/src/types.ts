// Core types that describe tokenizer state, sinks and options.
/**
 * Tokenizer states. `End` re-arms to `Init` once the LF of the terminator is
 * seen; `Error` is sticky until `reset()`.
 */
export enum ParserState {
  Init = 'init',
  Nick = 'nick',
  Name = 'name',
  Host = 'host',
  Command = 'command',
  Params = 'params',
  Trailing = 'trailing',
  End = 'end',
  Error = 'error',
}

/**
 * Bit flags that describe the classes a byte belongs to. A single byte may
 * belong to more than one class (CR is both `Control` and `CarriageReturn`).
 */
export enum ByteFlag {
  None = 0,
  Control = 1 << 0,
  Space = 1 << 1,
  Colon = 1 << 2,
  Exclamation = 1 << 3,
  At = 1 << 4,
  CarriageReturn = 1 << 5,
  LineFeed = 1 << 6,
  Nul = 1 << 7,
  Token = 1 << 8,
}

export enum ParserErrorKind {
  None = 'none',
  Parse = 'parse',
  Length = 'length',
  User = 'user',
}

/**
 * Receives one token. The view borrows from the buffer handed to
 * `execute()` and is only valid until the sink returns. Returning a
 * non-zero number aborts the current `execute()` call with a `User` error.
 */
export type TokenCallback = (
  parser: IrcParser,
  token: Uint8Array,
) => number | void

export type EndCallback = (parser: IrcParser) => number | void

export type TokenCategory = 'nick' | 'name' | 'host' | 'command' | 'param'

export interface ParserCallbacks {
  nick: TokenCallback | null
  name: TokenCallback | null
  host: TokenCallback | null
  command: TokenCallback | null
  param: TokenCallback | null
  end: EndCallback | null
}

export interface DiagnosticsSink {
  onRecord(record: DiagnosticRecord): void
}

export interface DiagnosticRecord {
  readonly timestamp: number
  readonly level: 'debug' | 'info' | 'warn' | 'error'
  readonly code: string
  readonly message: string
  readonly detail?: unknown
}

export interface ParserOptions {
  /**
   * Ceiling on the bytes of a single message, terminator excluded. A message
   * that grows past it puts the parser into the `Length` error state. The
   * reference grammar uses 512; servers that accept longer lines can raise it.
   */
  readonly maxLineLength?: number
  readonly diagnostics?: DiagnosticsSink
  readonly clock?: () => number
}

export interface ResolvedParserOptions {
  readonly maxLineLength: number
  readonly diagnostics: DiagnosticsSink | null
  readonly clock: () => number
}

/**
 * Public interface for parser instances. One instance per stream.
 */
export interface IrcParser {
  readonly state: ParserState
  readonly length: number
  execute(data: Uint8Array | string): number
  reset(): void
  onNick(callback: TokenCallback | null): void
  onName(callback: TokenCallback | null): void
  onHost(callback: TokenCallback | null): void
  onCommand(callback: TokenCallback | null): void
  onParam(callback: TokenCallback | null): void
  onEnd(callback: EndCallback | null): void
  hasError(): boolean
  getError(): ParserErrorKind
  errorString(): string | null
}

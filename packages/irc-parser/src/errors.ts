import { ParserErrorKind } from './types'

export const ERROR_STRINGS: Readonly<
  Record<Exclude<ParserErrorKind, ParserErrorKind.None>, string>
> = Object.freeze({
  [ParserErrorKind.Parse]: 'Parse error: invalid byte in message',
  [ParserErrorKind.Length]:
    'Length error: message exceeds the maximum line length',
  [ParserErrorKind.User]: 'User error: a callback aborted parsing',
})

export const errorStringFor = (kind: ParserErrorKind): string | null =>
  kind === ParserErrorKind.None ? null : ERROR_STRINGS[kind]

/**
 * Base error class for tokenizer misuse. Parsing failures are reported
 * through `getError()` and never thrown.
 */
export class IrcParserError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'IrcParserError'
  }
}

/**
 * Raised when a parser is constructed with options it cannot honour.
 */
export class IrcParserConfigError extends IrcParserError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'IrcParserConfigError'
  }
}

/** biome-ignore-all lint/performance/noBarrelFile: Library */

export { createParser } from './parser'
export { classifyByte } from './classifier'
export {
  ERROR_STRINGS,
  IrcParserConfigError,
  IrcParserError,
  errorStringFor,
} from './errors'
export { createMessageBuilder } from './message-builder'
export type {
  IrcMessage,
  IrcPrefix,
  MessageBuilder,
  MessageBuilderOptions,
} from './message-builder'

export { ByteFlag, ParserErrorKind, ParserState } from './types'
export type {
  DiagnosticRecord,
  DiagnosticsSink,
  EndCallback,
  IrcParser,
  ParserCallbacks,
  ParserOptions,
  TokenCallback,
  TokenCategory,
} from './types'

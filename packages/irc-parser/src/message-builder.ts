import type { IrcParser } from './types'

export interface IrcPrefix {
  /** Nickname, or the server name for server-originated messages. */
  readonly nick: string
  readonly user: string | null
  readonly host: string | null
}

export interface IrcMessage {
  readonly prefix: IrcPrefix | null
  readonly command: string
  readonly params: ReadonlyArray<string>
}

export interface MessageBuilderOptions {
  onMessage(message: IrcMessage): void
  /**
   * Inspect a completed message before it is delivered. Returning `false`
   * aborts the parser with a `User` error and the message is dropped.
   */
  accept?(message: IrcMessage): boolean
  readonly decoder?: TextDecoder
}

export interface MessageBuilder {
  /** Resets the parser and drops any partially assembled message. */
  reset(): void
  /** Unbinds every sink the builder installed. */
  detach(): void
}

interface PendingMessage {
  nick: string | null
  user: string | null
  host: string | null
  command: string
  params: string[]
}

const createPending = (): PendingMessage => ({
  nick: null,
  user: null,
  host: null,
  command: '',
  params: [],
})

const toMessage = (pending: PendingMessage): IrcMessage => ({
  prefix:
    pending.nick === null
      ? null
      : { nick: pending.nick, user: pending.user, host: pending.host },
  command: pending.command,
  params: pending.params,
})

/**
 * Binds all six sinks of `parser` and turns the token stream back into whole
 * messages. Token bytes are decoded as they arrive, so nothing borrowed from
 * the input buffer outlives its callback.
 */
export const createMessageBuilder = (
  parser: IrcParser,
  options: MessageBuilderOptions,
): MessageBuilder => {
  const decoder = options.decoder ?? new TextDecoder('utf-8')
  let pending = createPending()

  // A prefix, or a command at offset 0, opens a new message. Anything left
  // over from a message abandoned through `parser.reset()` is dropped here.
  parser.onNick((_parser, token) => {
    pending = createPending()
    pending.nick = decoder.decode(token)
  })
  parser.onName((_parser, token) => {
    pending.user = decoder.decode(token)
  })
  parser.onHost((_parser, token) => {
    pending.host = decoder.decode(token)
  })
  parser.onCommand((self, token) => {
    if (self.length === token.length) {
      pending = createPending()
    }
    pending.command = decoder.decode(token)
  })
  parser.onParam((_parser, token) => {
    pending.params.push(decoder.decode(token))
  })
  parser.onEnd(() => {
    const message = toMessage(pending)
    pending = createPending()
    if (options.accept && !options.accept(message)) {
      return 1
    }
    options.onMessage(message)
    return 0
  })

  return {
    reset: () => {
      pending = createPending()
      parser.reset()
    },
    detach: () => {
      parser.onNick(null)
      parser.onName(null)
      parser.onHost(null)
      parser.onCommand(null)
      parser.onParam(null)
      parser.onEnd(null)
    },
  }
}

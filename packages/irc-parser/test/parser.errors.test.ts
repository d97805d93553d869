import { describe, expect, it } from 'vitest'
import { ERROR_STRINGS } from '../src/errors'
import { createParser } from '../src/parser'
import {
  type IrcParser,
  ParserErrorKind,
  ParserState,
} from '../src/types'
import { END, TokenRecorder, token } from './helpers/token-recorder'

describe('line length ceiling', () => {
  it('rejects a line longer than 512 bytes without a terminator', () => {
    const parser = createParser()
    const input = 'A'.repeat(600)

    const consumed = parser.execute(input)

    expect(consumed).toBe(512)
    expect(consumed).toBeLessThan(input.length)
    expect(parser.hasError()).toBe(true)
    expect(parser.state).toBe(ParserState.Error)
    expect(parser.getError()).toBe(ParserErrorKind.Length)
    expect(parser.errorString()).toBe(
      'Length error: message exceeds the maximum line length',
    )
  })

  it('accepts a line of exactly the ceiling plus its terminator', () => {
    const parser = createParser()
    const recorder = new TokenRecorder(parser)
    const input = `${'A'.repeat(512)}\r\n`

    expect(parser.execute(input)).toBe(514)
    expect(recorder.tokens).toEqual([token('command', 'A'.repeat(512)), END])
  })

  it('counts bytes across calls', () => {
    const parser = createParser({ maxLineLength: 10 })
    const recorder = new TokenRecorder(parser)

    expect(parser.execute('PRIVMSG')).toBe(7)
    expect(parser.execute(' #abc')).toBe(3)
    expect(parser.getError()).toBe(ParserErrorKind.Length)
    expect(recorder.tokens).toEqual([token('command', 'PRIVMSG')])
  })

  it('applies inside the prefix', () => {
    const parser = createParser({ maxLineLength: 4 })
    const recorder = new TokenRecorder(parser)

    expect(parser.execute(':abcdef CMD\r\n')).toBe(4)
    expect(parser.getError()).toBe(ParserErrorKind.Length)
    expect(recorder.tokens).toEqual([])
  })

  it('starts counting afresh for every message', () => {
    const parser = createParser({ maxLineLength: 8 })
    const recorder = new TokenRecorder(parser)

    expect(parser.execute('PING :ab\r\nPING :cd\r\n')).toBe(20)
    expect(parser.hasError()).toBe(false)
    const ends = recorder.tokens.filter((entry) => entry.type === 'end')
    expect(ends).toHaveLength(2)
  })
})

describe('user abort', () => {
  it('stops at the byte whose token the sink rejected', () => {
    const parser = createParser()
    const recorder = new TokenRecorder(parser)
    parser.onCommand(() => 1)

    const consumed = parser.execute('NICK bob\r\nNICK carol\r\n')

    expect(consumed).toBe(4)
    expect(parser.getError()).toBe(ParserErrorKind.User)
    expect(parser.errorString()).toBe('User error: a callback aborted parsing')
    expect(recorder.tokens).toEqual([])
  })

  const abortCases: ReadonlyArray<{
    readonly name: string
    readonly input: string
    readonly consumed: number
    readonly bind: (parser: IrcParser) => void
  }> = [
    {
      name: 'the nick sink',
      input: ':n!u@h CMD a :t\r\n',
      consumed: 2,
      bind: (parser) => parser.onNick(() => 1),
    },
    {
      name: 'the name sink',
      input: ':n!u@h CMD a :t\r\n',
      consumed: 4,
      bind: (parser) => parser.onName(() => 1),
    },
    {
      name: 'the host sink',
      input: ':n!u@h CMD a :t\r\n',
      consumed: 6,
      bind: (parser) => parser.onHost(() => 1),
    },
    {
      name: 'the command sink after a prefix',
      input: ':n!u@h CMD a :t\r\n',
      consumed: 10,
      bind: (parser) => parser.onCommand(() => 1),
    },
    {
      name: 'the param sink at a separating space',
      input: 'CMD a b\r\n',
      consumed: 5,
      bind: (parser) => parser.onParam(() => 1),
    },
    {
      name: 'the param sink at the terminator',
      input: 'CMD a\r\n',
      consumed: 5,
      bind: (parser) => parser.onParam(() => 1),
    },
    {
      name: 'the param sink for a trailing parameter',
      input: 'CMD :t\r\n',
      consumed: 6,
      bind: (parser) => parser.onParam(() => 1),
    },
  ]

  for (const { name, input, consumed, bind } of abortCases) {
    it(`stops when ${name} returns non-zero`, () => {
      const parser = createParser()
      let ended = false
      parser.onEnd(() => {
        ended = true
      })
      bind(parser)

      expect(parser.execute(input)).toBe(consumed)
      expect(parser.hasError()).toBe(true)
      expect(parser.getError()).toBe(ParserErrorKind.User)
      expect(ended).toBe(false)
    })
  }

  it('treats a zero return as continue', () => {
    const parser = createParser()
    parser.onCommand(() => 0)
    parser.onParam(() => 0)

    expect(parser.execute('NICK bob\r\n')).toBe(10)
    expect(parser.hasError()).toBe(false)
  })

  it('aborts from the end sink before the line feed is consumed', () => {
    const parser = createParser()
    const recorder = new TokenRecorder(parser)
    parser.onEnd(() => -1)

    expect(parser.execute('A\r\nB\r\n')).toBe(2)
    expect(parser.getError()).toBe(ParserErrorKind.User)
    expect(recorder.tokens).toEqual([token('command', 'A')])
  })

  it('lets exceptions thrown by a sink reach the caller', () => {
    const parser = createParser()
    parser.onCommand(() => {
      throw new Error('boom')
    })

    expect(() => parser.execute('CMD x\r\n')).toThrow('boom')
    expect(parser.hasError()).toBe(false)
    expect(parser.state).toBe(ParserState.Command)
  })
})

describe('grammar violations', () => {
  const cases: ReadonlyArray<{
    readonly name: string
    readonly input: string
    readonly consumed: number
  }> = [
    { name: 'a prefix with no command', input: ':nick\r\n', consumed: 5 },
    { name: 'an empty line', input: '\r\n', consumed: 0 },
    { name: 'a leading space', input: ' CMD\r\n', consumed: 0 },
    { name: 'an empty nick', input: ': CMD\r\n', consumed: 1 },
    { name: 'an empty user', input: ':n!@h CMD\r\n', consumed: 3 },
    { name: 'an empty host', input: ':n@ CMD\r\n', consumed: 3 },
    {
      name: 'a control byte in the nick',
      input: ':ni\u0001ck CMD\r\n',
      consumed: 3,
    },
    {
      name: 'a control byte in the user',
      input: ':n!u\u0001 CMD\r\n',
      consumed: 4,
    },
    {
      name: 'a control byte in the host',
      input: ':n@h\u0001 CMD\r\n',
      consumed: 4,
    },
    {
      name: 'a control byte in the command',
      input: 'CM\u0007D\r\n',
      consumed: 2,
    },
    { name: 'a bare line feed', input: 'CMD\n', consumed: 3 },
    {
      name: 'a carriage return without line feed',
      input: 'CMD\rX',
      consumed: 4,
    },
    {
      name: 'a NUL in a middle parameter',
      input: 'CMD a\u0000b\r\n',
      consumed: 5,
    },
    {
      name: 'a line feed in the trailing parameter',
      input: 'PRIVMSG #c :a\nb\r\n',
      consumed: 13,
    },
  ]

  for (const { name, input, consumed } of cases) {
    it(`reports a parse error for ${name}`, () => {
      const parser = createParser()

      expect(parser.execute(input)).toBe(consumed)
      expect(parser.getError()).toBe(ParserErrorKind.Parse)
      expect(parser.errorString()).toBe(ERROR_STRINGS[ParserErrorKind.Parse])
    })
  }

  it('emits the tokens that completed before the violation', () => {
    const parser = createParser()
    const recorder = new TokenRecorder(parser)

    parser.execute(':n!@h CMD\r\n')

    expect(recorder.tokens).toEqual([token('nick', 'n')])
  })
})

describe('error recovery', () => {
  it('keeps the error state sticky until reset', () => {
    const parser = createParser()
    const recorder = new TokenRecorder(parser)

    parser.execute('\r\n')
    expect(parser.execute('NICK bob\r\n')).toBe(0)
    expect(parser.execute('NICK bob\r\n')).toBe(0)
    expect(recorder.tokens).toEqual([])
    expect(parser.getError()).toBe(ParserErrorKind.Parse)
  })

  it('parses a fresh message after reset as a new parser would', () => {
    const parser = createParser()
    const recorder = new TokenRecorder(parser)
    parser.execute(':nick!user@host CMD a\u0000')
    expect(parser.hasError()).toBe(true)

    parser.reset()
    recorder.clear()
    expect(parser.state).toBe(ParserState.Init)
    expect(parser.getError()).toBe(ParserErrorKind.None)
    expect(parser.errorString()).toBeNull()
    expect(parser.length).toBe(0)

    const fresh = createParser()
    const freshRecorder = new TokenRecorder(fresh)
    expect(parser.execute('NICK bob\r\n')).toBe(fresh.execute('NICK bob\r\n'))
    expect(recorder.tokens).toEqual(freshRecorder.tokens)
    expect(recorder.tokens).toEqual([
      token('command', 'NICK'),
      token('param', 'bob'),
      END,
    ])
  })

  it('keeps bound callbacks across reset', () => {
    const parser = createParser()
    const recorder = new TokenRecorder(parser)
    parser.execute('A'.repeat(513))

    parser.reset()

    expect(parser.execute('PING :x\r\n')).toBe(9)
    expect(recorder.tokens).toEqual([
      token('command', 'PING'),
      token('param', 'x'),
      END,
    ])
  })

  it('discards a partial message on reset', () => {
    const parser = createParser()
    const recorder = new TokenRecorder(parser)
    parser.execute(':alice!a@h PRIV')

    parser.reset()
    recorder.clear()
    parser.execute('MSG x\r\n')

    expect(recorder.tokens).toEqual([
      token('command', 'MSG'),
      token('param', 'x'),
      END,
    ])
  })
})

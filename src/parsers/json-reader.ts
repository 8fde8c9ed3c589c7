/**
 * Pull-style JSON reader
 *
 * Decodes a JSON document token by token from a sequence of text chunks,
 * so a caller can walk a large document while holding only the chunk being
 * read and the values it chooses to keep.
 *
 * @example
 * ```typescript
 * const reader = new JsonReader('{"files":[1,2]}')
 * reader.beginObject()
 * reader.nextName() // 'files'
 * reader.skipValue()
 * reader.endObject()
 * ```
 */

import { closeSync, openSync, readSync } from 'node:fs'
import { StringDecoder } from 'node:string_decoder'
import { JSON_READ_CHUNK_SIZE } from '../constants.js'

export type JsonToken =
  | 'BEGIN_ARRAY'
  | 'END_ARRAY'
  | 'BEGIN_OBJECT'
  | 'END_OBJECT'
  | 'NAME'
  | 'STRING'
  | 'NUMBER'
  | 'BOOLEAN'
  | 'NULL'
  | 'END_DOCUMENT'

/**
 * Returns the next chunk of text, or null at the end of input
 */
export type JsonChunkSource = () => string | null

/**
 * Raised for malformed input and for a token of the wrong type
 */
export class JsonSyntaxError extends Error {
  readonly offset: number

  constructor(message: string, offset: number) {
    super(`${message} at offset ${offset}`)
    this.name = 'JsonSyntaxError'
    this.offset = offset
  }
}

type Scope =
  | 'EMPTY_DOCUMENT'
  | 'NONEMPTY_DOCUMENT'
  | 'EMPTY_ARRAY'
  | 'NONEMPTY_ARRAY'
  | 'EMPTY_OBJECT'
  | 'DANGLING_NAME'
  | 'NONEMPTY_OBJECT'

const NUMBER_LITERAL = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/
const NUMBER_CHAR = /[-+0-9.eE]/
const HEX4 = /^[0-9a-fA-F]{4}$/

const ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
}

function isWhitespace(char: string): boolean {
  return char === ' ' || char === '\n' || char === '\r' || char === '\t'
}

/**
 * Chunk source over an in-memory string (a single chunk)
 */
export function stringChunkSource(text: string): JsonChunkSource {
  let done = false
  return () => {
    if (done) return null
    done = true
    return text
  }
}

export class JsonReader {
  private readonly source: JsonChunkSource
  private buffer = ''
  private pos = 0
  /** Characters dropped from the front of the buffer so far */
  private discarded = 0
  private exhausted = false
  private readonly stack: Scope[] = ['EMPTY_DOCUMENT']
  private peeked: JsonToken | null = null

  constructor(input: string | JsonChunkSource) {
    this.source = typeof input === 'string' ? stringChunkSource(input) : input
  }

  /**
   * Type of the next token, without consuming it
   */
  peek(): JsonToken {
    if (this.peeked === null) {
      this.peeked = this.doPeek()
    }
    return this.peeked
  }

  hasNext(): boolean {
    const token = this.peek()
    return token !== 'END_OBJECT' && token !== 'END_ARRAY' && token !== 'END_DOCUMENT'
  }

  beginArray(): void {
    this.expect('BEGIN_ARRAY')
    this.stack.push('EMPTY_ARRAY')
  }

  endArray(): void {
    this.expect('END_ARRAY')
    this.stack.pop()
  }

  beginObject(): void {
    this.expect('BEGIN_OBJECT')
    this.stack.push('EMPTY_OBJECT')
  }

  endObject(): void {
    this.expect('END_OBJECT')
    this.stack.pop()
  }

  nextName(): string {
    this.expect('NAME')
    return this.readString()
  }

  nextString(): string {
    this.expect('STRING')
    return this.readString()
  }

  nextNumber(): number {
    this.expect('NUMBER')
    const start = this.offset()
    const text = this.readNumberText()
    if (!NUMBER_LITERAL.test(text)) {
      throw new JsonSyntaxError(`Malformed number '${text}'`, start)
    }
    return Number(text)
  }

  nextBoolean(): boolean {
    this.expect('BOOLEAN')
    if (this.current() === 't') {
      this.readKeyword('true')
      return true
    }
    this.readKeyword('false')
    return false
  }

  nextNull(): null {
    this.expect('NULL')
    this.readKeyword('null')
    return null
  }

  /**
   * Consume the next value, recursing through arrays and objects
   */
  skipValue(): void {
    let depth = 0
    do {
      const token = this.peek()
      switch (token) {
        case 'BEGIN_ARRAY':
          this.beginArray()
          depth++
          break
        case 'BEGIN_OBJECT':
          this.beginObject()
          depth++
          break
        case 'END_ARRAY':
          if (depth === 0) throw this.syntaxError('Expected a value but was END_ARRAY')
          this.endArray()
          depth--
          break
        case 'END_OBJECT':
          if (depth === 0) throw this.syntaxError('Expected a value but was END_OBJECT')
          this.endObject()
          depth--
          break
        case 'NAME':
          this.nextName()
          break
        case 'STRING':
          this.nextString()
          break
        case 'NUMBER':
          this.nextNumber()
          break
        case 'BOOLEAN':
          this.nextBoolean()
          break
        case 'NULL':
          this.nextNull()
          break
        case 'END_DOCUMENT':
          throw this.syntaxError('Unexpected end of input')
      }
    } while (depth > 0)
  }

  /**
   * Absolute character offset of the read position
   */
  offset(): number {
    return this.discarded + this.pos
  }

  private expect(token: JsonToken): void {
    const actual = this.peek()
    if (actual !== token) {
      throw this.syntaxError(`Expected ${token} but was ${actual}`)
    }
    this.peeked = null
  }

  private syntaxError(message: string): JsonSyntaxError {
    return new JsonSyntaxError(message, this.offset())
  }

  private setScope(scope: Scope): void {
    this.stack[this.stack.length - 1] = scope
  }

  /**
   * Make at least `count` characters available from the read position
   */
  private fill(count: number): boolean {
    while (this.buffer.length - this.pos < count) {
      if (this.exhausted) return false
      const chunk = this.source()
      if (chunk === null) {
        this.exhausted = true
        return false
      }
      if (this.pos > 0) {
        this.discarded += this.pos
        this.buffer = this.buffer.slice(this.pos)
        this.pos = 0
      }
      this.buffer += chunk
    }
    return true
  }

  private current(): string {
    return this.buffer.charAt(this.pos)
  }

  /**
   * Next non-whitespace character (not consumed), or null at end of input
   */
  private nextNonWhitespace(): string | null {
    for (;;) {
      if (this.pos >= this.buffer.length && !this.fill(1)) {
        return null
      }
      const char = this.current()
      if (!isWhitespace(char)) {
        return char
      }
      this.pos++
    }
  }

  private doPeek(): JsonToken {
    const scope = this.stack[this.stack.length - 1]

    switch (scope) {
      case 'EMPTY_ARRAY':
      case 'NONEMPTY_ARRAY': {
        this.setScope('NONEMPTY_ARRAY')
        const char = this.nextNonWhitespace()
        if (char === ']') {
          this.pos++
          return 'END_ARRAY'
        }
        if (scope === 'NONEMPTY_ARRAY') {
          if (char !== ',') throw this.syntaxError('Unterminated array')
          this.pos++
        }
        break
      }

      case 'EMPTY_OBJECT':
      case 'NONEMPTY_OBJECT': {
        this.setScope('DANGLING_NAME')
        let char = this.nextNonWhitespace()
        if (char === '}') {
          this.pos++
          return 'END_OBJECT'
        }
        if (scope === 'NONEMPTY_OBJECT') {
          if (char !== ',') throw this.syntaxError('Unterminated object')
          this.pos++
          char = this.nextNonWhitespace()
        }
        if (char !== '"') throw this.syntaxError('Expected a property name')
        this.pos++
        return 'NAME'
      }

      case 'DANGLING_NAME': {
        this.setScope('NONEMPTY_OBJECT')
        if (this.nextNonWhitespace() !== ':') throw this.syntaxError("Expected ':'")
        this.pos++
        break
      }

      case 'EMPTY_DOCUMENT':
        this.setScope('NONEMPTY_DOCUMENT')
        break

      case 'NONEMPTY_DOCUMENT':
        if (this.nextNonWhitespace() === null) return 'END_DOCUMENT'
        throw this.syntaxError('Expected end of document')
    }

    return this.peekValue()
  }

  private peekValue(): JsonToken {
    const char = this.nextNonWhitespace()
    switch (char) {
      case null:
        throw this.syntaxError('Unexpected end of input')
      case '{':
        this.pos++
        return 'BEGIN_OBJECT'
      case '[':
        this.pos++
        return 'BEGIN_ARRAY'
      case '"':
        this.pos++
        return 'STRING'
      case 't':
      case 'f':
        return 'BOOLEAN'
      case 'n':
        return 'NULL'
      default:
        if (char === '-' || (char >= '0' && char <= '9')) {
          return 'NUMBER'
        }
        throw this.syntaxError(`Unexpected character '${char}'`)
    }
  }

  /**
   * Read string contents after the opening quote, consuming the closing quote
   */
  private readString(): string {
    let out = ''
    for (;;) {
      if (this.pos >= this.buffer.length && !this.fill(1)) {
        throw this.syntaxError('Unterminated string')
      }
      let end = this.pos
      while (end < this.buffer.length) {
        const code = this.buffer.charCodeAt(end)
        if (code === 0x22 || code === 0x5c || code < 0x20) break
        end++
      }
      out += this.buffer.slice(this.pos, end)
      this.pos = end
      if (end >= this.buffer.length) {
        continue
      }

      const char = this.current()
      if (char === '"') {
        this.pos++
        return out
      }
      if (char === '\\') {
        this.pos++
        out += this.readEscape()
        continue
      }
      throw this.syntaxError('Unescaped control character in string')
    }
  }

  private readEscape(): string {
    if (!this.fill(1)) {
      throw this.syntaxError('Unterminated escape sequence')
    }
    const char = this.current()
    this.pos++

    if (char === 'u') {
      if (!this.fill(4)) throw this.syntaxError('Unterminated escape sequence')
      const hex = this.buffer.slice(this.pos, this.pos + 4)
      if (!HEX4.test(hex)) throw this.syntaxError(`Malformed unicode escape '\\u${hex}'`)
      this.pos += 4
      return String.fromCharCode(parseInt(hex, 16))
    }

    const escaped = ESCAPES[char]
    if (escaped === undefined) {
      throw this.syntaxError(`Invalid escape sequence '\\${char}'`)
    }
    return escaped
  }

  private readNumberText(): string {
    let text = ''
    for (;;) {
      if (this.pos >= this.buffer.length && !this.fill(1)) {
        return text
      }
      const char = this.current()
      if (!NUMBER_CHAR.test(char)) {
        return text
      }
      text += char
      this.pos++
    }
  }

  private readKeyword(word: string): void {
    if (!this.fill(word.length) || this.buffer.slice(this.pos, this.pos + word.length) !== word) {
      throw this.syntaxError(`Expected '${word}'`)
    }
    this.pos += word.length
  }
}

/**
 * Chunk source over an open file descriptor, decoding UTF-8 across chunk borders
 */
export function fileChunkSource(fd: number, chunkSize: number = JSON_READ_CHUNK_SIZE): JsonChunkSource {
  const decoder = new StringDecoder('utf8')
  const bytes = Buffer.alloc(chunkSize)
  let done = false

  return () => {
    while (!done) {
      const read = readSync(fd, bytes, 0, chunkSize, null)
      if (read === 0) {
        done = true
        const tail = decoder.end()
        return tail.length > 0 ? tail : null
      }
      const text = decoder.write(bytes.subarray(0, read))
      if (text.length > 0) {
        return text
      }
    }
    return null
  }
}

/**
 * Open a file, hand a reader over it to `visit`, and close it afterwards
 */
export function withFileJsonReader<T>(filePath: string, visit: (reader: JsonReader) => T): T {
  const fd = openSync(filePath, 'r')
  try {
    return visit(new JsonReader(fileChunkSource(fd)))
  } finally {
    closeSync(fd)
  }
}

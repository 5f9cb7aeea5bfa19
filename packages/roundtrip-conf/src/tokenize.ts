import type { Primitive, SymbolKind, Token } from "./ast"
import { EOF, symbol } from "./ast"
import { ConfError, ConfParseError } from "./error"
import {
  BARE_WORD_RE,
  BOOL_RE,
  decodeBool,
  decodeFloat,
  decodeInt,
  decodeString,
  FLOAT_RE,
  INT_RE,
  NULL_RE,
  STRING_RE,
} from "./primitive"

const PUNCTUATION: Partial<Record<string, SymbolKind>> = {
  ":": "Colon",
  ",": "Comma",
  "[": "ListStart",
  "]": "ListEnd",
  "{": "MapStart",
  "}": "MapEnd",
}

const SPACE_RE = /[ \t]+/y
const COMMENT_RE = /#[^\r\n]*/y

/**
 * 1-based line and column of `offset` within `text`.
 */
export function positionOf(text: string, offset: number): { line: number; column: number } {
  let line = 1
  let lineStart = 0
  for (let i = 0; i < offset; i++) {
    if (text[i] === "\n") {
      line++
      lineStart = i + 1
    }
  }
  return { line, column: offset - lineStart + 1 }
}

function parseError(text: string, offset: number, msg: string): ConfParseError {
  const { line, column } = positionOf(text, offset)
  return new ConfParseError(msg, line, column)
}

function matchAt(re: RegExp, text: string, pos: number): string | undefined {
  re.lastIndex = pos
  const m = re.exec(text)
  return m ? m[0] : undefined
}

function primitiveAt(text: string, pos: number): Primitive | undefined {
  let src = matchAt(STRING_RE, text, pos)
  if (src !== undefined) {
    try {
      return { kind: "String", val: decodeString(src), src }
    } catch (e) {
      if (e instanceof ConfError) {
        throw parseError(text, pos, e.message)
      }
      throw e
    }
  }
  src = matchAt(FLOAT_RE, text, pos)
  if (src !== undefined) {
    return { kind: "Float", val: decodeFloat(src), src }
  }
  src = matchAt(INT_RE, text, pos)
  if (src !== undefined) {
    return { kind: "Int", val: decodeInt(src), src }
  }
  src = matchAt(BOOL_RE, text, pos)
  if (src !== undefined) {
    return { kind: "Bool", val: decodeBool(src), src }
  }
  src = matchAt(NULL_RE, text, pos)
  if (src !== undefined) {
    return { kind: "Null", val: null, src }
  }
  src = matchAt(BARE_WORD_RE, text, pos)
  if (src !== undefined) {
    return { kind: "BareWordKey", val: src, src }
  }
  return undefined
}

function tokenAt(text: string, pos: number, atLineStart: boolean): Token {
  const c = text[pos]
  if (c === "\n") {
    return symbol("NL", "\n")
  }
  if (c === "\r" && text[pos + 1] === "\n") {
    return symbol("NL", "\r\n")
  }

  const space = matchAt(SPACE_RE, text, pos)
  if (space !== undefined) {
    return symbol(atLineStart ? "Indent" : "Space", space)
  }

  const comment = matchAt(COMMENT_RE, text, pos)
  if (comment !== undefined) {
    return symbol("Comment", comment)
  }

  const punctuation = PUNCTUATION[c]
  if (punctuation !== undefined) {
    return symbol(punctuation, c)
  }

  const primitive = primitiveAt(text, pos)
  if (primitive === undefined) {
    throw parseError(text, pos, `Unexpected character ${JSON.stringify(c)}`)
  }
  return primitive
}

/**
 * Splits `text` into tokens. The result always ends with an EOF token and
 * the `src` of the tokens concatenates back to `text`.
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = []
  let pos = 0
  let atLineStart = true
  while (pos < text.length) {
    const token = tokenAt(text, pos, atLineStart)
    tokens.push(token)
    pos += token.src.length
    atLineStart = token.kind === "NL"
  }
  tokens.push(EOF)
  return tokens
}

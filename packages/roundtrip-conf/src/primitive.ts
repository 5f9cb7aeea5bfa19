/**
 * Text encoders and decoders for atomic values.
 */

import { failure } from "./error"

export const BARE_WORD_RE = /[A-Za-z_][A-Za-z0-9_-]*/y
export const BOOL_RE = /(?:true|false)(?![A-Za-z0-9_-])/y
export const NULL_RE = /null(?![A-Za-z0-9_-])/y
export const FLOAT_RE =
  /-?(?:(?:[0-9]+\.[0-9]*|\.[0-9]+)(?:[eE][+-]?[0-9]+)?|[0-9]+[eE][+-]?[0-9]+)(?![A-Za-z0-9_.])/y
export const INT_RE = /-?(?:0x[0-9a-fA-F]+|0o[0-7]+|0b[01]+|[0-9]+)(?![A-Za-z0-9_.])/y
export const STRING_RE = /"(?:[^"\\\r\n]|\\.)*"|'(?:[^'\\\r\n]|\\.)*'/y

const BARE_WORD_FULL_MATCH_RE = /^[A-Za-z_][A-Za-z0-9_-]*$/
const RESERVED_WORDS: ReadonlySet<string> = new Set(["true", "false", "null"])

/**
 * Whether `s` may be written as an unquoted key.
 */
export function isBareWord(s: string): boolean {
  return BARE_WORD_FULL_MATCH_RE.test(s) && !RESERVED_WORDS.has(s)
}

const SIMPLE_ESCAPES: Partial<Record<string, string>> = {
  "\\": "\\",
  '"': '"',
  "'": "'",
  n: "\n",
  r: "\r",
  t: "\t",
  b: "\b",
  f: "\f",
  "0": "\0",
}

const HEX_ESCAPE_LENGTHS: Partial<Record<string, number>> = { x: 2, u: 4, U: 8 }

/**
 * Decodes a quoted string literal. Throws a plain `ConfError` on a bad
 * escape; the tokenizer adds the position.
 */
export function decodeString(src: string): string {
  const body = src.slice(1, -1)
  let out = ""
  let i = 0
  while (i < body.length) {
    const c = body[i]
    if (c !== "\\") {
      out += c
      i++
      continue
    }
    const esc = body[i + 1]
    const simple = SIMPLE_ESCAPES[esc]
    if (simple !== undefined) {
      out += simple
      i += 2
      continue
    }
    const len = HEX_ESCAPE_LENGTHS[esc]
    const hex = len === undefined ? "" : body.slice(i + 2, i + 2 + len)
    if (len === undefined || !new RegExp(`^[0-9a-fA-F]{${len}}$`).test(hex)) {
      failure("ParseError", `Invalid escape sequence in ${src}`)
    }
    const codePoint = parseInt(hex, 16)
    if (codePoint > 0x10ffff) {
      failure("ParseError", `Invalid code point in ${src}`)
    }
    out += String.fromCodePoint(codePoint)
    i += 2 + len
  }
  return out
}

export function encodeString(val: string): string {
  let out = '"'
  for (const c of val) {
    switch (c) {
      case "\\":
        out += "\\\\"
        break
      case '"':
        out += '\\"'
        break
      case "\n":
        out += "\\n"
        break
      case "\r":
        out += "\\r"
        break
      case "\t":
        out += "\\t"
        break
      default: {
        const code = c.charCodeAt(0)
        if (code < 0x20 || code === 0x7f) {
          out += `\\x${code.toString(16).padStart(2, "0")}`
        } else {
          out += c
        }
      }
    }
  }
  return out + '"'
}

export function decodeBool(src: string): boolean {
  return src === "true"
}

export function encodeBool(val: boolean): string {
  return val ? "true" : "false"
}

export function encodeNull(): string {
  return "null"
}

export function decodeInt(src: string): number | bigint {
  const negative = src.startsWith("-")
  const magnitude = BigInt(negative ? src.slice(1) : src)
  const big = negative ? -magnitude : magnitude
  const n = Number(big)
  return Number.isSafeInteger(n) ? n : big
}

export function encodeInt(val: number | bigint): string {
  if (typeof val === "number" && !Number.isInteger(val)) {
    failure("InvariantViolation", `Not an integer: ${val}`)
  }
  return BigInt(val).toString()
}

export function decodeFloat(src: string): number {
  return Number(src)
}

export function encodeFloat(val: number): string {
  if (!Number.isFinite(val)) {
    failure("UnsupportedValue", `Cannot represent ${val} as a float`)
  }
  const src = String(val)
  // integral floats such as 1e21 need a marker to stay floats on re-read
  return /[.eE]/.test(src) ? src : `${src}.0`
}

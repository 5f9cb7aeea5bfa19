import type { Primitive, SymbolToken, Token, Value } from "./ast"
import {
  COLON,
  COMMA,
  EOF,
  isPrimitive,
  LIST_END,
  LIST_START,
  MAP_END,
  MAP_START,
  NL,
  SPACE,
  symbol,
} from "./ast"
import { failure } from "./error"
import type { ConfMap, ConfPrimitive, ConfRecord, ConfValue } from "./native"
import { parseFromTokens, parseKeyFromTokens } from "./parse"
import {
  encodeBool,
  encodeFloat,
  encodeInt,
  encodeNull,
  encodeString,
  isBareWord,
} from "./primitive"
import { DEFAULT_SETTINGS, indented, type Settings } from "./settings"
import { isPlainObject } from "./utils"

const INDENT_UNIT = "    "

export interface ToTokensOptions {
  /** The value is a map key, so a bare word may be written unquoted. */
  asKey?: boolean
  /** A non-empty mapping at depth 0 renders braceless, one entry per line. */
  topLevelMap?: boolean
}

type Entry = readonly [ConfPrimitive, ConfValue]

interface ContainerStyle<E> {
  start: SymbolToken
  end: SymbolToken
  items: readonly E[]
  renderItem: (item: E, settings: Settings) => Token[]
}

function primitiveTokens(value: ConfPrimitive, settings: Settings, asKey: boolean): Primitive {
  if (typeof value === "string") {
    if (asKey && settings.bareKeys && isBareWord(value)) {
      return { kind: "BareWordKey", val: value, src: value }
    }
    return { kind: "String", val: value, src: encodeString(value) }
  }
  if (typeof value === "boolean") {
    return { kind: "Bool", val: value, src: encodeBool(value) }
  }
  if (value === null) {
    return { kind: "Null", val: null, src: encodeNull() }
  }
  if (typeof value === "bigint") {
    return { kind: "Int", val: value, src: encodeInt(value) }
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      failure("UnsupportedValue", `Cannot represent ${value}`)
    }
    // beyond the safe range an Int would read back as a bigint
    if (Number.isSafeInteger(value)) {
      return { kind: "Int", val: value, src: encodeInt(value) }
    }
    return { kind: "Float", val: value, src: encodeFloat(value) }
  }
  return failure("UnsupportedValue", `Cannot represent a value of type ${typeof value}`)
}

function isConfPrimitive(value: ConfValue): value is ConfPrimitive {
  return value === null || typeof value !== "object"
}

function mapEntries(value: ConfRecord | ConfMap): Entry[] | undefined {
  if (value instanceof Map) {
    return [...value.entries()]
  }
  if (isPlainObject(value)) {
    return Object.entries(value)
  }
  return undefined
}

function inline<E>(settings: Settings, style: ContainerStyle<E>): Token[] {
  const ret: Token[] = [style.start]
  style.items.forEach((item, i) => {
    if (i > 0) {
      ret.push(COMMA, SPACE)
    }
    ret.push(...style.renderItem(item, settings))
  })
  ret.push(style.end)
  return ret
}

function multiline<E>(settings: Settings, style: ContainerStyle<E>): Token[] {
  const childSettings = indented(settings)
  const ret: Token[] = [style.start, NL]
  for (const item of style.items) {
    ret.push(symbol("Indent", INDENT_UNIT.repeat(childSettings.indent)))
    ret.push(...style.renderItem(item, childSettings))
    ret.push(COMMA, NL)
  }
  if (settings.indent > 0) {
    ret.push(symbol("Indent", INDENT_UNIT.repeat(settings.indent)))
  }
  ret.push(style.end)
  return ret
}

function container<E>(settings: Settings, style: ContainerStyle<E>): Token[] {
  if (
    settings.indent < 0 ||
    style.items.length === 0 ||
    (settings.inlineSmallContainers && style.items.length < 2)
  ) {
    return inline(settings, style)
  }
  return multiline(settings, style)
}

function entryTokens([key, value]: Entry, settings: Settings): Token[] {
  return [
    ...toTokens(key, settings, { asKey: true }),
    COLON,
    SPACE,
    ...toTokens(value, settings),
  ]
}

function valueTokens(value: ConfValue, settings: Settings): Token[] {
  return toTokens(value, settings)
}

function topLevelMapTokens(entries: readonly Entry[], settings: Settings): Token[] {
  const tokens: Token[] = []
  for (const entry of entries) {
    tokens.push(...entryTokens(entry, settings), NL)
  }
  return tokens
}

/**
 * Renders a native value as a token stream under the given formatting
 * policy. The stream is not validated; see `toAst`.
 */
export function toTokens(
  value: ConfValue,
  settings: Settings = DEFAULT_SETTINGS,
  options: ToTokensOptions = {}
): Token[] {
  if (isConfPrimitive(value)) {
    return [primitiveTokens(value, settings, options.asKey ?? false)]
  }

  if (Array.isArray(value)) {
    return container(settings, {
      start: LIST_START,
      end: LIST_END,
      items: value,
      renderItem: valueTokens,
    })
  }

  const entries = mapEntries(value)
  if (entries === undefined) {
    return failure("UnsupportedValue", `Cannot represent ${Object.prototype.toString.call(value)}`)
  }
  if (entries.length > 0 && options.topLevelMap && settings.indent === 0) {
    return topLevelMapTokens(entries, settings)
  }
  return container(settings, {
    start: MAP_START,
    end: MAP_END,
    items: entries,
    renderItem: entryTokens,
  })
}

/**
 * Synthesizes a value and runs the result through the parser, so the tree
 * obeys every invariant a parsed tree does.
 */
export function toAst(
  value: ConfValue,
  settings: Settings = DEFAULT_SETTINGS,
  options: ToTokensOptions = {}
): Value {
  return parseFromTokens([...toTokens(value, settings, options), EOF]).val
}

/**
 * Synthesizes a map key. Containers cannot be keys; bare-word strings come
 * out unquoted when `settings.bareKeys` is set.
 */
export function toKeyAst(value: ConfValue, settings: Settings = DEFAULT_SETTINGS): Primitive {
  const node = toAst(value, settings)
  if (!isPrimitive(node)) {
    failure("InvalidKeyType", `Keys must be a primitive but got ${node.kind}`)
  }
  return parseKeyFromTokens([...toTokens(value, settings, { asKey: true }), EOF])
}

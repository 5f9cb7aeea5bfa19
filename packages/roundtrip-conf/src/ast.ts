/**
 * Tree types for parsed documents.
 *
 * Every node is a plain immutable record. Concatenating the `src` of every
 * token in document order reproduces the parsed text exactly.
 */

export type SymbolKind =
  | "Comment"
  | "Space"
  | "Indent"
  | "NL"
  | "Colon"
  | "Comma"
  | "ListStart"
  | "ListEnd"
  | "MapStart"
  | "MapEnd"
  | "EOF"

export interface SymbolToken {
  readonly kind: SymbolKind
  readonly src: string
}

export interface StringNode {
  readonly kind: "String"
  readonly val: string
  readonly src: string
}

export interface BareWordKeyNode {
  readonly kind: "BareWordKey"
  readonly val: string
  readonly src: string
}

export interface BoolNode {
  readonly kind: "Bool"
  readonly val: boolean
  readonly src: string
}

export interface NullNode {
  readonly kind: "Null"
  readonly val: null
  readonly src: string
}

export interface IntNode {
  readonly kind: "Int"
  /** A `bigint` when the literal is outside the safe integer range. */
  readonly val: number | bigint
  readonly src: string
}

export interface FloatNode {
  readonly kind: "Float"
  readonly val: number
  readonly src: string
}

export type Primitive = StringNode | BareWordKeyNode | BoolNode | NullNode | IntNode | FloatNode

export type PrimitiveKind = Primitive["kind"]

export const PRIMITIVE_KINDS: readonly PrimitiveKind[] = [
  "String",
  "BareWordKey",
  "Bool",
  "Null",
  "Int",
  "Float",
]

/**
 * A lexical unit. Primitive nodes double as tokens so a synthesized token
 * stream can carry decoded values straight into the parser.
 */
export type Token = SymbolToken | Primitive

export type Trivia = readonly Token[]

export interface ListItem {
  /** Trivia before the value: blank lines, own-line comments, indentation. */
  readonly head: Trivia
  readonly val: Value
  /** Trivia after the value: comma, trailing comment, newline. */
  readonly tail: Trivia
}

export interface MapItem {
  readonly head: Trivia
  readonly key: Primitive
  /** The colon and the spaces around it. */
  readonly sep: Trivia
  readonly val: Value
  readonly tail: Trivia
}

export type Item = ListItem | MapItem

export interface ListNode {
  readonly kind: "List"
  /** The opening bracket and the rest of its line. */
  readonly head: Trivia
  readonly items: readonly ListItem[]
  /** Trivia after the last item, then the closing bracket. */
  readonly tail: Trivia
}

export interface MapNode {
  readonly kind: "Map"
  /** Empty for a braceless top-level map. */
  readonly head: Trivia
  readonly items: readonly MapItem[]
  readonly tail: Trivia
}

export type Container = ListNode | MapNode

export type Value = Primitive | Container

/**
 * A parsed document. It has the same `val` slot as an item so that the
 * empty path can address it.
 */
export interface Doc {
  readonly head: Trivia
  readonly val: Value
  /** Trailing end-of-input trivia, ending with the EOF token. */
  readonly tail: Trivia
}

export type Holder = Doc | Item

export function symbol(kind: SymbolKind, src: string): SymbolToken {
  return { kind, src }
}

export const COLON = symbol("Colon", ":")
export const COMMA = symbol("Comma", ",")
export const SPACE = symbol("Space", " ")
export const NL = symbol("NL", "\n")
export const LIST_START = symbol("ListStart", "[")
export const LIST_END = symbol("ListEnd", "]")
export const MAP_START = symbol("MapStart", "{")
export const MAP_END = symbol("MapEnd", "}")
export const EOF = symbol("EOF", "")

export function isPrimitive(token: Token | Value): token is Primitive {
  switch (token.kind) {
    case "String":
    case "BareWordKey":
    case "Bool":
    case "Null":
    case "Int":
    case "Float":
      return true
    default:
      return false
  }
}

export function isContainer(value: Value): value is Container {
  return value.kind === "List" || value.kind === "Map"
}

export function isTrivia(token: Token): boolean {
  switch (token.kind) {
    case "Space":
    case "Indent":
    case "NL":
    case "Comment":
      return true
    default:
      return false
  }
}

export function endsWithNewline(tokens: Trivia): boolean {
  const last = tokens[tokens.length - 1]
  return last !== undefined && last.src.endsWith("\n")
}

/**
 * A braceless root-level map, one entry per line.
 */
export function isTopLevelStyle(container: Container): boolean {
  return container.kind === "Map" && container.head.length === 0
}

/**
 * Items are laid out one per line (as opposed to `{a: 1, b: 2}`).
 */
export function isMultiline(container: Container): boolean {
  return isTopLevelStyle(container) || endsWithNewline(container.head)
}

import type {
  Container,
  Doc,
  Item,
  ListItem,
  MapItem,
  Primitive,
  SymbolKind,
  Token,
  Trivia,
  Value,
} from "./ast"
import { EOF, endsWithNewline, isPrimitive, isTrivia } from "./ast"
import { ConfParseError } from "./error"
import { positionOf, tokenize } from "./tokenize"
import { deepEqual } from "./utils"

function describe(token: Token): string {
  return token.kind === "EOF" ? "end of input" : JSON.stringify(token.src)
}

/**
 * Recursive-descent parser over a token stream.
 *
 * Grammar (trivia = spaces, indentation, newlines and comments):
 *
 *   doc       = trivia (topLevel | value) trivia EOF
 *   topLevel  = entry (NL trivia entry)* NL?       one `key: value` per line
 *   value     = primitive | list | map              bare words are keys only
 *   list      = "[" line (trivia value tail ",")* (trivia value tail)? trivia "]"
 *   map       = "{" line (trivia entry tail ",")* (trivia entry tail)? trivia "}"
 *   entry     = key Space* ":" Space* value
 */
class Parser {
  private pos = 0

  constructor(private readonly tokens: readonly Token[]) {}

  private peek(offset = 0): Token {
    return this.tokens[this.pos + offset] ?? EOF
  }

  private next(): Token {
    const token = this.peek()
    this.pos++
    return token
  }

  private error(msg: string, at = this.pos): never {
    const text = this.tokens
      .slice(0, at)
      .map((t) => t.src)
      .join("")
    const { line, column } = positionOf(text, text.length)
    throw new ConfParseError(msg, line, column)
  }

  private expect(kind: SymbolKind): Token {
    const token = this.peek()
    if (token.kind !== kind) {
      this.error(`Expected ${kind}, got ${describe(token)}`)
    }
    return this.next()
  }

  private takeWhile(pred: (token: Token) => boolean): Token[] {
    const taken: Token[] = []
    while (pred(this.peek())) {
      taken.push(this.next())
    }
    return taken
  }

  private takeTrivia(): Token[] {
    return this.takeWhile(isTrivia)
  }

  private takeSpaces(): Token[] {
    return this.takeWhile((t) => t.kind === "Space")
  }

  /**
   * Spaces, an optional comment, and the newline ending the current line.
   */
  private lineRemainder(): Token[] {
    const taken = this.takeSpaces()
    if (this.peek().kind === "Comment") {
      taken.push(this.next())
    }
    if (this.peek().kind === "NL") {
      taken.push(this.next())
    }
    return taken
  }

  private startsTopLevelMap(): boolean {
    if (!isPrimitive(this.peek())) {
      return false
    }
    let offset = 1
    while (this.peek(offset).kind === "Space") {
      offset++
    }
    return this.peek(offset).kind === "Colon"
  }

  parseDoc(): Doc {
    const head = this.takeTrivia()
    if (this.peek().kind === "EOF") {
      this.error("Expected a value, got end of input")
    }
    const val = this.startsTopLevelMap() ? this.parseTopLevelMap() : this.parseValue()
    const tail = this.takeTrivia()
    const eof = this.peek()
    if (eof.kind !== "EOF") {
      this.error(`Unexpected ${describe(eof)}`)
    }
    this.pos++
    return { head, val, tail: [...tail, eof] }
  }

  parseKeyOnly(): Primitive {
    const key = this.parseKey()
    if (this.peek().kind !== "EOF") {
      this.error(`Unexpected ${describe(this.peek())}`)
    }
    return key
  }

  private parseKey(): Primitive {
    const token = this.peek()
    if (!isPrimitive(token)) {
      this.error(`Expected a key, got ${describe(token)}`)
    }
    this.pos++
    return token
  }

  private parseValue(): Value {
    const token = this.peek()
    if (token.kind === "ListStart") {
      return { kind: "List", ...this.parseItems("ListEnd", (head) => this.parseListItem(head)) }
    }
    if (token.kind === "MapStart") {
      const seen: Primitive[] = []
      return { kind: "Map", ...this.parseItems("MapEnd", (head) => this.parseMapItem(head, seen)) }
    }
    if (!isPrimitive(token)) {
      this.error(`Expected a value, got ${describe(token)}`)
    }
    if (token.kind === "BareWordKey") {
      this.error(`Bare word ${token.src} is only allowed as a key`)
    }
    this.pos++
    return token
  }

  private parseListItem(head: Trivia): ListItem {
    return { head, val: this.parseValue(), tail: [] }
  }

  private parseMapItem(head: Trivia, seen: Primitive[]): MapItem {
    const at = this.pos
    const key = this.parseKey()
    if (seen.some((k) => deepEqual(k.val, key.val))) {
      this.error(`Duplicate key ${key.src}`, at)
    }
    seen.push(key)
    const sep = [...this.takeSpaces(), this.expect("Colon"), ...this.takeSpaces()]
    return { head, key, sep, val: this.parseValue(), tail: [] }
  }

  private parseItems<I extends Item>(
    endKind: SymbolKind,
    parseItem: (head: Trivia) => I
  ): Omit<Container, "kind" | "items"> & { items: I[] } {
    const head = [this.next(), ...this.lineRemainder()]
    const items: I[] = []
    for (;;) {
      const itemHead = this.takeTrivia()
      if (this.peek().kind === endKind) {
        return { head, items, tail: [...itemHead, this.next()] }
      }
      const item = parseItem(itemHead)
      const tail = this.takeSpaces()
      const hasComma = this.peek().kind === "Comma"
      if (hasComma) {
        tail.push(this.next())
      }
      tail.push(...this.lineRemainder())
      items.push({ ...item, tail })

      if (!hasComma) {
        const trivia = this.takeTrivia()
        if (this.peek().kind !== endKind) {
          this.error(`Expected "," or ${endKind}, got ${describe(this.peek())}`)
        }
        return { head, items, tail: [...trivia, this.next()] }
      }
    }
  }

  private parseTopLevelMap(): Container {
    const items: MapItem[] = []
    const seen: Primitive[] = []
    let head: Trivia = []
    for (;;) {
      const item = this.parseMapItem(head, seen)
      const tail = this.lineRemainder()
      items.push({ ...item, tail })
      if (!endsWithNewline(tail)) {
        if (this.peek().kind !== "EOF") {
          this.error(`Expected a newline, got ${describe(this.peek())}`)
        }
        break
      }
      const mark = this.pos
      head = this.takeTrivia()
      if (this.peek().kind === "EOF") {
        // trailing comments and blank lines belong to the document
        this.pos = mark
        break
      }
    }
    return { kind: "Map", head: [], items, tail: [] }
  }
}

export function parse(text: string): Doc {
  return parseFromTokens(tokenize(text))
}

/**
 * Parses an already tokenized stream. A stream without a final EOF token is
 * treated as if it had one.
 */
export function parseFromTokens(tokens: readonly Token[]): Doc {
  return new Parser(tokens).parseDoc()
}

/**
 * Parses a stream holding exactly one key (bare words allowed).
 */
export function parseKeyFromTokens(tokens: readonly Token[]): Primitive {
  return new Parser(tokens).parseKeyOnly()
}

type Unparseable = Doc | Item | Value

function writeTokens(tokens: Trivia, out: string[]): void {
  for (const token of tokens) {
    out.push(token.src)
  }
}

function write(node: Unparseable, out: string[]): void {
  if ("kind" in node) {
    if (isPrimitive(node)) {
      out.push(node.src)
      return
    }
    writeTokens(node.head, out)
    for (const item of node.items) {
      write(item, out)
    }
    writeTokens(node.tail, out)
    return
  }
  writeTokens(node.head, out)
  if ("key" in node) {
    out.push(node.key.src)
    writeTokens(node.sep, out)
  }
  write(node.val, out)
  writeTokens(node.tail, out)
}

/**
 * Flattens a tree back to text by concatenating the source of its tokens.
 */
export function unparse(node: Unparseable): string {
  const out: string[] = []
  write(node, out)
  return out.join("")
}

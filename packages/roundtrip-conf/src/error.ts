export type ConfErrorCode =
  | "ParseError"
  | "EmptyPath"
  | "NotIndexable"
  | "KeyNotFound"
  | "IndexOutOfRange"
  | "CannotDeleteLastTopLevelItem"
  | "NotAMap"
  | "InvalidKeyType"
  | "DuplicateKey"
  | "UnsupportedValue"
  | "InvariantViolation"

export class ConfError extends Error {
  readonly code: ConfErrorCode

  constructor(code: ConfErrorCode, msg: string) {
    super(msg)
    this.code = code

    // Set the prototype explicitly for better instanceof support
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Raised by the tokenizer and the parser. `line` and `column` are 1-based.
 */
export class ConfParseError extends ConfError {
  readonly line: number
  readonly column: number

  constructor(msg: string, line: number, column: number) {
    super("ParseError", `${msg} (line ${line}, column ${column})`)
    this.line = line
    this.column = column
  }
}

export function failure(code: ConfErrorCode, message: string): never {
  throw new ConfError(code, message)
}

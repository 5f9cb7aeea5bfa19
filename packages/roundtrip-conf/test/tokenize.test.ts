import { describe, expect, it } from "vitest"
import { ConfParseError } from "../src/error"
import { tokenize } from "../src/tokenize"

const shape = (text: string) => tokenize(text).map((t) => [t.kind, t.src])

describe("tokenize", () => {
  it("splits a line into tokens", () => {
    expect(shape("a: [1, 'x']  # c\n")).toStrictEqual([
      ["BareWordKey", "a"],
      ["Colon", ":"],
      ["Space", " "],
      ["ListStart", "["],
      ["Int", "1"],
      ["Comma", ","],
      ["Space", " "],
      ["String", "'x'"],
      ["ListEnd", "]"],
      ["Space", "  "],
      ["Comment", "# c"],
      ["NL", "\n"],
      ["EOF", ""],
    ])
  })

  it("tells indentation from inner spaces", () => {
    expect(shape("{\n    a: 1,\n}")).toStrictEqual([
      ["MapStart", "{"],
      ["NL", "\n"],
      ["Indent", "    "],
      ["BareWordKey", "a"],
      ["Colon", ":"],
      ["Space", " "],
      ["Int", "1"],
      ["Comma", ","],
      ["NL", "\n"],
      ["MapEnd", "}"],
      ["EOF", ""],
    ])
  })

  it("decodes primitive values", () => {
    const [float, , bool, , nil, , word, , str] = tokenize("-1.5e3 true null trueish \"q\"")
    expect(float).toStrictEqual({ kind: "Float", val: -1500, src: "-1.5e3" })
    expect(bool).toStrictEqual({ kind: "Bool", val: true, src: "true" })
    expect(nil).toStrictEqual({ kind: "Null", val: null, src: "null" })
    expect(word).toStrictEqual({ kind: "BareWordKey", val: "trueish", src: "trueish" })
    expect(str).toStrictEqual({ kind: "String", val: "q", src: '"q"' })
  })

  it("keeps CRLF newlines intact", () => {
    const tokens = tokenize("a: 1\r\nb: 2\r\n")
    expect(tokens.map((t) => t.src).join("")).toBe("a: 1\r\nb: 2\r\n")
    expect(tokens[4]).toStrictEqual({ kind: "NL", src: "\r\n" })
  })

  it("reports the position of an unexpected character", () => {
    expect(() => tokenize("a: 1\nb: @")).toThrow('Unexpected character "@" (line 2, column 4)')
    const fn = () => tokenize("a: 1\nb: @")
    expect(fn).toThrow(ConfParseError)
    expect(fn).toThrow(expect.objectContaining({ code: "ParseError", line: 2, column: 4 }))
  })

  it("rejects numbers glued to words", () => {
    expect(() => tokenize("123abc")).toThrow("(line 1, column 1)")
  })

  it("positions bad string escapes at the string", () => {
    expect(() => tokenize('x: "\\q"')).toThrow("(line 1, column 4)")
  })
})

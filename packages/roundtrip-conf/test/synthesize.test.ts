import { describe, expect, it } from "vitest"
import { dumps, loads } from "../src/api"
import type { ConfPrimitive, ConfValue } from "../src/native"
import { unparse } from "../src/parse"
import { DEFAULT_SETTINGS, indented } from "../src/settings"
import { toAst, toKeyAst, toTokens } from "../src/synthesize"

describe("synthesize", () => {
  describe("dumps", () => {
    it("writes a nested list of a top-level map one item per line", () => {
      expect(dumps({ x: [1, 2, 3] })).toBe("x: [\n    1,\n    2,\n    3,\n]\n")
    })

    it("quotes keys only when they are not bare words", () => {
      expect(dumps({ a: 1, b: "two words", "c-d": true, "e f": null, true: 0 })).toBe(
        'a: 1\nb: "two words"\nc-d: true\n"e f": null\n"true": 0\n'
      )
    })

    it("keeps small containers inline", () => {
      expect(dumps({ a: [1], b: {} })).toBe("a: [1]\nb: {}\n")
      expect(dumps({ a: [1] }, { inlineSmallContainers: false })).toBe("a: [\n    1,\n]\n")
    })

    it("indents nested containers one level per depth", () => {
      expect(dumps({ a: { b: [1, 2], c: 3 } })).toBe(
        "a: {\n    b: [\n        1,\n        2,\n    ],\n    c: 3,\n}\n"
      )
    })

    it("writes everything on one line when not indented", () => {
      expect(dumps({ a: 1, b: [1, 2] }, { indented: false })).toBe("{a: 1, b: [1, 2]}")
    })

    it("wraps the root map in braces without top-level form", () => {
      expect(dumps({ a: 1, b: 2 }, { topLevelMap: false })).toBe("{\n    a: 1,\n    b: 2,\n}")
    })

    it("quotes every key without bare keys", () => {
      expect(dumps({ a: 1 }, { bareKeys: false })).toBe('"a": 1\n')
    })

    it("writes non-string keys of a Map", () => {
      const value = new Map<ConfPrimitive, ConfValue>([
        [1, "one"],
        [true, null],
      ])
      expect(dumps(value)).toBe('1: "one"\ntrue: null\n')
    })

    it("writes numbers as ints or floats", () => {
      expect(dumps([1.5, -0.25, 10n])).toBe("[\n    1.5,\n    -0.25,\n    10,\n]")
    })

    it("writes integers beyond the safe range as floats", () => {
      const value = { a: 2 ** 60, b: 1e300 }
      expect(dumps(value)).toBe("a: 1152921504606847000.0\nb: 1e+300\n")
      expect(loads(dumps(value))).toStrictEqual(value)
    })

    it("writes empty containers and bare primitives", () => {
      expect(dumps({})).toBe("{}")
      expect(dumps([])).toBe("[]")
      expect(dumps("x")).toBe('"x"')
      expect(dumps(null)).toBe("null")
    })

    it("refuses values it cannot represent", () => {
      expect(() => dumps({ a: Number.NaN })).toThrow(expect.objectContaining({ code: "UnsupportedValue" }))
      expect(() => dumps([Number.NEGATIVE_INFINITY])).toThrow(expect.objectContaining({
        code: "UnsupportedValue",
      }))
    })
  })

  describe("projection identity", () => {
    const value: ConfValue = {
      name: "x",
      n: 3,
      f: 0.5,
      flags: [true, false, null],
      nested: { deep: [[1], { k: "v" }], empty: [] },
      "quoted key": "",
      escapes: 'line\n"quoted"\ttab',
    }

    it.each([
      { desc: "default options", options: {} },
      { desc: "one line", options: { indented: false } },
      { desc: "no small inline containers", options: { inlineSmallContainers: false } },
      { desc: "quoted keys", options: { bareKeys: false } },
    ])("reads back what it writes with $desc", ({ options }) => {
      expect(loads(dumps(value, options))).toStrictEqual(value)
    })

    it("reads back a Map with its key types", () => {
      const map = new Map<ConfPrimitive, ConfValue>([
        [2, "b"],
        [1, "a"],
        ["x", [1]],
        [false, 0.25],
        [null, null],
      ])
      expect(loads(dumps(map), { mapType: "map" })).toStrictEqual(map)
    })
  })

  it("emits the tokens of the multiline layout", () => {
    const tokens = toTokens([1, 2], { ...DEFAULT_SETTINGS, indent: 1 })
    expect(tokens.map((t) => [t.kind, t.src])).toStrictEqual([
      ["ListStart", "["],
      ["NL", "\n"],
      ["Indent", "        "],
      ["Int", "1"],
      ["Comma", ","],
      ["NL", "\n"],
      ["Indent", "        "],
      ["Int", "2"],
      ["Comma", ","],
      ["NL", "\n"],
      ["Indent", "    "],
      ["ListEnd", "]"],
    ])
  })

  it("parses its output into a real tree", () => {
    const node = toAst({ a: [1, 2] }, { ...DEFAULT_SETTINGS, indent: 0 }, { topLevelMap: true })
    expect(node.kind).toBe("Map")
    expect(unparse(node)).toBe("a: [\n    1,\n    2,\n]\n")
  })

  it("synthesizes keys, bare where possible", () => {
    expect(toKeyAst("plain")).toStrictEqual({ kind: "BareWordKey", val: "plain", src: "plain" })
    expect(toKeyAst("two words")).toStrictEqual({
      kind: "String",
      val: "two words",
      src: '"two words"',
    })
    expect(toKeyAst(7)).toStrictEqual({ kind: "Int", val: 7, src: "7" })
    expect(() => toKeyAst([1])).toThrow(expect.objectContaining({ code: "InvalidKeyType" }))
  })

  it("refuses to indent inline settings", () => {
    expect(() => indented(DEFAULT_SETTINGS)).toThrow(expect.objectContaining({ code: "InvariantViolation" }))
    expect(indented({ ...DEFAULT_SETTINGS, indent: 0 }).indent).toBe(1)
  })
})

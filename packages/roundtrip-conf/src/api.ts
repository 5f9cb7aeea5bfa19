import { text } from "node:stream/consumers"
import type { ConfValue } from "./native"
import { parse, unparse } from "./parse"
import type { ProjectOptions } from "./project"
import type { Settings } from "./settings"
import { toAst } from "./synthesize"
import { type ConfView, createDocumentView } from "./view"

export interface DumpOptions {
  /**
   * Lay out containers with two or more items one item per line, indented
   * by four spaces. When false everything is written on one line.
   * Default: true
   */
  indented?: boolean

  /**
   * Write string keys that are bare words without quotes.
   * Default: true
   */
  bareKeys?: boolean

  /**
   * Write a non-empty root mapping without braces, one `key: value` per line.
   * Only applies when `indented` is true.
   * Default: true
   */
  topLevelMap?: boolean

  /**
   * Keep containers with fewer than two items on one line.
   * Default: true
   */
  inlineSmallContainers?: boolean
}

function writeText(stream: NodeJS.WritableStream, s: string): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(s, (err) => {
      if (err) {
        reject(err)
      } else {
        resolve()
      }
    })
  })
}

/**
 * Parses `s` into a view that edits it in place, keeping its formatting.
 */
export function loadsRoundtrip(s: string): ConfView {
  return createDocumentView(parse(s))
}

/**
 * Writes out the whole document behind `view`.
 */
export function dumpsRoundtrip(view: ConfView): string {
  return unparse(view.root)
}

export async function loadRoundtrip(stream: NodeJS.ReadableStream): Promise<ConfView> {
  return loadsRoundtrip(await text(stream))
}

export async function dumpRoundtrip(view: ConfView, stream: NodeJS.WritableStream): Promise<void> {
  await writeText(stream, dumpsRoundtrip(view))
}

export function loads(s: string, options?: ProjectOptions): ConfValue {
  return loadsRoundtrip(s).value(options)
}

export function dumps(value: ConfValue, options: DumpOptions = {}): string {
  const settings: Settings = {
    indent: (options.indented ?? true) ? 0 : -1,
    bareKeys: options.bareKeys ?? true,
    inlineSmallContainers: options.inlineSmallContainers ?? true,
  }
  return unparse(toAst(value, settings, { topLevelMap: options.topLevelMap ?? true }))
}

export async function load(
  stream: NodeJS.ReadableStream,
  options?: ProjectOptions
): Promise<ConfValue> {
  return loads(await text(stream), options)
}

export async function dump(
  value: ConfValue,
  stream: NodeJS.WritableStream,
  options?: DumpOptions
): Promise<void> {
  await writeText(stream, dumps(value, options))
}

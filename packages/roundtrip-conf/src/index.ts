export {
  dump,
  dumpRoundtrip,
  type DumpOptions,
  dumps,
  dumpsRoundtrip,
  load,
  loadRoundtrip,
  loads,
  loadsRoundtrip,
} from "./api"
export type {
  Container,
  Doc,
  Item,
  ListItem,
  ListNode,
  MapItem,
  MapNode,
  Primitive,
  PrimitiveKind,
  Token,
  Value,
} from "./ast"
export { isMultiline, isTopLevelStyle } from "./ast"
export { deleteItem, getItem, keyIndex, setKey, setValue } from "./edit"
export { ConfError, type ConfErrorCode, ConfParseError } from "./error"
export type { ConfMap, ConfPrimitive, ConfRecord, ConfValue, Path } from "./native"
export { parse, parseFromTokens, parseKeyFromTokens, unparse } from "./parse"
export { isBareWord } from "./primitive"
export { type ProjectOptions, toValue } from "./project"
export { DEFAULT_SETTINGS, indented, type Settings } from "./settings"
export { toAst, toTokens, type ToTokensOptions } from "./synthesize"
export { tokenize } from "./tokenize"
export { ConfView, createDocumentView, type DocumentCell } from "./view"

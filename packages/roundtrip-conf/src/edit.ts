import { castDraft, type Draft, produce } from "immer"
import type { Container, Doc, Holder, Item, Value } from "./ast"
import { endsWithNewline, isContainer, isMultiline, isTopLevelStyle } from "./ast"
import { failure } from "./error"
import type { ConfPrimitive, ConfValue, Path } from "./native"
import { toAst, toKeyAst } from "./synthesize"
import { deepEqual } from "./utils"

function describeKey(key: ConfPrimitive): string {
  return typeof key === "string" ? JSON.stringify(key) : String(key)
}

/**
 * Position of `key` among the items of `node`.
 * Maps are searched by key value; lists take integer indices, negative ones
 * counting from the end.
 */
export function keyIndex(node: Value, key: ConfPrimitive): number {
  switch (node.kind) {
    case "Map": {
      const index = node.items.findIndex((item) => deepEqual(item.key.val, key))
      if (index < 0) {
        failure("KeyNotFound", `Key ${describeKey(key)} not found`)
      }
      return index
    }
    case "List": {
      const length = node.items.length
      if (typeof key !== "number" || !Number.isInteger(key) || key < -length || key >= length) {
        failure("IndexOutOfRange", `Index ${describeKey(key)} out of range for a list of ${length}`)
      }
      return key < 0 ? key + length : key
    }
    default:
      return failure("NotIndexable", `${node.kind} ${node.src} is not indexable`)
  }
}

function itemAt(value: Value, index: number): Item {
  if (!isContainer(value)) {
    return failure("InvariantViolation", `Expected a container, got ${value.kind}`)
  }
  return value.items[index]
}

/**
 * Follows `path` from the document, returning the item indices taken and
 * the item reached.
 */
function locate(doc: Doc, path: Path): { trail: number[]; holder: Holder } {
  const trail: number[] = []
  let holder: Holder = doc
  for (const key of path) {
    const index = keyIndex(holder.val, key)
    trail.push(index)
    holder = itemAt(holder.val, index)
  }
  return { trail, holder }
}

/**
 * The item at the end of `path`, or the document itself for the empty path.
 */
export function getItem(doc: Doc, path: Path): Holder {
  return locate(doc, path).holder
}

/**
 * Copies only the items along `trail` and puts `value` in the last one.
 * Every other subtree is shared with `doc`.
 */
function replaceAt(doc: Doc, trail: readonly number[], value: Value): Doc {
  return produce(doc, (draft) => {
    let holder: Draft<Holder> = draft
    for (const index of trail) {
      const val: Draft<Value> = holder.val
      if (val.kind !== "List" && val.kind !== "Map") {
        failure("InvariantViolation", `Expected a container, got ${val.kind}`)
      }
      holder = val.items[index]
    }
    holder.val = castDraft(value)
  })
}

/**
 * Applies `transform` to the container holding the item at `path` and
 * rebuilds the ancestors of that container.
 */
function modifyContainer(
  doc: Doc,
  path: Path,
  transform: (container: Container, index: number) => Container
): Doc {
  if (path.length === 0) {
    failure("EmptyPath", "Index into a container first")
  }
  const { trail, holder } = locate(doc, path.slice(0, -1))
  const index = keyIndex(holder.val, path[path.length - 1])
  const container = holder.val
  if (!isContainer(container)) {
    return failure("InvariantViolation", `Expected a container, got ${container.kind}`)
  }
  return replaceAt(doc, trail, transform(container, index))
}

function replaceItem<I extends Item>(
  items: readonly I[],
  index: number,
  update: (item: I) => I
): I[] {
  return items.map((item, i) => (i === index ? update(item) : item))
}

function updateItem(
  container: Container,
  index: number,
  update: <I extends Item>(item: I) => I
): Container {
  if (container.kind === "Map") {
    return { ...container, items: replaceItem(container.items, index, update) }
  }
  return { ...container, items: replaceItem(container.items, index, update) }
}

/**
 * Replaces the value at `path`. The item's own trivia (indentation, comma,
 * trailing comment) is kept as is; the empty path replaces the whole
 * document value.
 */
export function setValue(doc: Doc, path: Path, value: ConfValue): Doc {
  const node = toAst(value)
  if (path.length === 0) {
    return produce(doc, (draft) => {
      draft.val = castDraft(node)
    })
  }
  return modifyContainer(doc, path, (container, index) =>
    updateItem(container, index, <I extends Item>(item: I): I => ({ ...item, val: node }))
  )
}

/**
 * Replaces the key of the map item at `path`, keeping its value and trivia.
 */
export function setKey(doc: Doc, path: Path, newKey: ConfValue): Doc {
  return modifyContainer(doc, path, (container, index) => {
    if (container.kind !== "Map") {
      failure("NotAMap", `Can only replace Map keys, not ${container.kind}`)
    }
    const key = toKeyAst(newKey)
    if (container.items.some((item, i) => i !== index && deepEqual(item.key.val, key.val))) {
      failure("DuplicateKey", `Key ${key.src} already exists`)
    }
    return {
      ...container,
      items: replaceItem(container.items, index, (item) => ({ ...item, key })),
    }
  })
}

function withoutItem<I extends Item>(container: Container, items: readonly I[], index: number): I[] {
  const removed = items[index]
  const next = items.filter((_, i) => i !== index)
  const multiline = isMultiline(container)

  if (isTopLevelStyle(container) && next.length === 0) {
    failure(
      "CannotDeleteLastTopLevelItem",
      "Deleting the last element of a top level map is not allowed as it would result in an invalid document when written out"
    )
  } else if (!multiline && index === items.length - 1) {
    // the new last item of an inline container drops its ", "
    const last = next.length - 1
    if (last >= 0) {
      next[last] = { ...next[last], tail: [] }
    }
  } else if (
    multiline &&
    index > 0 &&
    removed.head.length === 0 &&
    endsWithNewline(removed.tail) &&
    !endsWithNewline(next[index - 1].tail)
  ) {
    // the removed item shared a line with the previous one, which now ends the line
    next[index - 1] = { ...next[index - 1], tail: removed.tail }
  } else if (
    multiline &&
    index + 1 < items.length &&
    removed.head.length > 0 &&
    !endsWithNewline(removed.tail)
  ) {
    // the following item shared the removed item's line and needs its indentation
    next[index] = { ...next[index], head: removed.head }
  }
  return next
}

/**
 * Removes the item at `path` and fixes up the trivia around it so the
 * document stays valid.
 */
export function deleteItem(doc: Doc, path: Path): Doc {
  return modifyContainer(doc, path, (container, index) => {
    if (container.kind === "Map") {
      return { ...container, items: withoutItem(container, container.items, index) }
    }
    return { ...container, items: withoutItem(container, container.items, index) }
  })
}

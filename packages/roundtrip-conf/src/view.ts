import type { Doc } from "./ast"
import { deleteItem, getItem, setKey, setValue } from "./edit"
import type { ConfPrimitive, ConfValue, Path } from "./native"
import { type ProjectOptions, toValue } from "./project"

/**
 * The one mutable slot shared by every view of a document.
 */
export interface DocumentCell {
  root: Doc
}

/**
 * A path-extending handle into a round-trip document.
 *
 * Views never hold nodes, only the shared cell and a path, so a write through
 * any view is seen by all of them. Each write swaps `cell.root` only once the
 * edit has succeeded; a failed edit leaves the document as it was.
 *
 * Views are not safe for concurrent writers.
 */
export class ConfView {
  constructor(
    private readonly cell: DocumentCell,
    readonly path: Path = []
  ) {}

  /**
   * The current document, shared with every other view of it.
   */
  get root(): Doc {
    return this.cell.root
  }

  at(key: ConfPrimitive): ConfView {
    return new ConfView(this.cell, [...this.path, key])
  }

  set(key: ConfPrimitive, value: ConfValue): void {
    this.cell.root = setValue(this.cell.root, [...this.path, key], value)
  }

  delete(key: ConfPrimitive): void {
    this.cell.root = deleteItem(this.cell.root, [...this.path, key])
  }

  /**
   * Renames the map key this view points at.
   */
  replaceKey(newKey: ConfValue): void {
    this.cell.root = setKey(this.cell.root, this.path, newKey)
  }

  replaceValue(value: ConfValue): void {
    this.cell.root = setValue(this.cell.root, this.path, value)
  }

  value(options?: ProjectOptions): ConfValue {
    return toValue(getItem(this.cell.root, this.path).val, options)
  }
}

export function createDocumentView(doc: Doc): ConfView {
  return new ConfView({ root: doc })
}

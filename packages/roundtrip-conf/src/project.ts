import type { Value } from "./ast"
import { failure } from "./error"
import type { ConfMap, ConfPrimitive, ConfRecord, ConfValue } from "./native"

export interface ProjectOptions {
  /**
   * How maps are returned.
   * - "object": plain objects, with keys converted by `String(key)`. Integer-like keys follow
   *   JavaScript property order rather than document order, and keys that convert to the same
   *   string (`1` and `"1"`) fail with `DuplicateKey`.
   * - "map": `Map` instances keyed by the decoded key values, in document order.
   *
   * Default: "object"
   */
  mapType?: "object" | "map"
}

/**
 * Flattens a tree into native values. Never mutates the tree.
 */
export function toValue(node: Value, options: ProjectOptions = {}): ConfValue {
  const mapType = options.mapType ?? "object"

  const project = (value: Value): ConfValue => {
    switch (value.kind) {
      case "String":
      case "BareWordKey":
      case "Bool":
      case "Null":
      case "Int":
      case "Float":
        return value.val
      case "List":
        return value.items.map((item) => project(item.val))
      case "Map": {
        const entries = value.items.map(
          (item): [ConfPrimitive, ConfValue] => [item.key.val, project(item.val)]
        )
        if (mapType === "map") {
          const map: ConfMap = new Map(entries)
          return map
        }
        const names = new Set<string>()
        const record: ConfRecord = Object.fromEntries(
          entries.map(([k, v]): [string, ConfValue] => {
            const name = String(k)
            if (names.has(name)) {
              failure("DuplicateKey", `Keys collide as "${name}" in an object; use mapType "map"`)
            }
            names.add(name)
            return [name, v]
          })
        )
        return record
      }
      default: {
        const unknown: never = value
        return failure("InvariantViolation", `Unknown node: ${String(unknown)}`)
      }
    }
  }

  return project(node)
}

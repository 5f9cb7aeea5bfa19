import type { Container, Value } from "../src/ast"
import { isContainer } from "../src/ast"

export function asContainer(value: Value): Container {
  if (!isContainer(value)) {
    throw new Error(`Expected a container, got ${value.kind}`)
  }
  return value
}

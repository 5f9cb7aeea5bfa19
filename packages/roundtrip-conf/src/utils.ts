import equal from "fast-deep-equal"
import type { ConfValue } from "./native"

/**
 * Deep equality check for native values.
 * Used to compare map keys and to detect duplicate keys.
 */
export function deepEqual(a: ConfValue, b: ConfValue): boolean {
  return equal(a, b)
}

/**
 * Checks if a value is a plain object (not an array, Map, class instance, etc.).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

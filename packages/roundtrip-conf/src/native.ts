/**
 * A native primitive.
 * Integers outside the safe range decode to `bigint`.
 */
export type ConfPrimitive = string | boolean | null | number | bigint

/**
 * A mapping with string keys.
 */
export type ConfRecord = { [k: string]: ConfValue }

/**
 * An ordered mapping. Unlike a record it keeps non-string keys and their
 * insertion order.
 */
export type ConfMap = Map<ConfPrimitive, ConfValue>

/**
 * A native value.
 */
export type ConfValue = ConfPrimitive | ConfValue[] | ConfRecord | ConfMap

/**
 * Map keys and list indices from the document root.
 * Resolution fails if any segment is missing or a type mismatch occurs.
 */
export type Path = readonly ConfPrimitive[]

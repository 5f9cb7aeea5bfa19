import { failure } from "./error"

/**
 * Formatting policy used when synthesizing tokens from native values.
 */
export interface Settings {
  /**
   * Current nesting depth for multiline rendering.
   * -1 means there is no nesting context and everything renders inline.
   */
  readonly indent: number

  /**
   * Write string keys that are bare words without quotes.
   */
  readonly bareKeys: boolean

  /**
   * Render containers with fewer than two items inline even when nested.
   */
  readonly inlineSmallContainers: boolean
}

export const DEFAULT_SETTINGS: Settings = Object.freeze({
  indent: -1,
  bareKeys: true,
  inlineSmallContainers: true,
})

/**
 * Settings for the children of a multiline container, one level deeper.
 */
export function indented(settings: Settings): Settings {
  if (settings.indent < 0) {
    failure("InvariantViolation", "Cannot indent settings that render inline")
  }
  return { ...settings, indent: settings.indent + 1 }
}

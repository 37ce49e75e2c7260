import type { ConfigValue } from "../../ports/value"
import { ConfigError } from "../errors/config-error"
import { valueToString } from "../value/value-to-string"

export type ReferenceLookup = (segments: readonly string[]) => ConfigValue | undefined

export type ResolvedString = {
  text: string
  substitutions: number
}

export function parseReference(reference: string, location: string): string[] {
  const segments = reference.split(".")

  if (segments.some((segment) => segment === "")) {
    throw ConfigError.invalidReferencePath(reference, location)
  }

  return segments
}

/**
 * Brings text into escaped form: every literal dollar written as `$$`,
 * `${...}` spans left as they are.
 */
export function escapeLiterals(text: string): string {
  if (!text.includes("$")) return text

  let out = ""
  let i = 0

  while (i < text.length) {
    const ch = text.charAt(i)
    const next = text.charAt(i + 1)

    if (ch !== "$") {
      out += ch
      i += 1
    } else if (next === "$") {
      out += "$$"
      i += 2
    } else if (next === "{") {
      const close = text.indexOf("}", i + 2)
      const end = close === -1 ? text.length : close + 1
      out += text.slice(i, end)
      i = end
    } else {
      out += "$$"
      i += 1
    }
  }

  return out
}

/** Turns escaped text back into its final form. */
export function unescapeLiterals(text: string): string {
  return text.replaceAll("$$", () => "$")
}

/**
 * One left-to-right scan of `text`, substituting every `${path}` with the
 * text of the scalar it names.
 *
 * The result stays in escaped form (literal dollars as `$$`). Text spliced in
 * is not rescanned; references it carries are left for the next pass.
 *
 * @param location - Dotted path of the string, reported in errors.
 */
export function resolveString(
  text: string,
  lookup: ReferenceLookup,
  location: string,
): ResolvedString {
  if (!text.includes("$")) return { text, substitutions: 0 }

  let out = ""
  let substitutions = 0
  let i = 0

  while (i < text.length) {
    const ch = text.charAt(i)
    const next = text.charAt(i + 1)

    if (ch !== "$") {
      out += ch
      i += 1
      continue
    }

    if (next === "$") {
      out += "$$"
      i += 2
      continue
    }

    if (next !== "{") {
      out += "$$"
      i += 1
      continue
    }

    const close = text.indexOf("}", i + 2)
    if (close === -1) throw ConfigError.unclosedReference(text, location)

    const reference = text.slice(i + 2, close)
    const target = lookup(parseReference(reference, location))
    if (target === undefined) throw ConfigError.referenceNotFound(reference, location)

    out += escapeLiterals(valueToString(target, reference, location))
    substitutions += 1
    i = close + 1
  }

  return { text: out, substitutions }
}

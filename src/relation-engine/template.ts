// src/relation-engine/template.ts

/**
 * Capture groups of the regex match that triggered a rule, `$0` being the
 * whole match. Empty for path rule level actions.
 */
export type Captures = readonly string[]

export const NO_CAPTURES: Captures = []

/**
 * Substitute `$0`, `$1`, ... in `template` with the captured text. Groups are
 * substituted in index order as literal text, so `$10` with fewer than eleven
 * groups becomes capture 1 followed by `0`.
 */
export function applyTemplate(template: string, captures: Captures): string {
  let out = template
  captures.forEach((capture, i) => {
    out = out.split(`$${i}`).join(capture)
  })
  return out
}

export function applyTemplates(templates: string[], captures: Captures): string[] {
  return templates.map(t => applyTemplate(t, captures))
}

/**
 * Turn a RegExp match into captures; groups that did not participate are empty.
 */
export function capturesOf(match: RegExpMatchArray): Captures {
  return Array.from(match, group => group ?? '')
}

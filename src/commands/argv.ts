// src/commands/argv.ts

/**
 * Long options that may also be written with a single dash, as in
 * `-config depsum.yaml -print-dep-stats`.
 */
const SINGLE_DASH_LONG_OPTIONS = new Set([
  'config',
  'verbose',
  'input-files',
  'print-dep-stats',
  'print-rev-dep-stats',
  'stats-sort',
  'self-profile',
  'out-dep-hashes',
  'out-relations',
  'out-recursive-deps',
  'out-recursive-deps-for',
  'hash-salt',
  'version'
])

/**
 * Rewrite `-name` and `-name=value` into their `--name` form. Everything after
 * a bare `--` is left alone.
 */
export function normalizeArgv(argv: string[]): string[] {
  const out: string[] = []
  let passthrough = false

  for (const arg of argv) {
    if (passthrough || arg === '--') {
      passthrough = true
      out.push(arg)
      continue
    }
    const match = /^-([a-z][a-z-]+)(=.*)?$/.exec(arg)
    if (match && SINGLE_DASH_LONG_OPTIONS.has(match[1])) {
      out.push(`--${match[1]}${match[2] ?? ''}`)
    } else {
      out.push(arg)
    }
  }

  return out
}

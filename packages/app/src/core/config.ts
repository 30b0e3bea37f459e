import type { CliArgs } from "./cli.js"
import type { Indent } from "./writer.js"
import { compact, pretty } from "./writer.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// QUOTE(TZ): "Priority: CLI flags > config file > defaults."
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: indent is a non-negative integer
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly pretty?: boolean
  /** Nesting level pretty output starts at. */
  readonly indent?: number
}

export interface ResolvedConfig {
  readonly pretty: boolean
  readonly indent: number
}

export const defaultConfigPath = "./.jsonkit.json"

export const defaults: ResolvedConfig = { pretty: false, indent: 0 }

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .jsonkit.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  pretty: cli.pretty ?? fileConfig?.pretty ?? defaults.pretty,
  indent: Math.max(0, Math.trunc(fileConfig?.indent ?? defaults.indent))
})

export const toIndent = (config: ResolvedConfig): Indent => config.pretty ? pretty(config.indent) : compact

#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { renderError } from "../core/errors.js"
import { runCli } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// QUOTE(TZ): "Exit code 0 on success, 1 on any failure with the message on stderr."
// REF: req-cli-exit-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) terminates with exitCode 0 on success and 1 on any AppError
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: every AppError is reported on stderr exactly once
// COMPLEXITY: O(1)

const main = runCli(process.argv).pipe(
  Effect.flatMap((result) =>
    Effect.sync(() => {
      process.exitCode = result.exitCode
    })
  ),
  Effect.catchAll((error) =>
    Effect.sync(() => {
      process.stderr.write(`${renderError(error)}\n`)
      process.exitCode = 1
    })
  )
)

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))

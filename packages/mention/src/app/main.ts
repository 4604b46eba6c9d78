#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { program } from "./program.js"

// CHANGE: expose the mention formatter as the chat-mention executable
// WHY: a decode failure must surface as CliError text and a non-zero exit code
// REF: mention-cli
// FORMAT THEOREM: forall args: decode(args) fails -> exitCode != 0
// PURITY: SHELL
// EFFECT: Effect<void, CliError>
// INVARIANT: stdout carries only the formatted mention
// COMPLEXITY: O(1)/O(1)
NodeRuntime.runMain(program.pipe(Effect.provide(NodeContext.layer)))

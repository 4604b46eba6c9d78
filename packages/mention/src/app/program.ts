import { Console, Effect, pipe } from "effect"

import { formatMention, type MentionKind } from "../core/mention.js"
import { readMentionTarget } from "../shell/cli.js"

const logFormatting = (kind: MentionKind): Effect.Effect<void> => Effect.logDebug(`Formatting ${kind} mention`)

// CHANGE: compose the mention program from boundary decoding and the pure formatter
// WHY: the core stays free of effects, only the shell reads argv and writes output
// REF: mention-cli
// FORMAT THEOREM: forall args: decode(args) = t -> stdout = formatMention(t)
// PURITY: SHELL
// EFFECT: Effect<void, CliError>
// INVARIANT: exactly one line is printed on success
// COMPLEXITY: O(1)/O(1)
export const program = pipe(
  readMentionTarget,
  Effect.tap((target) => logFormatting(target.kind)),
  Effect.map(formatMention),
  Effect.flatMap((text) => Console.log(text))
)

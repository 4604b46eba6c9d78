import * as S from "@effect/schema/Schema"
import { Data, Effect, Match, pipe } from "effect"

import { ChannelId, EmojiId, GuildId, RoleId, UserId } from "../core/brand.js"
import { channelTarget, type MentionTarget, roleTarget, userTarget } from "../core/mention.js"

export class CliError extends Data.TaggedError("CliError")<{
  readonly message: string
}> {}

const animatedFlag = "--animated"

// Decimal digits only: BigInt() alone would also take "0x10" or " 12 ".
const Snowflake = S.compose(S.String.pipe(S.pattern(/^-?\d+$/u)), S.BigInt)

const noRest = { rest: S.Undefined }

const cliSchema = S.Union(
  S.Struct({ kind: S.Literal("user"), id: Snowflake, ...noRest }),
  S.Struct({ kind: S.Literal("role"), id: Snowflake, ...noRest }),
  S.Struct({ kind: S.Literal("channel"), id: Snowflake, ...noRest }),
  S.Struct({
    kind: S.Literal("emoji"),
    id: Snowflake,
    name: S.optional(S.NonEmptyString),
    animated: S.Boolean,
    ...noRest
  }),
  S.Struct({ kind: S.Literal("member"), guildId: Snowflake, userId: Snowflake, ...noRest })
)

type CliInput = S.Schema.Type<typeof cliSchema>

const leftover = (args: ReadonlyArray<string>, used: number): ReadonlyArray<string> | undefined =>
  args.length > used ? args.slice(used) : undefined

// The animated flag may appear anywhere; any positional argument past the
// ones a kind takes lands in `rest` and fails decoding.
const toRawInput = (args: ReadonlyArray<string>): Readonly<Record<string, unknown>> => {
  const animated = args.includes(animatedFlag)
  const [kind, ...positional] = args.filter((arg) => arg !== animatedFlag)
  const [first, second] = positional
  if (kind === "member") {
    return { kind, guildId: first, userId: second, rest: leftover(positional, 2) }
  }
  if (kind === "emoji") {
    return { kind, id: first, name: second, animated, rest: leftover(positional, 2) }
  }
  return { kind, id: first, rest: leftover(positional, 1) }
}

const toTarget = (input: CliInput): MentionTarget =>
  Match.value(input).pipe(
    Match.when({ kind: "user" }, ({ id }): MentionTarget => userTarget(UserId(id))),
    Match.when({ kind: "role" }, ({ id }): MentionTarget => roleTarget(RoleId(id))),
    Match.when({ kind: "channel" }, ({ id }): MentionTarget => channelTarget(ChannelId(id))),
    Match.when({ kind: "emoji" }, ({ animated, id, name }): MentionTarget => ({
      kind: "emoji",
      id: EmojiId(id),
      name: name ?? null,
      animated
    })),
    Match.when({ kind: "member" }, ({ guildId, userId }): MentionTarget => ({
      kind: "member",
      guildId: GuildId(guildId),
      userId: UserId(userId)
    })),
    Match.exhaustive
  )

// CHANGE: decode command-line arguments into a mention target
// WHY: keep boundary data validated before entering the core
// REF: mention-cli
// FORMAT THEOREM: forall args: decode(args) = t -> formatMention(t) is defined
// PURITY: SHELL
// EFFECT: Effect<MentionTarget, CliError>
// INVARIANT: identifiers are decoded from decimal text without range checks
// INVARIANT: surplus positional arguments are rejected
// COMPLEXITY: O(n)/O(n)
export const readMentionTarget = pipe(
  Effect.sync(() => process.argv.slice(2)),
  Effect.map(toRawInput),
  Effect.flatMap(S.decodeUnknown(cliSchema)),
  Effect.map(toTarget),
  Effect.mapError((error) => new CliError({ message: error.message }))
)

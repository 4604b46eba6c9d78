import { Match } from "effect"

import type { ChannelId, EmojiId, GuildId, RoleId, UserId } from "./brand.js"
import type { Channel, CurrentUser, Emoji, GuildChannel, Member, Role, User } from "./domain.js"

export type MentionTarget =
  | { readonly kind: "user"; readonly id: UserId }
  | { readonly kind: "role"; readonly id: RoleId }
  | { readonly kind: "channel"; readonly id: ChannelId }
  | {
    readonly kind: "emoji"
    readonly id: EmojiId
    readonly name: string | null
    readonly animated: boolean
  }
  | { readonly kind: "member"; readonly guildId: GuildId; readonly userId: UserId }

export type MentionKind = MentionTarget["kind"]

const fallbackEmojiName = "emoji"

// Emoji names are limited to [A-Za-z0-9_] on the platform side.
const emojiName = (name: string | null): string => {
  const cleaned = (name ?? "").replace(/[^A-Za-z0-9_]/gu, "_")
  return cleaned.length > 0 ? cleaned : fallbackEmojiName
}

// CHANGE: render every mention kind through one exhaustive match
// WHY: the delimiter grammar must be byte-exact for the chat renderer to pick it up
// REF: mention-format
// SOURCE: https://discord.com/developers/docs/reference#message-formatting
// FORMAT THEOREM: forall t: formatMention(t) startsWith("<") ∧ endsWith(">")
// PURITY: CORE
// INVARIANT: member mentions ignore the guild and render as the user mention
// COMPLEXITY: O(n)/O(n) where n = |emoji name|
export const formatMention = (target: MentionTarget): string =>
  Match.value(target).pipe(
    Match.when({ kind: "user" }, ({ id }) => `<@${id}>`),
    Match.when({ kind: "role" }, ({ id }) => `<@&${id}>`),
    Match.when({ kind: "channel" }, ({ id }) => `<#${id}>`),
    Match.when(
      { kind: "emoji" },
      ({ animated, id, name }) => `<${animated ? "a" : ""}:${emojiName(name)}:${id}>`
    ),
    Match.when({ kind: "member" }, ({ userId }) => `<@${userId}>`),
    Match.exhaustive
  )

export const guildChannelId = (channel: GuildChannel): ChannelId => channel.id

const channelId = (channel: Channel | GuildChannel): ChannelId =>
  channel.kind === "guild" ? guildChannelId(channel.channel) : channel.id

/**
 * Projects a user id, user or the current user onto a user mention target.
 */
export const userTarget = (user: UserId | User | CurrentUser): MentionTarget => ({
  kind: "user",
  id: typeof user === "bigint" ? user : user.id
})

export const memberTarget = (member: Member): MentionTarget => ({
  kind: "member",
  guildId: member.guildId,
  userId: member.user.id
})

export const roleTarget = (role: RoleId | Role): MentionTarget => ({
  kind: "role",
  id: typeof role === "bigint" ? role : role.id
})

/**
 * Group, private and guild channels of any variant all mention by their own id.
 */
export const channelTarget = (channel: ChannelId | Channel | GuildChannel): MentionTarget => ({
  kind: "channel",
  id: typeof channel === "bigint" ? channel : channelId(channel)
})

/**
 * A bare emoji id has no name, so it renders with the fallback name as a
 * static emoji.
 */
export const emojiTarget = (emoji: EmojiId | Emoji): MentionTarget =>
  typeof emoji === "bigint"
    ? { kind: "emoji", id: emoji, name: null, animated: false }
    : { kind: "emoji", id: emoji.id, name: emoji.name, animated: emoji.animated }

export const mentionUser = (user: UserId | User | CurrentUser): string => formatMention(userTarget(user))

export const mentionMember = (member: Member): string => formatMention(memberTarget(member))

export const mentionRole = (role: RoleId | Role): string => formatMention(roleTarget(role))

export const mentionChannel = (channel: ChannelId | Channel | GuildChannel): string =>
  formatMention(channelTarget(channel))

export const mentionEmoji = (emoji: EmojiId | Emoji): string => formatMention(emojiTarget(emoji))

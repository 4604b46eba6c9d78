import type { ChannelId, EmojiId, GuildId, RoleId, UserId } from "./brand.js"

export type User = {
  readonly id: UserId
  readonly name: string
  readonly bot: boolean
}

export type CurrentUser = {
  readonly id: UserId
  readonly name: string
  readonly verified: boolean
}

export type Member = {
  readonly guildId: GuildId
  readonly user: User
  readonly nick: string | null
}

export type Role = {
  readonly id: RoleId
  readonly name: string
}

export type Emoji = {
  readonly id: EmojiId
  readonly name: string
  readonly animated: boolean
}

export type GuildChannel =
  | {
    readonly kind: "category"
    readonly id: ChannelId
    readonly guildId: GuildId
    readonly name: string
  }
  | {
    readonly kind: "text"
    readonly id: ChannelId
    readonly guildId: GuildId
    readonly name: string
  }
  | {
    readonly kind: "voice"
    readonly id: ChannelId
    readonly guildId: GuildId
    readonly name: string
  }

export type Channel =
  | {
    readonly kind: "group"
    readonly id: ChannelId
    readonly name: string | null
  }
  | {
    readonly kind: "private"
    readonly id: ChannelId
    readonly recipient: User
  }
  | {
    readonly kind: "guild"
    readonly channel: GuildChannel
  }

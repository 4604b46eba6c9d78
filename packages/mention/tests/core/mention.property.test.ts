import { describe, expect, it } from "@effect/vitest"
import fc from "fast-check"

import { ChannelId, EmojiId, GuildId, RoleId, UserId } from "../../src/core/brand.js"
import { formatMention, mentionChannel, type MentionTarget } from "../../src/core/mention.js"
import { guildChannelArb, snowflakeArb } from "./property-helpers.js"

const targetArb: fc.Arbitrary<MentionTarget> = fc.oneof(
  snowflakeArb.map((id): MentionTarget => ({ kind: "user", id: UserId(id) })),
  snowflakeArb.map((id): MentionTarget => ({ kind: "role", id: RoleId(id) })),
  snowflakeArb.map((id): MentionTarget => ({ kind: "channel", id: ChannelId(id) })),
  fc.tuple(snowflakeArb, fc.option(fc.string(), { nil: null }), fc.boolean())
    .map(([id, name, animated]): MentionTarget => ({ kind: "emoji", id: EmojiId(id), name, animated })),
  fc.tuple(snowflakeArb, snowflakeArb)
    .map(([guildId, userId]): MentionTarget => ({ kind: "member", guildId: GuildId(guildId), userId: UserId(userId) }))
)

describe("mention properties", () => {
  it("formats users, roles and channels with their decimal id", () => {
    fc.assert(
      fc.property(snowflakeArb, (id) => {
        expect(formatMention({ kind: "user", id: UserId(id) })).toBe(`<@${id.toString()}>`)
        expect(formatMention({ kind: "role", id: RoleId(id) })).toBe(`<@&${id.toString()}>`)
        expect(formatMention({ kind: "channel", id: ChannelId(id) })).toBe(`<#${id.toString()}>`)
      })
    )
  })

  it("member mentions ignore the guild", () => {
    fc.assert(
      fc.property(snowflakeArb, snowflakeArb, (guildId, userId) => {
        const member = formatMention({ kind: "member", guildId: GuildId(guildId), userId: UserId(userId) })
        expect(member).toBe(formatMention({ kind: "user", id: UserId(userId) }))
      })
    )
  })

  it("is deterministic", () => {
    fc.assert(
      fc.property(targetArb, (target) => {
        expect(formatMention(target)).toBe(formatMention(target))
      })
    )
  })

  it("closes every mention once and never contains whitespace", () => {
    fc.assert(
      fc.property(targetArb, (target) => {
        const text = formatMention(target)
        expect(text.startsWith("<")).toBe(true)
        expect(text.endsWith(">")).toBe(true)
        expect(text.split(">").length).toBe(2)
        expect(/\s/u.test(text)).toBe(false)
      })
    )
  })

  it("emoji mentions keep the tag grammar for any name", () => {
    fc.assert(
      fc.property(snowflakeArb, fc.option(fc.string(), { nil: null }), fc.boolean(), (id, name, animated) => {
        const text = formatMention({ kind: "emoji", id: EmojiId(id), name, animated })
        expect(/^<a?:\w+:\d+>$/u.test(text)).toBe(true)
        expect(text.startsWith("<a:")).toBe(animated)
      })
    )
  })

  it("guild channels mention by their own id", () => {
    fc.assert(
      fc.property(guildChannelArb, (channel) => {
        expect(mentionChannel(channel)).toBe(`<#${channel.id.toString()}>`)
        expect(mentionChannel({ kind: "guild", channel })).toBe(`<#${channel.id.toString()}>`)
      })
    )
  })
})

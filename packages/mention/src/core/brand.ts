// CHANGE: introduce branded snowflake identifiers for every mentionable entity
// WHY: a role id must never be formatted as a user mention by accident
// REF: mention-identifiers
// SOURCE: https://discord.com/developers/docs/reference#snowflakes
// FORMAT THEOREM: forall x in IdDomain: brand(x) -> preserves(value(x))
// PURITY: CORE
// INVARIANT: brands are only created in this axiomatic module
// COMPLEXITY: O(1)/O(1)
export type Brand<T, Name extends string> = T & { readonly __brand: Name }

// Snowflakes are unsigned 64-bit, so they live in bigint rather than number.
export type Snowflake = bigint

export type UserId = Brand<Snowflake, "UserId">
export type RoleId = Brand<Snowflake, "RoleId">
export type ChannelId = Brand<Snowflake, "ChannelId">
export type EmojiId = Brand<Snowflake, "EmojiId">
export type GuildId = Brand<Snowflake, "GuildId">

// CHANGE: provide constructors for branded identifiers at the boundary
// WHY: ensure ids are created explicitly and never mixed by accident
// FORMAT THEOREM: forall n in BigInt: UserId(n) = n ∧ type(UserId(n)) = UserId
// PURITY: CORE
// INVARIANT: branding does not change runtime representation
// COMPLEXITY: O(1)/O(1)
export const UserId = (value: Snowflake): UserId => value as UserId

// FORMAT THEOREM: forall n in BigInt: RoleId(n) = n
export const RoleId = (value: Snowflake): RoleId => value as RoleId

// FORMAT THEOREM: forall n in BigInt: ChannelId(n) = n
export const ChannelId = (value: Snowflake): ChannelId => value as ChannelId

// FORMAT THEOREM: forall n in BigInt: EmojiId(n) = n
export const EmojiId = (value: Snowflake): EmojiId => value as EmojiId

// CHANGE: provide constructors for guild identifiers
// WHY: member mentions carry their guild alongside the user id
// FORMAT THEOREM: forall n in BigInt: GuildId(n) = n
// PURITY: CORE
// INVARIANT: no range check, negative values are carried unchanged
// COMPLEXITY: O(1)/O(1)
export const GuildId = (value: Snowflake): GuildId => value as GuildId

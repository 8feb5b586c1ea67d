// Common types used across the protocol

/**
 * 64-bit snowflake identifier.
 *
 * Snowflakes are ordered by creation time, so a numerically smaller ID
 * belongs to an older entity.
 */
export type Snowflake = bigint;

export type GuildId = Snowflake;
export type RoleId = Snowflake;
export type UserId = Snowflake;
export type ChannelId = Snowflake;

/**
 * Milliseconds between the Unix epoch and the first second of 2015,
 * the epoch snowflake timestamps count from.
 */
export const SNOWFLAKE_EPOCH = 1420070400000n;

/**
 * Creation time encoded in the upper bits of a snowflake, in Unix milliseconds.
 */
export function snowflakeTimestamp(id: Snowflake): number {
  return Number((id >> 22n) + SNOWFLAKE_EPOCH);
}

/**
 * ID of a guild's implicit @everyone role.
 *
 * Every guild carries a baseline role that all members hold without it being
 * listed on the member. It shares its ID with the guild.
 */
export function everyoneRoleId(guildId: GuildId): RoleId {
  return guildId;
}

/**
 * Order two snowflakes numerically.
 */
export function compareSnowflakes(a: Snowflake, b: Snowflake): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

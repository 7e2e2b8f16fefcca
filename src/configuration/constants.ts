/**
 * Canonical environment keys read by the bot.
 *
 * Invariants:
 * - Keys are public: renaming one breaks existing `.env` files.
 * - `BotToken` is consumed by `seyfert.config.js`, not by the schema in `./env`.
 */
export enum EnvKey {
  BotToken = "BOT_TOKEN",
  Organizers = "MARATHON_ORGANIZERS",
  HomeGuild = "HOME_GUILD_ID",
  LogLevel = "LOG_LEVEL",
  DataDir = "MARATHON_DATA_DIR",
}

export const DEFAULT_DATA_DIR = "data/marathon";

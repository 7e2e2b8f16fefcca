/**
 * Bot configuration read from the process environment.
 *
 * Role in system:
 * - Parsed once at bootstrap (and lazily by commands) through `getBotConfig()`.
 * - The zod schema applies defaults, so an empty environment yields a usable config
 *   with no organizers.
 *
 * Gotchas:
 * - Organizer ids are trimmed and empty entries dropped, so `"1, 2,"` means `["1", "2"]`.
 * - Invalid values throw at parse time; the bootstrap logs and exits on that error.
 */
import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "@/utils/logger";
import { DEFAULT_DATA_DIR, EnvKey } from "./constants";

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

export const BotEnvSchema = z.object({
  [EnvKey.Organizers]: z
    .string()
    .optional()
    .transform((raw) =>
      (raw ?? "")
        .split(",")
        .map((id) => id.trim())
        .filter((id) => id.length > 0),
    )
    .pipe(z.array(z.string().regex(/^\d+$/, "organizer ids must be numeric snowflakes"))),
  [EnvKey.HomeGuild]: optionalString.pipe(
    z.string().regex(/^\d+$/, "HOME_GUILD_ID must be a numeric snowflake").optional(),
  ),
  [EnvKey.LogLevel]: z
    .string()
    .optional()
    .transform((raw) => raw?.trim().toLowerCase() || "info")
    .pipe(z.enum(LOG_LEVELS)),
  [EnvKey.DataDir]: optionalString.transform((dir) => dir ?? DEFAULT_DATA_DIR),
});

export interface BotConfig {
  /** Users allowed to run organizer commands. */
  organizers: ReadonlySet<string>;
  /** Guild the slash commands are registered to; global registration when absent. */
  homeGuildId?: string;
  logLevel: LogLevel;
  /** Directory holding puzzles.yaml, teams.yaml and attempts.yaml. */
  dataDir: string;
}

export function parseBotConfig(env: Record<string, string | undefined>): BotConfig {
  const parsed = BotEnvSchema.parse(env);
  return {
    organizers: new Set(parsed[EnvKey.Organizers]),
    homeGuildId: parsed[EnvKey.HomeGuild],
    logLevel: parsed[EnvKey.LogLevel],
    dataDir: parsed[EnvKey.DataDir],
  };
}

let cached: BotConfig | null = null;

/** Config for the running process, parsed from `process.env` on first use. */
export function getBotConfig(): BotConfig {
  if (!cached) {
    cached = parseBotConfig(process.env);
  }
  return cached;
}

/**
 * Seyfert API Adapter Layer.
 *
 * Purpose: Translate between Seyfert and the marathon service.
 * - Context parsing: caller id, guild, channel and role ids.
 * - Reply sink: `MarathonReply` → embed, with ephemeral flag and timed deletion.
 * - A subcommand base that reports failures instead of letting them escape.
 *
 * Lives outside `src/commands` so the command loader never mistakes the base class for
 * a subcommand.
 */

import type { AutocompleteInteraction, CommandContext, UsingClient } from "seyfert";
import { SubCommand } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";

import {
  ETHEREAL_TTL_MS,
  MarathonLookupError,
  failure,
  type MarathonCaller,
  type MarathonInvocation,
  type MarathonReply,
  type MarathonReplySink,
  type TeamCandidate,
} from "@/modules/marathon";
import { buildReplyEmbed } from "@/modules/ui/design-system";
import { createLogger } from "@/utils/logger";

const log = createLogger("seyfert");

// =============================================================================
// Context parsing
// =============================================================================

export function callerFromContext(ctx: CommandContext): MarathonCaller {
  return {
    userId: ctx.author.id,
    guildId: ctx.guildId,
    channelId: ctx.channelId,
    roleIds: ctx.member?.roles.keys ?? [],
  };
}

export function candidateFromInteraction(interaction: AutocompleteInteraction): TeamCandidate {
  return {
    userId: interaction.user.id,
    guildId: interaction.guildId,
    roleIds: interaction.member?.roles.keys ?? [],
  };
}

/**
 * Resolve another user (a `player` option) as a team candidate in this guild.
 * Outside a guild, or when the member cannot be fetched, only direct membership counts.
 */
export async function candidateForUser(
  client: UsingClient,
  guildId: string | undefined,
  userId: string,
): Promise<TeamCandidate> {
  if (!guildId) return { userId, roleIds: [] };

  try {
    const member = await client.members.fetch(guildId, userId);
    return { userId, guildId, roleIds: member.roles.keys };
  } catch (error) {
    log.warn(`could not fetch member ${userId} in ${guildId}; checking direct membership only`, error);
    return { userId, guildId, roleIds: [] };
  }
}

// =============================================================================
// Replies
// =============================================================================

/**
 * Sends a reply as an embed. Expiring replies are deleted after `ETHEREAL_TTL_MS`.
 */
export function replySinkFor(ctx: CommandContext): MarathonReplySink {
  return {
    async send(reply: MarathonReply) {
      await ctx.write({
        embeds: [buildReplyEmbed(reply)],
        flags: reply.ephemeral ? MessageFlags.Ephemeral : undefined,
      });

      if (reply.expiring) {
        setTimeout(() => {
          ctx.deleteResponse().catch((error: unknown) => {
            log.debug("could not delete expired reply:", error);
          });
        }, ETHEREAL_TTL_MS);
      }
    },
  };
}

export function invocationFor(ctx: CommandContext): MarathonInvocation {
  return { caller: callerFromContext(ctx), reply: replySinkFor(ctx) };
}

/** Download an uploaded file's text. */
export async function fetchAttachmentText(url: string): Promise<string> {
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`Could not download attachment (HTTP ${response.status})`);
  }
  return response.text();
}

// =============================================================================
// Commands
// =============================================================================

/**
 * Base for marathon subcommands: a failure inside `run` (an unknown team or puzzle, a
 * Discord error) is logged and answered with an error embed.
 */
export abstract class ReportingSubCommand extends SubCommand {
  async onRunError(ctx: CommandContext, error: unknown) {
    const cause = error instanceof Error ? error : new Error(String(error));
    if (cause instanceof MarathonLookupError) {
      log.warn(`/${ctx.fullCommandName}: ${cause.message}`);
    } else {
      log.error(`/${ctx.fullCommandName} failed:`, cause);
    }

    try {
      await replySinkFor(ctx).send(failure({ error: cause }));
    } catch (replyError) {
      log.error("could not report the failure to the caller:", replyError);
    }
  }

  /** The guard middleware already answered. */
  async onMiddlewaresError(ctx: CommandContext, error: string) {
    log.debug(`/${ctx.fullCommandName} stopped by middleware: ${error}`);
  }
}

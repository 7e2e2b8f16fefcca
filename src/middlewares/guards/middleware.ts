/**
 * Purpose: Enforce guard metadata (guild-only) before a command runs.
 * Context: Registered as the `guard` middleware and opted into per command with
 * `@Middlewares(["guard"])`.
 * Gotchas:
 * - stop() triggers the command's onMiddlewaresError; the marathon base command treats
 *   that as already answered to avoid a double reply.
 */
import { createMiddleware } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { buildReplyEmbed } from "@/modules/ui/design-system";
import { guildOnly, type MarathonReply } from "@/modules/marathon/views";
import { getGuardMetadata } from "./decorator";

/** The denial to send for `command` in this context, or null when it may run. */
export function guardViolation(command: unknown, guildId: string | undefined): MarathonReply | null {
  const metadata = getGuardMetadata(command);

  // No metadata means the command opted out of guard checks.
  if (!metadata) return null;

  if (metadata.guildOnly && !guildId) return guildOnly();

  return null;
}

export const guardMiddleware = createMiddleware<void>(async ({ context, next, stop }) => {
  const denial = guardViolation(context.command, context.guildId);
  if (!denial) return next();

  await context.write({
    embeds: [buildReplyEmbed(denial)],
    flags: MessageFlags.Ephemeral,
  });
  return stop("No guild context");
});

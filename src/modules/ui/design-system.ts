/**
 * UI Design System
 *
 * Purpose: Colors and the one embed builder every marathon reply goes through, so
 * confirmations, denials and errors look the same across commands.
 */

import { Embed } from "seyfert";
import { ReplyTone, type MarathonReply } from "@/modules/marathon/views";

// ============================================================================
// COLOR PALETTE
// ============================================================================

/** Semantic colors, not color names. */
export const UIColors = {
    brand: 0x1a1a2e,
    success: 0x10b981,
    warning: 0xf59e0b,
    error: 0xef4444,
    info: 0x6366f1,
} as const;

export function getToneColor(tone: ReplyTone): number {
    switch (tone) {
        case ReplyTone.Success: return UIColors.success;
        case ReplyTone.Denied: return UIColors.warning;
        case ReplyTone.Error: return UIColors.error;
        case ReplyTone.Info: return UIColors.info;
        default: return UIColors.brand;
    }
}

export const FOOTER_TEXT = "Puzzle Marathon";

// ============================================================================
// EMBED BUILDERS
// ============================================================================

/**
 * Render a marathon reply as an embed (title, description, tone color, footer, timestamp).
 */
export function buildReplyEmbed(reply: MarathonReply, timestamp: Date = new Date()): Embed {
    return new Embed()
        .setColor(getToneColor(reply.tone))
        .setTitle(reply.title)
        .setDescription(reply.description)
        .setFooter({ text: FOOTER_TEXT })
        .setTimestamp(timestamp);
}

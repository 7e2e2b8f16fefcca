import { describe, it, expect } from "vitest";
import { FOOTER_TEXT, UIColors, buildReplyEmbed, getToneColor } from "@/modules/ui/design-system";
import { ReplyTone, notOnTeam } from "@/modules/marathon/views";

describe("design system", () => {
  it("maps reply tones to colors", () => {
    expect(getToneColor(ReplyTone.Success)).toBe(UIColors.success);
    expect(getToneColor(ReplyTone.Denied)).toBe(UIColors.warning);
    expect(getToneColor(ReplyTone.Error)).toBe(UIColors.error);
    expect(getToneColor(ReplyTone.Info)).toBe(UIColors.info);
  });

  it("renders a reply as an embed", () => {
    const embed = buildReplyEmbed(notOnTeam()).toJSON();

    expect(embed.title).toBe("Sorry, you can't do that.");
    expect(embed.description).toBe("You need to be on a team to do that.");
    expect(embed.color).toBe(UIColors.warning);
    expect(embed.footer?.text).toBe(FOOTER_TEXT);
  });
});

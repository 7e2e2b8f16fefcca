/**
 * Motivación: registrar el comando "marathon / remove_player".
 */
import { createStringOption, createUserOption, Declare, Options, type CommandContext } from "seyfert";
import { ReportingSubCommand, candidateForUser, invocationFor } from "@/adapters/seyfert";
import { getMarathonService, respondTeamAutocomplete } from "./shared";

const options = {
  player: createUserOption({
    description: "the player to remove",
    required: true,
  }),
  team: createStringOption({
    description: "the team to configure",
    required: true,
    autocomplete: respondTeamAutocomplete,
  }),
};

@Declare({
  name: "remove_player",
  description: "Remove a player from a team",
})
@Options(options)
export default class MarathonRemovePlayerCommand extends ReportingSubCommand {
  async run(ctx: CommandContext<typeof options>) {
    const player = await candidateForUser(ctx.client, ctx.guildId, ctx.options.player.id);
    await getMarathonService().removePlayer(invocationFor(ctx), player, ctx.options.team);
  }
}

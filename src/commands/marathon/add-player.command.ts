/**
 * Motivación: registrar el comando "marathon / add_player".
 *
 * Idea/concepto: resuelve los roles del jugador en el servidor para que el servicio detecte
 * si ya pertenece a un equipo por rol o por lista.
 */
import { createStringOption, createUserOption, Declare, Options, type CommandContext } from "seyfert";
import { ReportingSubCommand, candidateForUser, invocationFor } from "@/adapters/seyfert";
import { getMarathonService, respondTeamAutocomplete } from "./shared";

const options = {
  player: createUserOption({
    description: "the player to add",
    required: true,
  }),
  team: createStringOption({
    description: "the team to configure",
    required: true,
    autocomplete: respondTeamAutocomplete,
  }),
};

@Declare({
  name: "add_player",
  description: "Add a player to a team",
})
@Options(options)
export default class MarathonAddPlayerCommand extends ReportingSubCommand {
  async run(ctx: CommandContext<typeof options>) {
    const player = await candidateForUser(ctx.client, ctx.guildId, ctx.options.player.id);
    await getMarathonService().addPlayer(invocationFor(ctx), player, ctx.options.team);
  }
}

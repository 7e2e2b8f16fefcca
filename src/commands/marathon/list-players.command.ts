import { createStringOption, Declare, Options, type CommandContext } from "seyfert";
import { ReportingSubCommand, invocationFor } from "@/adapters/seyfert";
import { getMarathonService, respondTeamAutocomplete } from "./shared";

const options = {
  team: createStringOption({
    description: "the team to inspect",
    required: true,
    autocomplete: respondTeamAutocomplete,
  }),
};

// Lista los jugadores anotados directamente en el equipo.
@Declare({
  name: "list_players",
  description: "List all players on a team",
})
@Options(options)
export default class MarathonListPlayersCommand extends ReportingSubCommand {
  async run(ctx: CommandContext<typeof options>) {
    await getMarathonService().listPlayers(invocationFor(ctx), ctx.options.team);
  }
}

import { createStringOption, Declare, Options, type CommandContext } from "seyfert";
import { ReportingSubCommand, invocationFor } from "@/adapters/seyfert";
import { getMarathonService, respondTeamAutocomplete } from "./shared";

const options = {
  team: createStringOption({
    description: "the team to configure",
    required: true,
    autocomplete: respondTeamAutocomplete,
  }),
};

// Quita el canal actual de la lista del equipo; no falla si no estaba.
@Declare({
  name: "remove_channel",
  description: "Remove a channel from a team",
})
@Options(options)
export default class MarathonRemoveChannelCommand extends ReportingSubCommand {
  async run(ctx: CommandContext<typeof options>) {
    await getMarathonService().removeChannel(invocationFor(ctx), ctx.options.team);
  }
}

/**
 * Motivación: registrar el comando "marathon / add_channel", que habilita el canal actual
 * para un equipo.
 */
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

@Declare({
  name: "add_channel",
  description: "Add a channel to a team",
})
@Options(options)
export default class MarathonAddChannelCommand extends ReportingSubCommand {
  async run(ctx: CommandContext<typeof options>) {
    await getMarathonService().addChannel(invocationFor(ctx), ctx.options.team);
  }
}

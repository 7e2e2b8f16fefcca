/**
 * Motivación: registrar el comando "marathon / set_role", que asocia un equipo a un rol de
 * este servidor. Un mismo equipo puede tener un rol distinto en cada servidor.
 *
 * Alcance: solo dentro de un servidor (guard `guildOnly`).
 */
import { createRoleOption, createStringOption, Declare, Middlewares, Options, type CommandContext } from "seyfert";
import { Guard } from "@/middlewares/guards/decorator";
import { ReportingSubCommand, invocationFor } from "@/adapters/seyfert";
import { getMarathonService, respondTeamAutocomplete } from "./shared";

const options = {
  team: createStringOption({
    description: "the team to configure",
    required: true,
    autocomplete: respondTeamAutocomplete,
  }),
  role: createRoleOption({
    description: "the team role",
    required: true,
  }),
};

@Declare({
  name: "set_role",
  description: "Set a team role",
})
@Options(options)
@Guard({ guildOnly: true })
@Middlewares(["guard"])
export default class MarathonSetRoleCommand extends ReportingSubCommand {
  async run(ctx: CommandContext<typeof options>) {
    await getMarathonService().setRole(invocationFor(ctx), ctx.options.team, ctx.options.role.id);
  }
}
